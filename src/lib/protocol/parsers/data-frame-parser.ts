import type { DataFrame } from "../interfaces/frames.ts";
import {
  DATA_FLAGS,
  DATA_FRAME_SIZE,
  DATA_HEADER_SIZE,
  DATA_MARKER,
} from "../constants.ts";
import { DecodeError, DecodeErrorKind } from "../../utils/errors.ts";

/**
 * Parser for data frames
 *
 * The host never receives data frames; this exists for captures and tests.
 */
export class DataFrameParser {
  /**
   * @throws {DecodeError} BAD_LENGTH or BAD_MARKER
   */
  public static parse(data: Uint8Array): DataFrame {
    if (data.length !== DATA_FRAME_SIZE) {
      throw new DecodeError(
        DecodeErrorKind.BAD_LENGTH,
        `Data frame must be ${DATA_FRAME_SIZE} bytes, got ${data.length}`,
      );
    }

    const buffer = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    if (buffer[0] !== DATA_MARKER || buffer[1] !== DATA_FLAGS) {
      throw new DecodeError(
        DecodeErrorKind.BAD_MARKER,
        `Data frame must start with 55 00, got ${buffer.subarray(0, 2).toString("hex")}`,
      );
    }

    return {
      index: buffer.readUInt16LE(2),
      payload: Buffer.from(buffer.subarray(DATA_HEADER_SIZE)),
    };
  }
}
