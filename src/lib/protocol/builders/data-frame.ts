import {
  BLOCK_SIZE,
  DATA_FLAGS,
  DATA_FRAME_SIZE,
  DATA_HEADER_SIZE,
  DATA_MARKER,
  MAX_WORD,
} from "../constants.ts";
import { EncodingError } from "../../utils/errors.ts";

/**
 * Data frame builder
 *
 * Layout (20 bytes):
 * - Marker: 0x55 (1 byte)
 * - Flags: 0x00 (1 byte)
 * - Block index (2 bytes, little-endian)
 * - Payload (16 bytes)
 */
export class DataFrameBuilder {
  /**
   * Build a 20-byte data frame
   * @param index Block index (0..65535)
   * @param payload Exactly 16 bytes of raster data
   * @throws {EncodingError} If the payload is not 16 bytes or the index does not fit 16 bits
   */
  static build(index: number, payload: Uint8Array): Buffer {
    if (payload.length !== BLOCK_SIZE) {
      throw new EncodingError(
        `Data frame payload must be ${BLOCK_SIZE} bytes, got ${payload.length}`,
      );
    }
    if (!Number.isInteger(index) || index < 0 || index > MAX_WORD) {
      throw new EncodingError(
        `Block index must be an unsigned 16-bit integer, got ${index}`,
      );
    }

    const frame = Buffer.alloc(DATA_FRAME_SIZE);
    frame.writeUInt8(DATA_MARKER, 0);
    frame.writeUInt8(DATA_FLAGS, 1);
    frame.writeUInt16LE(index, 2);
    frame.set(payload, DATA_HEADER_SIZE);

    return frame;
  }
}
