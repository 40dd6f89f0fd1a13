import type { ControlFrame, StartFrameKind } from "../interfaces/frames.ts";
import {
  COMPLETION_ACK_TOKEN,
  CONTROL_FRAME_SIZE,
  CONTROL_MARKER,
} from "../constants.ts";
import { isOpcode, Opcode } from "../opcodes.ts";
import { DecodeError, DecodeErrorKind } from "../../utils/errors.ts";

/**
 * Parser for control frames notified by the printer
 */
export class ControlFrameParser {
  /**
   * Decode a 12-byte control frame
   *
   * @param data - Raw notification bytes
   * @returns Decoded opcode and words
   * @throws {DecodeError} BAD_LENGTH, BAD_MARKER or UNKNOWN_OPCODE
   */
  public static parse(data: Uint8Array): ControlFrame {
    if (data.length !== CONTROL_FRAME_SIZE) {
      throw new DecodeError(
        DecodeErrorKind.BAD_LENGTH,
        `Control frame must be ${CONTROL_FRAME_SIZE} bytes, got ${data.length}`,
      );
    }

    const buffer = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    const marker = buffer.readUInt8(0);
    if (marker !== CONTROL_MARKER) {
      throw new DecodeError(
        DecodeErrorKind.BAD_MARKER,
        `Control frame must start with 0x5a, got 0x${marker.toString(16).padStart(2, "0")}`,
      );
    }

    const opcode = buffer.readUInt8(1);
    if (!isOpcode(opcode)) {
      throw new DecodeError(
        DecodeErrorKind.UNKNOWN_OPCODE,
        `Unknown control opcode 0x${opcode.toString(16).padStart(2, "0")}`,
      );
    }

    return {
      opcode,
      w1: buffer.readUInt16LE(2),
      w2: buffer.readUInt16LE(4),
      w3: buffer.readUInt16LE(6),
      w4: buffer.readUInt16LE(8),
      w5: buffer.readUInt16LE(10),
    };
  }

  /**
   * Tell a job START apart from a completion ack
   * @returns null if the frame is not a START frame
   */
  public static classifyStart(frame: ControlFrame): StartFrameKind | null {
    if (frame.opcode !== Opcode.START) {
      return null;
    }
    if (frame.w2 === COMPLETION_ACK_TOKEN) {
      return { kind: "ack", blockCount: frame.w1 };
    }
    return { kind: "start", blockCount: frame.w1, copies: frame.w2 };
  }
}
