import {
  COMPLETION_ACK_TOKEN,
  CONTROL_FRAME_SIZE,
  CONTROL_MARKER,
  MAX_WORD,
} from "../constants.ts";
import { Opcode } from "../opcodes.ts";
import { EncodingError } from "../../utils/errors.ts";

/**
 * Control frame builder
 *
 * Layout (12 bytes):
 * - Marker: 0x5A (1 byte)
 * - Opcode (1 byte)
 * - w1..w5: five 16-bit words, little-endian (10 bytes)
 */
export class ControlFrameBuilder {
  /**
   * Build a 12-byte control frame
   * @param opcode Frame opcode
   * @param words Up to five word values; missing words are zero
   * @throws {EncodingError} If a word is not an unsigned 16-bit integer
   */
  static build(opcode: Opcode, ...words: number[]): Buffer {
    if (words.length > 5) {
      throw new EncodingError(
        `Control frame carries 5 words, got ${words.length}`,
      );
    }
    if (!Number.isInteger(opcode) || opcode < 0 || opcode > 0xff) {
      throw new EncodingError(`Opcode ${opcode} does not fit one byte`);
    }

    const frame = Buffer.alloc(CONTROL_FRAME_SIZE);
    frame.writeUInt8(CONTROL_MARKER, 0);
    frame.writeUInt8(opcode, 1);

    words.forEach((word, i) => {
      if (!Number.isInteger(word) || word < 0 || word > MAX_WORD) {
        throw new EncodingError(
          `Control word w${i + 1} must be an unsigned 16-bit integer, got ${word}`,
        );
      }
      frame.writeUInt16LE(word, 2 + i * 2);
    });

    return frame;
  }

  /**
   * START frame announcing a job: w1 = block count, w2 = copies / job id
   */
  static start(blockCount: number, copies: number): Buffer {
    return this.build(Opcode.START, blockCount, copies);
  }

  /**
   * START frame acknowledging completion: w1 = block count, w2 = 0x0100
   */
  static ack(blockCount: number): Buffer {
    return this.build(Opcode.START, blockCount, COMPLETION_ACK_TOKEN);
  }
}
