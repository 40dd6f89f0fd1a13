import type { Opcode } from "../opcodes.ts";

/**
 * Decoded control frame
 *
 * The meaning of each word depends on the opcode and on the direction:
 *
 * | Opcode   | w1          | w2                        | w3..w5   |
 * |----------|-------------|---------------------------|----------|
 * | START    | block count | copies, or 0x0100 for ack | reserved |
 * | COMPLETE | block count | job id / copies echo      | reserved |
 * | STATUS   | capability  | capability                | unknown  |
 */
export interface ControlFrame {
  opcode: Opcode;
  w1: number;
  w2: number;
  w3: number;
  w4: number;
  w5: number;
}

/**
 * Decoded data frame (host to device only on the wire)
 */
export interface DataFrame {
  /** Block index, 0-based, contiguous */
  index: number;

  /** Exactly 16 bytes of raster data */
  payload: Buffer;
}

/**
 * The two meanings of a START frame, told apart by w2
 */
export type StartFrameKind =
  | { kind: "start"; blockCount: number; copies: number }
  | { kind: "ack"; blockCount: number };
