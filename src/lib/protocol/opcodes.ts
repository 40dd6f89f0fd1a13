/**
 * Control frame opcodes
 *
 * The second byte of every control frame. The set is closed: anything else
 * arriving from the device is reported as an unknown opcode.
 *
 * ## Job sequence
 *
 * ```
 * device  -> 5A 02 ...              status (capabilities, after subscribe)
 * host    -> 5A 04 <count> <copies> start job
 * host    -> 55 00 <index> <16 B>   data frames, index 0..count-1
 * device  -> 5A 07 ...              mid-progress (optional)
 * device  -> 5A 06 <count> ...      complete, repeated until acknowledged
 * host    -> 5A 04 <count> 00 01    acknowledge (token 0x0100)
 * ```
 */
export enum Opcode {
  /**
   * 0x02: STATUS (Device to Host)
   *
   * Sent once notifications are enabled. The words carry capability data
   * whose meaning is not known; the driver only records that it arrived.
   */
  STATUS = 0x02,

  /**
   * 0x04: START (Host to Device, echoed back)
   *
   * Overloaded. With w2 = copies it starts a job of w1 blocks; with
   * w2 = 0x0100 it acknowledges the Complete notification for w1 blocks.
   */
  START = 0x04,

  /**
   * 0x06: COMPLETE (Device to Host)
   *
   * w1 = number of blocks printed. Retransmitted until acknowledged.
   */
  COMPLETE = 0x06,

  /**
   * 0x07: MID_PROGRESS (Device to Host)
   *
   * Informational progress report during printing.
   */
  MID_PROGRESS = 0x07,
}

const KNOWN_OPCODES: ReadonlySet<number> = new Set([
  Opcode.STATUS,
  Opcode.START,
  Opcode.COMPLETE,
  Opcode.MID_PROGRESS,
]);

/**
 * Check whether a byte is one of the recognised opcodes
 */
export function isOpcode(value: number): value is Opcode {
  return KNOWN_OPCODES.has(value);
}

/**
 * Human readable opcode name for logs
 */
export function opcodeName(opcode: number): string {
  return isOpcode(opcode) ? Opcode[opcode] : `0x${opcode.toString(16).padStart(2, "0")}`;
}
