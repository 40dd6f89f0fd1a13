/**
 * Marker byte (0x5A) that opens every control frame
 *
 * Observed on both directions of the link: host commands and device
 * notifications alike start with this byte, followed by the opcode.
 */
export const CONTROL_MARKER = 0x5a;

/**
 * Size of a control frame in bytes (12 bytes)
 *
 * Marker + opcode + five little-endian 16-bit words. Unused words are zero.
 */
export const CONTROL_FRAME_SIZE = 12;

/**
 * Number of 16-bit words carried by a control frame
 */
export const CONTROL_WORD_COUNT = 5;

/**
 * Marker byte (0x55) that opens every data frame
 */
export const DATA_MARKER = 0x55;

/**
 * Second header byte of a data frame, always zero in captures
 */
export const DATA_FLAGS = 0x00;

/**
 * Size of the data frame header in bytes (marker, flags, index)
 */
export const DATA_HEADER_SIZE = 4;

/**
 * Payload bytes carried by one data frame (one block)
 *
 * 20-byte ATT payload at the default MTU of 23 leaves 16 bytes after the header.
 */
export const BLOCK_SIZE = 16;

/**
 * Size of a data frame in bytes (20 bytes)
 */
export const DATA_FRAME_SIZE = DATA_HEADER_SIZE + BLOCK_SIZE;

/**
 * Largest value a 16-bit protocol word can hold
 */
export const MAX_WORD = 0xffff;

/**
 * Maximum number of blocks in one job (block count is a 16-bit word)
 */
export const MAX_BLOCK_COUNT = MAX_WORD;

/**
 * Token carried in w2 of a Start frame when it acknowledges a completion
 *
 * The device keeps resending its Complete notification until it sees a
 * Start frame with this token.
 */
export const COMPLETION_ACK_TOKEN = 0x0100;

/**
 * Default copies / job identifier sent in w2 of the Start frame
 */
export const DEFAULT_COPIES = 1;
