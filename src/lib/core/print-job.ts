import { BLOCK_SIZE, DEFAULT_COPIES, MAX_BLOCK_COUNT } from "../protocol/constants.ts";
import { validateCopies } from "../protocol/interfaces/defaults.ts";
import { EmptyImageError, ImageTooLargeError } from "../utils/errors.ts";

/**
 * One print request: the image split into fixed-size blocks
 */
export interface PrintJob {
  /** 16-byte block payloads in index order; the last one zero-padded */
  blocks: Buffer[];

  /** Number of blocks, sent in w1 of START, COMPLETE and the ack */
  blockCount: number;

  /** Copies / job id, sent in w2 of START */
  copies: number;

  /** Length of the raster data before padding */
  byteLength: number;
}

/**
 * Number of 16-byte blocks needed for an image of the given length
 */
export function blockCountFor(byteLength: number): number {
  return Math.ceil(byteLength / BLOCK_SIZE);
}

/**
 * Split raster bytes into a print job
 *
 * The block count is checked before any slicing happens.
 *
 * @throws {EmptyImageError} If the image has no bytes
 * @throws {ImageTooLargeError} If more than 65535 blocks would be needed
 */
export function createPrintJob(
  image: Uint8Array,
  copies: number = DEFAULT_COPIES,
): PrintJob {
  if (image.length === 0) {
    throw new EmptyImageError();
  }

  const blockCount = blockCountFor(image.length);
  if (blockCount > MAX_BLOCK_COUNT) {
    throw new ImageTooLargeError(
      `Image needs ${blockCount} blocks of ${BLOCK_SIZE} bytes, the protocol allows ${MAX_BLOCK_COUNT}`,
    );
  }

  const blocks: Buffer[] = [];
  for (let i = 0; i < blockCount; i++) {
    const block = Buffer.alloc(BLOCK_SIZE);
    block.set(image.subarray(i * BLOCK_SIZE, (i + 1) * BLOCK_SIZE));
    blocks.push(block);
  }

  return {
    blocks,
    blockCount,
    copies: validateCopies(copies),
    byteLength: image.length,
  };
}
