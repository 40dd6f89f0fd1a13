import { describe, test, expect } from "vitest";
import { blockCountFor, createPrintJob } from "./print-job.ts";
import {
  ConfigurationError,
  EmptyImageError,
  ImageTooLargeError,
} from "../utils/errors.ts";

describe("blockCountFor()", () => {
  test("rounds up to whole blocks", () => {
    expect(blockCountFor(1)).toBe(1);
    expect(blockCountFor(16)).toBe(1);
    expect(blockCountFor(17)).toBe(2);
    expect(blockCountFor(928)).toBe(58);
  });
});

describe("createPrintJob()", () => {
  test("splits an image into 16-byte blocks", () => {
    const image = Buffer.from(Array.from({ length: 32 }, (_, i) => i));
    const job = createPrintJob(image);

    expect(job.blockCount).toBe(2);
    expect(job.blocks[0]).toEqual(image.subarray(0, 16));
    expect(job.blocks[1]).toEqual(image.subarray(16, 32));
    expect(job.byteLength).toBe(32);
    expect(job.copies).toBe(1);
  });

  test("zero-pads the last block", () => {
    const job = createPrintJob(Buffer.alloc(20, 0xff));

    expect(job.blockCount).toBe(2);
    expect(job.blocks[1]).toEqual(
      Buffer.from([0xff, 0xff, 0xff, 0xff, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]),
    );
  });

  test("accepts 65535 blocks", () => {
    const job = createPrintJob(new Uint8Array(65535 * 16));
    expect(job.blockCount).toBe(65535);
  });

  test("rejects 65536 blocks", () => {
    expect(() => createPrintJob(new Uint8Array(65536 * 16))).toThrow(ImageTooLargeError);
  });

  test("rejects one byte over the limit", () => {
    expect(() => createPrintJob(new Uint8Array(65535 * 16 + 1))).toThrow(
      "Image needs 65536 blocks of 16 bytes, the protocol allows 65535",
    );
  });

  test("rejects empty input", () => {
    expect(() => createPrintJob(new Uint8Array(0))).toThrow(EmptyImageError);
  });

  test("carries copies", () => {
    expect(createPrintJob(Buffer.alloc(16), 3).copies).toBe(3);
  });

  test("rejects copies that collide with the ack token", () => {
    expect(() => createPrintJob(Buffer.alloc(16), 0x0100)).toThrow(ConfigurationError);
  });

  test("rejects zero copies", () => {
    expect(() => createPrintJob(Buffer.alloc(16), 0)).toThrow(ConfigurationError);
  });
});
