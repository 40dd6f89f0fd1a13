import { describe, test, expect } from "vitest";
import { ControlFrameBuilder } from "./control-frame.ts";
import { Opcode } from "../opcodes.ts";
import { EncodingError } from "../../utils/errors.ts";
import { expectHex } from "../../../__tests__/utils/test-helpers.ts";

describe("ControlFrameBuilder", () => {
  describe("build()", () => {
    test("creates exactly 12-byte buffer", () => {
      expect(ControlFrameBuilder.build(Opcode.STATUS).length).toBe(12);
    });

    test("marker 0x5A at byte 0, opcode at byte 1", () => {
      const frame = ControlFrameBuilder.build(Opcode.COMPLETE, 1);
      expect(frame[0]).toBe(0x5a);
      expect(frame[1]).toBe(0x06);
    });

    test("words are little-endian in w1..w5 order", () => {
      const frame = ControlFrameBuilder.build(
        Opcode.MID_PROGRESS,
        0x0102,
        0x0304,
        0x0506,
        0x0708,
        0x090a,
      );
      expectHex(frame, "5A 07 02 01 04 03 06 05 08 07 0A 09");
    });

    test("missing words are zero-filled", () => {
      const frame = ControlFrameBuilder.build(Opcode.START, 0xffff);
      expectHex(frame, "5A 04 FF FF 00 00 00 00 00 00 00 00");
    });

    test("rejects word above 0xFFFF", () => {
      expect(() => ControlFrameBuilder.build(Opcode.START, 0x10000)).toThrow(
        EncodingError,
      );
    });

    test("rejects negative and fractional words", () => {
      expect(() => ControlFrameBuilder.build(Opcode.START, -1)).toThrow(EncodingError);
      expect(() => ControlFrameBuilder.build(Opcode.START, 1, 1.5)).toThrow(
        "Control word w2 must be an unsigned 16-bit integer, got 1.5",
      );
    });

    test("rejects more than five words", () => {
      expect(() => ControlFrameBuilder.build(Opcode.START, 1, 2, 3, 4, 5, 6)).toThrow(
        EncodingError,
      );
    });
  });

  describe("start() / ack()", () => {
    test("start frame for 58 blocks, one copy", () => {
      expectHex(ControlFrameBuilder.start(58, 1), "5A 04 3A 00 01 00 00 00 00 00 00 00");
    });

    test("ack frame carries token 0x0100 in w2", () => {
      expectHex(ControlFrameBuilder.ack(58), "5A 04 3A 00 00 01 00 00 00 00 00 00");
    });

    test("start rejects block count above 65535", () => {
      expect(() => ControlFrameBuilder.start(65536, 1)).toThrow(EncodingError);
    });
  });
});
