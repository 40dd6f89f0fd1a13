import { describe, test, expect } from "vitest";
import {
  PrintError,
  EncodingError,
  DecodeError,
  DecodeErrorKind,
  TransportError,
  JobTimeoutError,
  CancelledError,
  ImageTooLargeError,
  EmptyImageError,
  JobInProgressError,
  ConfigurationError,
  DeviceNotFoundError,
  ConnectionError,
  ImageProcessingError,
  toPrintError,
} from "./errors.ts";

describe("Error Classes", () => {
  describe("error hierarchy", () => {
    test("PrintError extends Error", () => {
      expect(new PrintError("test") instanceof Error).toBe(true);
    });

    test("all custom errors extend PrintError", () => {
      const errors = [
        new EncodingError("test"),
        new DecodeError(DecodeErrorKind.BAD_LENGTH, "test"),
        new TransportError(),
        new JobTimeoutError(),
        new CancelledError(),
        new ImageTooLargeError("test"),
        new EmptyImageError(),
        new JobInProgressError(),
        new ConfigurationError("test"),
        new DeviceNotFoundError(),
        new ConnectionError(),
        new ImageProcessingError("test"),
      ];
      for (const error of errors) {
        expect(error).toBeInstanceOf(PrintError);
      }
    });

    test("instanceof distinguishes siblings", () => {
      const error = new JobTimeoutError();
      expect(error instanceof JobTimeoutError).toBe(true);
      expect(error instanceof TransportError).toBe(false);
    });
  });

  describe("error names", () => {
    test("name matches the class", () => {
      expect(new PrintError("test").name).toBe("PrintError");
      expect(new DecodeError(DecodeErrorKind.BAD_MARKER, "x").name).toBe("DecodeError");
      expect(new TransportError().name).toBe("TransportError");
      expect(new CancelledError().name).toBe("CancelledError");
      expect(new JobInProgressError().name).toBe("JobInProgressError");
    });
  });

  describe("default messages", () => {
    test("TransportError", () => {
      expect(new TransportError().message).toBe("Transport failure");
    });

    test("CancelledError", () => {
      expect(new CancelledError().message).toBe("Print job cancelled");
    });

    test("EmptyImageError", () => {
      expect(new EmptyImageError().message).toBe("Image data is empty");
    });

    test("JobInProgressError", () => {
      expect(new JobInProgressError().message).toBe("A print job is already in progress");
    });
  });

  describe("DecodeError", () => {
    test("carries its kind", () => {
      const error = new DecodeError(DecodeErrorKind.UNKNOWN_OPCODE, "opcode 0x0e");
      expect(error.kind).toBe(DecodeErrorKind.UNKNOWN_OPCODE);
      expect(error.message).toBe("opcode 0x0e");
    });
  });

  describe("TransportError", () => {
    test("keeps the cause", () => {
      const cause = new Error("link lost");
      const error = new TransportError("write failed", { cause });
      expect(error.cause).toBe(cause);
    });
  });

  describe("toPrintError()", () => {
    test("passes PrintErrors through", () => {
      const error = new JobTimeoutError();
      expect(toPrintError(error)).toBe(error);
    });

    test("wraps foreign errors as TransportError", () => {
      const cause = new Error("adapter reset");
      const error = toPrintError(cause);
      expect(error).toBeInstanceOf(TransportError);
      expect(error.message).toBe("Transport failure: adapter reset");
      expect(error.cause).toBe(cause);
    });

    test("wraps non-Error values", () => {
      expect(toPrintError("boom").message).toBe("Transport failure: boom");
    });
  });
});
