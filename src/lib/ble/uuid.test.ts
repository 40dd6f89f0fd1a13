import { describe, test, expect } from "vitest";
import { normalizeUUID } from "./uuid.ts";

describe("normalizeUUID()", () => {
  test("shortens Bluetooth Base UUIDs", () => {
    expect(normalizeUUID("0000ffe1-0000-1000-8000-00805f9b34fb")).toBe("ffe1");
  });

  test("lowercases short UUIDs", () => {
    expect(normalizeUUID("FFE2")).toBe("ffe2");
  });

  test("keeps vendor UUIDs whole, without dashes", () => {
    expect(normalizeUUID("6E400001-B5A3-F393-E0A9-E50E24DCCA9E")).toBe(
      "6e400001b5a3f393e0a9e50e24dcca9e",
    );
  });
});
