import { describe, test, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseInteger, parseSeconds } from "./options.ts";

describe("parseInteger()", () => {
  const parseCopies = parseInteger(1, 65535);

  test("parses whole numbers in range", () => {
    expect(parseCopies("1")).toBe(1);
    expect(parseCopies(" 12 ")).toBe(12);
    expect(parseCopies("65535")).toBe(65535);
  });

  test("rejects out-of-range values", () => {
    expect(() => parseCopies("0")).toThrow(InvalidArgumentError);
    expect(() => parseCopies("65536")).toThrow("Expected an integer between 1 and 65535.");
  });

  test("rejects non-integers", () => {
    expect(() => parseCopies("1.5")).toThrow(InvalidArgumentError);
    expect(() => parseCopies("-3")).toThrow(InvalidArgumentError);
    expect(() => parseCopies("two")).toThrow(InvalidArgumentError);
  });
});

describe("parseSeconds()", () => {
  test("parses fractional seconds", () => {
    expect(parseSeconds("0.5")).toBe(0.5);
    expect(parseSeconds("10")).toBe(10);
    expect(parseSeconds("0")).toBe(0);
  });

  test("rejects negative and non-numeric input", () => {
    expect(() => parseSeconds("-1")).toThrow(InvalidArgumentError);
    expect(() => parseSeconds("soon")).toThrow(InvalidArgumentError);
    expect(() => parseSeconds("")).toThrow("Expected a non-negative number of seconds.");
  });
});
