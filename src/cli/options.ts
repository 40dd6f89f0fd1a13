import { InvalidArgumentError } from "commander";

/**
 * commander parser for whole numbers at or above a minimum
 */
export function parseInteger(min: number, max: number = Number.MAX_SAFE_INTEGER) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!/^\d+$/.test(value.trim()) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`Expected an integer between ${min} and ${max}.`);
    }
    return parsed;
  };
}

/**
 * commander parser for durations in seconds
 */
export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative number of seconds.");
  }
  return parsed;
}
