import type { BLEConfig, DriverOptions, RasterConfig } from "./config.ts";
import { COMPLETION_ACK_TOKEN, DEFAULT_COPIES, MAX_WORD } from "../constants.ts";
import { ConfigurationError } from "../../utils/errors.ts";

/**
 * Default BLE configuration for LX-D01 printers
 *
 * The printer exposes service 0xFFE6 with a write-without-response
 * characteristic (0xFFE1) and a notify characteristic (0xFFE2).
 */
export const DEFAULT_BLE_CONFIG: BLEConfig = {
  deviceName: "LX-D01",
  serviceUUID: "0000ffe6-0000-1000-8000-00805f9b34fb",
  writeCharacteristicUUID: "0000ffe1-0000-1000-8000-00805f9b34fb",
  notifyCharacteristicUUID: "0000ffe2-0000-1000-8000-00805f9b34fb",
  scanTimeout: 10.0,
};

/**
 * Default driver options
 *
 * Values based on packet capture analysis:
 * - flowControlWindow: 2 - controller credits observed in the HCI log
 * - statusWaitTimeout: 2.0s - status arrives within ~200ms of subscribing
 * - completionWaitTimeout: 10.0s - printing a full label takes a few seconds
 * - ackDrainGrace: 0.5s - device repeats COMPLETE a handful of times
 */
export const DEFAULT_DRIVER_OPTIONS: DriverOptions = {
  flowControlWindow: 2,
  statusWaitTimeout: 2.0,
  skipStatusWait: false,
  completionWaitTimeout: 10.0,
  ackDrainGrace: 0.5,
  writeTimeout: 2.0,
  copies: DEFAULT_COPIES,
  failOnMalformedFrame: false,
};

/**
 * Default raster configuration for the 58mm (384 dot) print head
 */
export const DEFAULT_RASTER_CONFIG: RasterConfig = {
  printWidth: 384,
  threshold: 128,
  invert: false,
  checkerboardSquares: 8,
};

function assertDuration(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(
      `${name} must be a non-negative number of seconds, got ${value}`,
    );
  }
}

/**
 * Validate a copies / job id value for w2 of the START frame
 *
 * 0x0100 is rejected: the device could not tell that START from an ack.
 */
export function validateCopies(copies: number): number {
  if (!Number.isInteger(copies) || copies < 1 || copies > MAX_WORD) {
    throw new ConfigurationError(
      `copies must be an integer between 1 and ${MAX_WORD}, got ${copies}`,
    );
  }
  if (copies === COMPLETION_ACK_TOKEN) {
    throw new ConfigurationError(
      `copies cannot be ${COMPLETION_ACK_TOKEN} (0x0100), it is the completion ack token`,
    );
  }
  return copies;
}

/**
 * Merge caller options with the defaults and validate the result
 * @throws {ConfigurationError} If any option is out of range
 */
export function resolveDriverOptions(
  options: Partial<DriverOptions> = {},
): DriverOptions {
  const resolved: DriverOptions = { ...DEFAULT_DRIVER_OPTIONS, ...options };

  if (
    !Number.isInteger(resolved.flowControlWindow) ||
    resolved.flowControlWindow < 1
  ) {
    throw new ConfigurationError(
      `flowControlWindow must be a positive integer, got ${resolved.flowControlWindow}`,
    );
  }

  assertDuration("statusWaitTimeout", resolved.statusWaitTimeout);
  assertDuration("completionWaitTimeout", resolved.completionWaitTimeout);
  assertDuration("ackDrainGrace", resolved.ackDrainGrace);
  assertDuration("writeTimeout", resolved.writeTimeout);
  validateCopies(resolved.copies);

  return resolved;
}
