/**
 * Bluetooth Low Energy (BLE) connection configuration
 *
 * Contains settings for discovering and connecting to the printer via BLE.
 */
export interface BLEConfig {
  /**
   * Substring of the advertised local name used to pick the printer during scanning
   */
  deviceName: string;

  /**
   * UUID of the primary service carrying the print characteristics
   */
  serviceUUID: string;

  /**
   * UUID of the characteristic written (without response) with control and data frames
   */
  writeCharacteristicUUID: string;

  /**
   * UUID of the characteristic the printer notifies status and completion on
   */
  notifyCharacteristicUUID: string;

  /**
   * Maximum time (in seconds) to wait for device discovery before timing out
   */
  scanTimeout: number;
}

/**
 * Print job driver configuration
 *
 * Timing and pacing for one job. All durations are in seconds.
 */
export interface DriverOptions {
  /**
   * Maximum number of data frame writes the transport may hold unconfirmed
   *
   * 2 matches the controller credits seen in captures. Larger windows are
   * untested against real hardware.
   */
  flowControlWindow: number;

  /**
   * Maximum time to wait for the initial STATUS notification
   *
   * The status is informational; on timeout the job proceeds anyway.
   */
  statusWaitTimeout: number;

  /**
   * Skip the initial STATUS wait and send START immediately
   */
  skipStatusWait: boolean;

  /**
   * Maximum time to wait for the COMPLETE notification after the last block
   */
  completionWaitTimeout: number;

  /**
   * Time spent absorbing repeated COMPLETE notifications after the ack
   */
  ackDrainGrace: number;

  /**
   * Maximum time a single write may stay unconfirmed by the transport
   */
  writeTimeout: number;

  /**
   * Copies / job identifier sent in w2 of the START frame
   */
  copies: number;

  /**
   * Fail the job when a malformed frame arrives while waiting for status or
   * completion, instead of logging and discarding it
   */
  failOnMalformedFrame: boolean;
}

/**
 * Rasterization settings for turning images into printer rows
 */
export interface RasterConfig {
  /**
   * Print head width in dots (one bit per dot)
   */
  printWidth: number;

  /**
   * Luminance threshold (0-255); darker pixels print as black dots
   */
  threshold: number;

  /**
   * Swap black and white after thresholding
   */
  invert: boolean;

  /**
   * Number of squares across the print width for the test pattern
   */
  checkerboardSquares: number;
}
