/**
 * Base error class for all printer-related errors
 */
export class PrintError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PrintError";
    Object.setPrototypeOf(this, PrintError.prototype);
  }
}

/**
 * Error thrown when a frame cannot be encoded (bad payload length or a
 * field that does not fit 16 bits)
 */
export class EncodingError extends PrintError {
  constructor(message: string) {
    super(message);
    this.name = "EncodingError";
    Object.setPrototypeOf(this, EncodingError.prototype);
  }
}

/**
 * Reasons an inbound frame can fail to decode
 */
export enum DecodeErrorKind {
  BAD_LENGTH = "bad_length",
  BAD_MARKER = "bad_marker",
  UNKNOWN_OPCODE = "unknown_opcode",
}

/**
 * Error thrown when inbound bytes are not a well-formed frame
 */
export class DecodeError extends PrintError {
  constructor(
    public readonly kind: DecodeErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "DecodeError";
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * Error thrown when the transport fails to write, or the notification
 * stream closes under a running job
 */
export class TransportError extends PrintError {
  constructor(message: string = "Transport failure", options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Error thrown when the device never reports completion of a job
 */
export class JobTimeoutError extends PrintError {
  constructor(message: string = "Timed out waiting for job completion") {
    super(message);
    this.name = "JobTimeoutError";
    Object.setPrototypeOf(this, JobTimeoutError.prototype);
  }
}

/**
 * Error thrown when a job is aborted through its AbortSignal
 */
export class CancelledError extends PrintError {
  constructor(message: string = "Print job cancelled") {
    super(message);
    this.name = "CancelledError";
    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

/**
 * Error thrown when an image needs more blocks than a 16-bit count holds
 */
export class ImageTooLargeError extends PrintError {
  constructor(message: string) {
    super(message);
    this.name = "ImageTooLargeError";
    Object.setPrototypeOf(this, ImageTooLargeError.prototype);
  }
}

/**
 * Error thrown when asked to print zero bytes
 */
export class EmptyImageError extends PrintError {
  constructor(message: string = "Image data is empty") {
    super(message);
    this.name = "EmptyImageError";
    Object.setPrototypeOf(this, EmptyImageError.prototype);
  }
}

/**
 * Error returned when a job is already running on the same transport
 */
export class JobInProgressError extends PrintError {
  constructor(message: string = "A print job is already in progress") {
    super(message);
    this.name = "JobInProgressError";
    Object.setPrototypeOf(this, JobInProgressError.prototype);
  }
}

/**
 * Error thrown when driver or CLI options are out of range
 */
export class ConfigurationError extends PrintError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when a device cannot be found or accessed
 */
export class DeviceNotFoundError extends PrintError {
  constructor(message: string = "Device not found") {
    super(message);
    this.name = "DeviceNotFoundError";
    Object.setPrototypeOf(this, DeviceNotFoundError.prototype);
  }
}

/**
 * Error thrown when a connection to the device fails
 */
export class ConnectionError extends PrintError {
  constructor(message: string = "Connection failed") {
    super(message);
    this.name = "ConnectionError";
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

/**
 * Error thrown when image rasterization fails
 */
export class ImageProcessingError extends PrintError {
  constructor(message: string) {
    super(message);
    this.name = "ImageProcessingError";
    Object.setPrototypeOf(this, ImageProcessingError.prototype);
  }
}

/**
 * Normalize anything thrown below the state machine into a PrintError.
 * Foreign errors come from the transport, so they are wrapped as such.
 */
export function toPrintError(error: unknown): PrintError {
  if (error instanceof PrintError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Transport failure: ${message}`, { cause: error });
}
