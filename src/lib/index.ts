export * from "./protocol/index.ts";
export * from "./transport/index.ts";

export { FlowController, type AcquireOptions } from "./core/flow-controller.ts";
export { createPrintJob, blockCountFor, type PrintJob } from "./core/print-job.ts";
export { JobState, Session, isTerminal } from "./core/session.ts";
export {
  JobStateMachine,
  type JobOutcome,
  type JobProgress,
  type ProgressListener,
  type TransitionListener,
} from "./core/job-state-machine.ts";
export {
  PrinterDriver,
  type PrintOptions,
  type PrintResult,
} from "./core/printer-driver.ts";
export {
  LabelPrinter,
  type ConnectableTransport,
  type LabelPrinterOptions,
  type LabelPrintRequest,
} from "./core/label-printer.ts";

export { BleTransport } from "./ble/ble-transport.ts";
export { normalizeUUID } from "./ble/uuid.ts";
export { ImageRasterizer, packBits, type RasterImage } from "./processing/index.ts";

export * from "./utils/errors.ts";
export { Logger, logger, LogLevel, LogEventType, type LogEntry } from "./utils/logger.ts";
