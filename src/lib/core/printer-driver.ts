import type { ControlFrame } from "../protocol/interfaces/frames.ts";
import type { DriverOptions } from "../protocol/interfaces/config.ts";
import { resolveDriverOptions } from "../protocol/interfaces/defaults.ts";
import type { TransportPort } from "../transport/transport-port.ts";
import { NotificationPump } from "../transport/notification-pump.ts";
import { createPrintJob, type PrintJob } from "./print-job.ts";
import { JobState, Session } from "./session.ts";
import {
  JobStateMachine,
  type ProgressListener,
  type TransitionListener,
} from "./job-state-machine.ts";
import {
  JobInProgressError,
  toPrintError,
  type PrintError,
} from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";

export interface PrintOptions {
  /** Aborts the job; it then fails with CancelledError */
  signal?: AbortSignal;

  /** Overrides the driver's copies / job id for this job */
  copies?: number;

  onTransition?: TransitionListener;
  onProgress?: ProgressListener;
}

export type PrintResult =
  | {
      ok: true;
      blockCount: number;
      /** Capability frame received from the device, if any */
      status: ControlFrame | null;
      /** COMPLETE frames absorbed after the ack */
      repeatedCompletions: number;
    }
  | { ok: false; error: PrintError };

// One job per connection, however many drivers wrap it.
const busyTransports = new WeakSet<TransportPort>();

interface ConnectionState {
  pump: NotificationPump;
  /** Capability frame; the device sends it once per subscribe */
  status: ControlFrame | null;
}

// The notification stream can be read only once, so drivers share its pump.
const connections = new WeakMap<TransportPort, ConnectionState>();

/**
 * Receive state of a transport, replaced once its notification stream ended
 */
function connectionOf(transport: TransportPort): ConnectionState {
  const existing = connections.get(transport);
  if (existing && !existing.pump.closed) {
    return existing;
  }

  const state: ConnectionState = {
    pump: new NotificationPump(transport),
    status: null,
  };
  connections.set(transport, state);
  return state;
}

/**
 * Entry point for printing raster data over an already connected transport
 *
 * Builds a job from the image bytes, runs it through a fresh session and
 * reports the terminal state as a PrintResult. The driver never throws for
 * protocol failures.
 */
export class PrinterDriver {
  private readonly options: DriverOptions;
  private active: JobStateMachine | null = null;

  /**
   * @param transport Connected transport bound to the print characteristics
   * @param options Driver options merged over the defaults
   * @throws {ConfigurationError} If an option is out of range
   */
  constructor(
    private transport: TransportPort,
    options: Partial<DriverOptions> = {},
  ) {
    this.options = resolveDriverOptions(options);
  }

  /**
   * True while a job is running on this driver's transport
   */
  get busy(): boolean {
    return busyTransports.has(this.transport);
  }

  /**
   * State of the running job, IDLE when none
   */
  get state(): JobState {
    return this.active?.state ?? JobState.IDLE;
  }

  /**
   * Last capability frame the device sent on this connection
   */
  get status(): ControlFrame | null {
    return connections.get(this.transport)?.status ?? null;
  }

  get config(): Readonly<DriverOptions> {
    return this.options;
  }

  /**
   * Print raster bytes
   *
   * Nothing is sent when the image is rejected or another job is running.
   */
  async printImage(
    image: Uint8Array,
    options: PrintOptions = {},
  ): Promise<PrintResult> {
    if (busyTransports.has(this.transport)) {
      logger.warning("Rejecting print request: a job is already running");
      return { ok: false, error: new JobInProgressError() };
    }

    let job: PrintJob;
    try {
      job = createPrintJob(image, options.copies ?? this.options.copies);
    } catch (error) {
      const cause = toPrintError(error);
      logger.error(`Rejecting print request: ${cause.message}`);
      return { ok: false, error: cause };
    }

    busyTransports.add(this.transport);
    const connection = connectionOf(this.transport);
    const inbox = connection.pump.attach();
    const session = new Session(
      inbox,
      this.options.flowControlWindow,
      connection.status,
    );
    const machine = new JobStateMachine(
      job,
      this.transport,
      session,
      this.options,
      options.signal,
    );
    const unsubscribers = [
      options.onTransition && machine.onTransition(options.onTransition),
      options.onProgress && machine.onProgress(options.onProgress),
    ];
    this.active = machine;

    try {
      const outcome = await machine.run();
      if (outcome.state === JobState.FAILED) {
        return { ok: false, error: outcome.error };
      }

      return {
        ok: true,
        blockCount: outcome.blockCount,
        status: outcome.status,
        repeatedCompletions: outcome.repeatedCompletions,
      };
    } finally {
      unsubscribers.forEach((unsubscribe) => unsubscribe?.());
      connection.status = session.status;
      connection.pump.detach(inbox);
      this.active = null;
      busyTransports.delete(this.transport);
    }
  }
}
