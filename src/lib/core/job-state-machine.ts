import type { ControlFrame } from "../protocol/interfaces/frames.ts";
import type { DriverOptions } from "../protocol/interfaces/config.ts";
import type { TransportPort } from "../transport/transport-port.ts";
import type { PrintJob } from "./print-job.ts";
import { JobState, type Session } from "./session.ts";
import { ControlFrameBuilder } from "../protocol/builders/control-frame.ts";
import { DataFrameBuilder } from "../protocol/builders/data-frame.ts";
import { ControlFrameParser } from "../protocol/parsers/control-frame-parser.ts";
import { Opcode, opcodeName } from "../protocol/opcodes.ts";
import { formatHex } from "../protocol/format.ts";
import {
  CancelledError,
  DecodeError,
  DecodeErrorKind,
  JobTimeoutError,
  TransportError,
  toPrintError,
  type PrintError,
} from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";

/**
 * Terminal result of one job
 */
export type JobOutcome =
  | {
      state: JobState.DONE;
      blockCount: number;
      status: ControlFrame | null;
      repeatedCompletions: number;
      discardedFrames: number;
    }
  | {
      state: JobState.FAILED;
      error: PrintError;
      /** State the job was in when it failed */
      failedIn: JobState;
    };

export interface JobProgress {
  /** Data frames confirmed by the transport */
  blocksSent: number;
  blockCount: number;
  /** Set when the update comes from a MID_PROGRESS notification */
  deviceProgress?: ControlFrame;
}

export type TransitionListener = (to: JobState, from: JobState) => void;
export type ProgressListener = (progress: JobProgress) => void;

function asTransportError(error: unknown, description: string): PrintError {
  if (error instanceof TransportError || error instanceof CancelledError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Failed to write ${description}: ${message}`, {
    cause: error,
  });
}

/**
 * Drives one print job from START to the completion ack
 *
 * ```
 * IDLE -> AWAITING_STATUS -> STARTING -> STREAMING
 *      -> AWAITING_COMPLETION -> ACKNOWLEDGING -> DONE
 * ```
 *
 * Any failure moves the job to FAILED, which is terminal. The machine is the
 * only writer of its Session; the receive path only fills the session inbox.
 */
export class JobStateMachine {
  private transitionListeners = new Set<TransitionListener>();
  private progressListeners = new Set<ProgressListener>();

  constructor(
    private job: PrintJob,
    private transport: TransportPort,
    private session: Session,
    private options: DriverOptions,
    private signal?: AbortSignal,
  ) {}

  get state(): JobState {
    return this.session.state;
  }

  /**
   * @returns Unsubscribe function
   */
  onTransition(listener: TransitionListener): () => void {
    this.transitionListeners.add(listener);
    return () => this.transitionListeners.delete(listener);
  }

  /**
   * @returns Unsubscribe function
   */
  onProgress(listener: ProgressListener): () => void {
    this.progressListeners.add(listener);
    return () => this.progressListeners.delete(listener);
  }

  /**
   * Run the job to a terminal state. Never rejects; failures are returned.
   */
  async run(): Promise<JobOutcome> {
    if (this.session.state !== JobState.IDLE) {
      throw new Error("JobStateMachine.run() may only be called once");
    }

    const { blockCount, copies } = this.job;

    try {
      this.transition(JobState.AWAITING_STATUS);
      await this.awaitStatus();

      this.transition(JobState.STARTING);
      logger.info(
        `Starting job: ${blockCount} blocks, copies=${copies}`,
        LogEventType.JOB_START,
        { blockCount, copies },
      );
      await this.sendControl(ControlFrameBuilder.start(blockCount, copies), "start frame");

      this.transition(JobState.STREAMING);
      await this.streamBlocks();

      this.transition(JobState.AWAITING_COMPLETION);
      await this.awaitCompletion();

      this.transition(JobState.ACKNOWLEDGING);
      await this.sendControl(ControlFrameBuilder.ack(blockCount), "completion ack");
      logger.info("Completion acknowledged", LogEventType.ACK_SENT, { blockCount });

      this.transition(JobState.DONE);
    } catch (error) {
      const cause = toPrintError(error);
      const failedIn = this.session.state;
      this.transition(JobState.FAILED);
      logger.error(
        `Print job failed while ${failedIn}: ${cause.message}`,
        LogEventType.JOB_FAILED,
        { failedIn, error: cause.name },
      );
      return { state: JobState.FAILED, error: cause, failedIn };
    }

    await this.drainRepeats();

    logger.info(
      `Print job done (${blockCount} blocks, ${this.session.repeatedCompletions} repeated completions absorbed)`,
      LogEventType.JOB_DONE,
      { blockCount, repeatedCompletions: this.session.repeatedCompletions },
    );

    return {
      state: JobState.DONE,
      blockCount,
      status: this.session.status,
      repeatedCompletions: this.session.repeatedCompletions,
      discardedFrames: this.session.discardedFrames,
    };
  }

  private transition(to: JobState): void {
    const from = this.session.state;
    this.session.state = to;
    logger.debug(`Job ${this.session.id}: ${from} -> ${to}`);
    this.transitionListeners.forEach((listener) => listener(to, from));
  }

  private emitProgress(progress: JobProgress): void {
    this.progressListeners.forEach((listener) => listener(progress));
  }

  private throwIfCancelled(): void {
    if (this.signal?.aborted) {
      throw new CancelledError();
    }
  }

  private async awaitStatus(): Promise<void> {
    if (this.session.status) {
      logger.debug("Device status already known on this connection");
      return;
    }
    if (this.options.skipStatusWait) {
      logger.info("Skipping device status wait");
      return;
    }

    logger.info("Waiting for device status...", LogEventType.STATUS_WAIT);
    const status = await this.waitFor(
      (frame) => frame.opcode === Opcode.STATUS,
      this.options.statusWaitTimeout,
    );

    if (status) {
      this.session.status = status;
      logger.info(
        `Device status received: w1=${status.w1} w2=${status.w2} w3=${status.w3} w4=${status.w4} w5=${status.w5}`,
        LogEventType.STATUS_RECEIVED,
        status,
      );
    } else {
      logger.warning("Device status not received within timeout, proceeding anyway");
    }
  }

  private async streamBlocks(): Promise<void> {
    const { blocks, blockCount } = this.job;
    const { flow } = this.session;
    const pending = new Set<Promise<void>>();
    const failures: PrintError[] = [];

    logger.info(
      `Starting data transfer: ${blockCount} blocks`,
      LogEventType.DATA_SEND_START,
      { blockCount, window: flow.window },
    );

    for (const [index, block] of blocks.entries()) {
      this.throwIfCancelled();
      await flow.acquire({ signal: this.signal, timeout: this.options.writeTimeout });

      const earlier = failures[0];
      if (earlier) {
        flow.release();
        throw earlier;
      }

      const frame = DataFrameBuilder.build(index, block);
      logger.debug(
        `Sending block ${index + 1}/${blockCount}: ${formatHex(frame)}`,
        LogEventType.DATA_SEND_PROGRESS,
        { index, blockCount },
      );

      // Handed to the transport here, in index order; only confirmation is async.
      const write: Promise<void> = this.transport.writeWithoutResponse(frame).then(
        () => {
          flow.release();
          this.session.blocksSent++;
          this.emitProgress({ blocksSent: this.session.blocksSent, blockCount });
        },
        (error: unknown) => {
          flow.release();
          failures.push(asTransportError(error, `block ${index}`));
        },
      );
      const tracked: Promise<void> = write.finally(() => pending.delete(tracked));
      pending.add(tracked);
    }

    await this.awaitWrite(
      Promise.all(pending).then(() => undefined),
      "final data frames",
    );
    const failure = failures[0];
    if (failure) {
      throw failure;
    }

    logger.info("Data transfer complete", LogEventType.DATA_SEND_COMPLETE, {
      blockCount,
      peakInFlight: flow.peak,
    });
  }

  private async awaitCompletion(): Promise<void> {
    const { blockCount } = this.job;

    logger.info("Waiting for print completion...", LogEventType.COMPLETION_WAIT);
    const complete = await this.waitFor(
      (frame) => frame.opcode === Opcode.COMPLETE && frame.w1 === blockCount,
      this.options.completionWaitTimeout,
    );

    if (!complete) {
      throw new JobTimeoutError(
        `No completion for ${blockCount} blocks within ${this.options.completionWaitTimeout}s`,
      );
    }

    logger.info("Device reported completion", LogEventType.COMPLETION_RECEIVED, complete);
  }

  /**
   * Absorb the device's repeated COMPLETE frames (and echoes of the ack)
   * for the grace period so none are left for the next job
   */
  private async drainRepeats(): Promise<void> {
    const deadline = Date.now() + this.options.ackDrainGrace * 1000;

    try {
      for (;;) {
        const remaining = Math.max(0, deadline - Date.now()) / 1000;
        const event = await this.session.inbox.next(remaining, this.signal);
        if (event.type !== "frame") {
          return;
        }

        let frame: ControlFrame;
        try {
          frame = ControlFrameParser.parse(event.data);
        } catch (error) {
          if (!(error instanceof DecodeError)) {
            throw error;
          }
          this.session.discardedFrames++;
          logger.debug(`Discarding malformed frame after ack: ${error.message}`);
          continue;
        }

        if (frame.opcode === Opcode.COMPLETE && frame.w1 === this.job.blockCount) {
          this.session.repeatedCompletions++;
          logger.debug("Absorbed repeated completion");
        } else {
          this.session.discardedFrames++;
          logger.debug(`Discarding ${opcodeName(frame.opcode)} frame after ack`);
        }
      }
    } catch (error) {
      if (!(error instanceof CancelledError)) {
        throw error;
      }
      logger.debug("Completion drain cut short by cancellation");
    }
  }

  /**
   * Read notifications until one matches or the timeout elapses
   * @returns The matching frame, or null on timeout
   */
  private async waitFor(
    match: (frame: ControlFrame) => boolean,
    timeoutSeconds: number,
  ): Promise<ControlFrame | null> {
    const deadline = Date.now() + timeoutSeconds * 1000;

    for (;;) {
      const remaining = Math.max(0, deadline - Date.now()) / 1000;
      const event = await this.session.inbox.next(remaining, this.signal);

      if (event.type === "timeout") {
        return null;
      }
      if (event.type === "closed") {
        throw event.reason;
      }

      const frame = this.decode(event.data);
      if (!frame) {
        continue;
      }
      if (match(frame)) {
        return frame;
      }
      this.observe(frame);
    }
  }

  /**
   * Decode a notification; malformed frames are discarded unless the job
   * is configured to fail on them
   */
  private decode(data: Buffer): ControlFrame | null {
    try {
      return ControlFrameParser.parse(data);
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        throw error;
      }

      this.session.discardedFrames++;
      if (
        this.options.failOnMalformedFrame &&
        error.kind !== DecodeErrorKind.UNKNOWN_OPCODE
      ) {
        throw error;
      }

      if (error.kind === DecodeErrorKind.UNKNOWN_OPCODE) {
        logger.debug(`Ignoring frame with unknown opcode: ${formatHex(data)}`);
      } else {
        logger.warning(`Discarding malformed frame (${error.message}): ${formatHex(data)}`);
      }
      return null;
    }
  }

  /**
   * Note a frame that is not the one being waited for
   */
  private observe(frame: ControlFrame): void {
    this.session.discardedFrames++;

    switch (frame.opcode) {
      case Opcode.STATUS:
        this.session.status ??= frame;
        logger.debug("Device status notification during job");
        break;

      case Opcode.START: {
        const start = ControlFrameParser.classifyStart(frame);
        logger.debug(
          start?.kind === "ack"
            ? `Device echoed ack for ${frame.w1} blocks`
            : `Device accepted job: ${frame.w1} blocks, w2=${frame.w2}`,
        );
        break;
      }

      case Opcode.MID_PROGRESS:
        logger.debug(`Device progress: w1=${frame.w1} w2=${frame.w2}`);
        this.emitProgress({
          blocksSent: this.session.blocksSent,
          blockCount: this.job.blockCount,
          deviceProgress: frame,
        });
        break;

      case Opcode.COMPLETE:
        logger.warning(
          `Ignoring completion for ${frame.w1} blocks (job has ${this.job.blockCount})`,
        );
        break;
    }
  }

  private async sendControl(frame: Buffer, description: string): Promise<void> {
    this.throwIfCancelled();
    logger.debug(`Sending ${description}: ${formatHex(frame)}`);
    await this.awaitWrite(this.transport.writeWithoutResponse(frame), description);
  }

  /**
   * Wait for a write to be confirmed, bounded by writeTimeout and the signal
   */
  private awaitWrite(write: Promise<void>, description: string): Promise<void> {
    if (this.signal?.aborted) {
      // The write may still settle; keep its rejection handled.
      write.catch((error: unknown) =>
        logger.debug(`Write of ${description} failed after cancel: ${error}`),
      );
      return Promise.reject(new CancelledError());
    }

    const { signal } = this;
    const timeout = this.options.writeTimeout;

    return new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timeoutId);
        signal?.removeEventListener("abort", onAbort);
      };
      const onAbort = (): void => {
        cleanup();
        reject(new CancelledError());
      };
      const timeoutId = setTimeout(() => {
        cleanup();
        reject(
          new TransportError(`Transport did not confirm ${description} within ${timeout}s`),
        );
      }, timeout * 1000);

      signal?.addEventListener("abort", onAbort, { once: true });
      write.then(
        () => {
          cleanup();
          resolve();
        },
        (error: unknown) => {
          cleanup();
          reject(asTransportError(error, description));
        },
      );
    });
  }
}
