import {
  CancelledError,
  ConfigurationError,
  TransportError,
} from "../utils/errors.ts";

export interface AcquireOptions {
  /** Aborts the wait with CancelledError */
  signal?: AbortSignal;

  /** Maximum time (in seconds) to wait for a slot; unbounded when omitted */
  timeout?: number;
}

interface Waiter {
  grant: () => void;
}

/**
 * Bounds the number of writes handed to the transport but not yet confirmed
 *
 * This is local pacing only. The printer sends no per-block acknowledgement;
 * a slot is released when the transport reports the write left its queue.
 * Waiters are served in FIFO order, so blocks keep their index order.
 */
export class FlowController {
  private inFlight = 0;
  private peakInFlight = 0;
  private waiters: Waiter[] = [];

  constructor(public readonly window: number = 2) {
    if (!Number.isInteger(window) || window < 1) {
      throw new ConfigurationError(
        `Flow control window must be a positive integer, got ${window}`,
      );
    }
  }

  /**
   * Writes currently outstanding
   */
  get outstanding(): number {
    return this.inFlight;
  }

  /**
   * Highest number of outstanding writes observed
   */
  get peak(): number {
    return this.peakInFlight;
  }

  /**
   * Number of callers suspended in acquire()
   */
  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Wait until a slot is free, then take it
   *
   * @throws {CancelledError} If the signal aborts while waiting
   * @throws {TransportError} If no slot frees up within the timeout
   */
  acquire(options: AcquireOptions = {}): Promise<void> {
    const { signal, timeout } = options;

    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }
    if (this.inFlight < this.window && this.waiters.length === 0) {
      this.take();
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      let timeoutId: NodeJS.Timeout | undefined;

      const remove = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        if (timeoutId !== undefined) {
          clearTimeout(timeoutId);
        }
        signal?.removeEventListener("abort", onAbort);
      };

      const waiter: Waiter = {
        grant: () => {
          remove();
          this.take();
          resolve();
        },
      };

      const onAbort = (): void => {
        remove();
        reject(new CancelledError());
      };

      if (timeout !== undefined) {
        timeoutId = setTimeout(() => {
          remove();
          reject(
            new TransportError(
              `Transport did not confirm a write within ${timeout}s`,
            ),
          );
        }, timeout * 1000);
      }

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Return a slot and wake the oldest waiter
   */
  release(): void {
    if (this.inFlight === 0) {
      throw new Error("FlowController.release() called with no outstanding writes");
    }
    this.inFlight--;

    const next = this.waiters[0];
    if (next && this.inFlight < this.window) {
      next.grant();
    }
  }

  private take(): void {
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
  }
}
