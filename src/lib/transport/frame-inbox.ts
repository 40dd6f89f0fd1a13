import { CancelledError, TransportError } from "../utils/errors.ts";
import type { PrintError } from "../utils/errors.ts";

/**
 * Result of waiting on a FrameInbox
 */
export type InboxEvent =
  | { type: "frame"; data: Buffer }
  | { type: "timeout" }
  | { type: "closed"; reason: PrintError };

interface PendingWait {
  settle: (event: InboxEvent) => void;
}

/**
 * Per-session queue of inbound notifications
 *
 * Handles the asynchronous nature of BLE notifications by:
 * - Buffering notifications that arrive before the session asks for them
 * - Holding a single waiting consumer until a frame, a timeout or closure
 * - Rejecting the wait with CancelledError when the job is aborted
 */
export class FrameInbox {
  private queue: Buffer[] = [];
  private pending: PendingWait | null = null;
  private closeReason: PrintError | null = null;

  /**
   * Hand a notification to the session. Ignored once the inbox is closed.
   */
  deliver(data: Buffer): void {
    if (this.closeReason) {
      return;
    }

    if (this.pending) {
      this.pending.settle({ type: "frame", data });
    } else {
      this.queue.push(data);
    }
  }

  /**
   * Close the inbox. A waiting consumer receives a "closed" event.
   */
  close(reason: PrintError = new TransportError("Notification stream closed")): void {
    if (this.closeReason) {
      return;
    }
    this.closeReason = reason;
    this.pending?.settle({ type: "closed", reason });
  }

  get isClosed(): boolean {
    return this.closeReason !== null;
  }

  /**
   * Number of buffered notifications
   */
  get size(): number {
    return this.queue.length;
  }

  /**
   * Wait for the next notification
   *
   * Buffered frames are returned even after the inbox closed.
   *
   * @param timeoutSeconds - Maximum time to wait; 0 only drains the buffer
   * @param signal - Aborts the wait with CancelledError
   */
  next(timeoutSeconds: number, signal?: AbortSignal): Promise<InboxEvent> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }
    if (this.pending) {
      return Promise.reject(
        new Error("FrameInbox supports a single waiting consumer"),
      );
    }

    const frame = this.queue.shift();
    if (frame) {
      return Promise.resolve({ type: "frame", data: frame });
    }
    if (this.closeReason) {
      return Promise.resolve({ type: "closed", reason: this.closeReason });
    }
    if (timeoutSeconds <= 0) {
      return Promise.resolve({ type: "timeout" });
    }

    return new Promise<InboxEvent>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timeoutId);
        signal?.removeEventListener("abort", onAbort);
        this.pending = null;
      };
      const onAbort = (): void => {
        cleanup();
        reject(new CancelledError());
      };
      const timeoutId = setTimeout(() => {
        cleanup();
        resolve({ type: "timeout" });
      }, timeoutSeconds * 1000);

      signal?.addEventListener("abort", onAbort, { once: true });
      this.pending = {
        settle: (event) => {
          cleanup();
          resolve(event);
        },
      };
    });
  }
}
