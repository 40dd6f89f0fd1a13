import { TransportError } from "../utils/errors.ts";

/**
 * Push-to-pull adapter for BLE notifications
 *
 * BLE stacks deliver notifications through callbacks. This buffers them and
 * exposes a single-consumer async iterable that ends when the link drops.
 */
export class NotificationStream implements AsyncIterable<Buffer> {
  private queue: Buffer[] = [];
  private waiting: ((result: IteratorResult<Buffer>) => void) | null = null;
  private ended = false;
  private iterated = false;

  /**
   * Add a notification. Bytes are copied so later mutation by the caller
   * cannot reach the consumer.
   */
  push(data: Uint8Array): void {
    if (this.ended) {
      return;
    }

    const frame = Buffer.from(data);
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: frame, done: false });
    } else {
      this.queue.push(frame);
    }
  }

  /**
   * End the stream (disconnect). Buffered notifications are still delivered.
   */
  end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Number of notifications buffered but not yet consumed
   */
  get size(): number {
    return this.queue.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<Buffer> {
    if (this.iterated) {
      throw new TransportError("Notification stream cannot be restarted");
    }
    this.iterated = true;

    return {
      next: (): Promise<IteratorResult<Buffer>> => {
        const frame = this.queue.shift();
        if (frame) {
          return Promise.resolve({ value: frame, done: false });
        }
        if (this.ended) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          this.waiting = resolve;
        });
      },
      return: (): Promise<IteratorResult<Buffer>> => {
        this.queue = [];
        this.end();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
