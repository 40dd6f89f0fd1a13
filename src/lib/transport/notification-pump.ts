import type { TransportPort } from "./transport-port.ts";
import { FrameInbox } from "./frame-inbox.ts";
import { TransportError } from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";
import { formatHex } from "../protocol/format.ts";

/**
 * Receive path of a transport
 *
 * Consumes the transport's notification stream exactly once and routes each
 * notification to the inbox of the session currently attached. Notifications
 * that arrive between sessions are dropped so they cannot leak into the next
 * job.
 */
export class NotificationPump {
  private inbox: FrameInbox | null = null;
  private task: Promise<void> | null = null;
  private endReason: TransportError | null = null;
  private dropped = 0;

  constructor(private transport: TransportPort) {}

  /**
   * Attach a fresh inbox for a new session, starting the pump if needed
   */
  attach(): FrameInbox {
    if (!this.task) {
      this.task = this.run();
    }

    const inbox = new FrameInbox();
    if (this.endReason) {
      inbox.close(this.endReason);
    } else {
      this.inbox?.close(new TransportError("Session replaced"));
      this.inbox = inbox;
    }
    return inbox;
  }

  /**
   * Detach a session's inbox; later notifications are dropped
   */
  detach(inbox: FrameInbox): void {
    if (this.inbox === inbox) {
      this.inbox = null;
    }
    inbox.close(new TransportError("Session released"));
  }

  /**
   * True once the notification stream has ended
   */
  get closed(): boolean {
    return this.endReason !== null;
  }

  /**
   * Notifications dropped because no session was attached
   */
  get droppedCount(): number {
    return this.dropped;
  }

  /**
   * Resolves when the notification stream has ended
   */
  async done(): Promise<void> {
    await this.task;
  }

  private async run(): Promise<void> {
    let reason = new TransportError("Notification stream closed");

    try {
      for await (const data of this.transport.notifications()) {
        if (this.inbox) {
          this.inbox.deliver(data);
        } else {
          this.dropped++;
          logger.debug(`Dropping notification outside a job: ${formatHex(data)}`);
        }
      }
      logger.warning("Notification stream ended");
    } catch (error) {
      reason = new TransportError(`Notification stream failed: ${error}`, {
        cause: error,
      });
      logger.error(reason.message);
    } finally {
      this.endReason = reason;
      this.inbox?.close(reason);
      this.inbox = null;
    }
  }
}
