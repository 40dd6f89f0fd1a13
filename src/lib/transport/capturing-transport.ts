import type { TransportPort } from "./transport-port.ts";
import { formatHex } from "../protocol/format.ts";
import { logger, LogEventType } from "../utils/logger.ts";

/**
 * One captured frame
 */
export interface CapturedFrame {
  direction: "send" | "recv";
  time: number;
  data: Buffer;
}

/**
 * Transport decorator that records traffic in both directions
 *
 * Every frame is logged at debug level as `[SEND]`/`[RECV]` hex and kept in
 * memory so the CLI can dump the whole exchange after a job.
 */
export class CapturingTransport implements TransportPort {
  private frames: CapturedFrame[] = [];

  constructor(private inner: TransportPort) {}

  async writeWithoutResponse(data: Buffer): Promise<void> {
    this.record("send", data);
    await this.inner.writeWithoutResponse(data);
  }

  async *notifications(): AsyncIterable<Buffer> {
    for await (const data of this.inner.notifications()) {
      this.record("recv", data);
      yield data;
    }
  }

  /**
   * All frames seen so far, oldest first
   */
  getFrames(): readonly CapturedFrame[] {
    return this.frames;
  }

  clear(): void {
    this.frames = [];
  }

  /**
   * Render the capture as one line per frame:
   * `<iso time> SEND|RECV <hex>`
   */
  format(): string {
    return this.frames
      .map(
        (frame) =>
          `${new Date(frame.time).toISOString()} ${frame.direction.toUpperCase()} ${formatHex(frame.data)}`,
      )
      .join("\n");
  }

  private record(direction: CapturedFrame["direction"], data: Buffer): void {
    const time = Date.now();
    this.frames.push({ direction, time, data: Buffer.from(data) });

    const tag = direction === "send" ? "[SEND]" : "[RECV]";
    logger.debug(
      `${tag} ${new Date(time).toISOString()} | Bytes: ${data.length} | Hex: ${formatHex(data)}`,
      direction === "send" ? LogEventType.FRAME_SENT : LogEventType.FRAME_RECEIVED,
      { length: data.length },
    );
  }
}
