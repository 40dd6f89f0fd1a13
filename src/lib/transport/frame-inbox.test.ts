import { describe, test, expect, vi, afterEach } from "vitest";
import { FrameInbox } from "./frame-inbox.ts";
import { CancelledError, TransportError } from "../utils/errors.ts";

describe("FrameInbox", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test("returns a buffered frame immediately", async () => {
    const inbox = new FrameInbox();
    inbox.deliver(Buffer.from([1, 2]));

    expect(await inbox.next(0)).toEqual({ type: "frame", data: Buffer.from([1, 2]) });
    expect(inbox.size).toBe(0);
  });

  test("zero timeout with an empty buffer times out", async () => {
    expect(await new FrameInbox().next(0)).toEqual({ type: "timeout" });
  });

  test("hands a delivered frame to the waiting consumer", async () => {
    const inbox = new FrameInbox();
    const waiting = inbox.next(1);
    inbox.deliver(Buffer.from([7]));

    expect(await waiting).toEqual({ type: "frame", data: Buffer.from([7]) });
  });

  test("times out when nothing arrives", async () => {
    vi.useFakeTimers();
    const inbox = new FrameInbox();
    const waiting = inbox.next(0.5);

    await vi.advanceTimersByTimeAsync(500);
    expect(await waiting).toEqual({ type: "timeout" });
  });

  test("a frame arriving after the timeout is kept for the next call", async () => {
    vi.useFakeTimers();
    const inbox = new FrameInbox();
    const waiting = inbox.next(0.1);
    await vi.advanceTimersByTimeAsync(100);
    await waiting;

    inbox.deliver(Buffer.from([9]));
    expect(await inbox.next(0)).toEqual({ type: "frame", data: Buffer.from([9]) });
  });

  test("close wakes the waiting consumer with the reason", async () => {
    const inbox = new FrameInbox();
    const waiting = inbox.next(5);
    const reason = new TransportError("link lost");
    inbox.close(reason);

    expect(await waiting).toEqual({ type: "closed", reason });
    expect(inbox.isClosed).toBe(true);
  });

  test("buffered frames are still returned after close", async () => {
    const inbox = new FrameInbox();
    inbox.deliver(Buffer.from([1]));
    inbox.close();

    expect((await inbox.next(0)).type).toBe("frame");
    expect((await inbox.next(0)).type).toBe("closed");
  });

  test("deliveries after close are ignored", () => {
    const inbox = new FrameInbox();
    inbox.close();
    inbox.deliver(Buffer.from([1]));

    expect(inbox.size).toBe(0);
  });

  test("abort rejects the wait with CancelledError", async () => {
    const inbox = new FrameInbox();
    const controller = new AbortController();
    const waiting = inbox.next(5, controller.signal);
    controller.abort();

    await expect(waiting).rejects.toThrow(CancelledError);
  });

  test("only one consumer may wait", async () => {
    const inbox = new FrameInbox();
    const first = inbox.next(5);

    await expect(inbox.next(5)).rejects.toThrow(
      "FrameInbox supports a single waiting consumer",
    );
    inbox.close();
    await first;
  });
});
