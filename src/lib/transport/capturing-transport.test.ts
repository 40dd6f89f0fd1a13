import { describe, test, expect } from "vitest";
import { CapturingTransport } from "./capturing-transport.ts";
import { FakePrinterTransport } from "../../__tests__/utils/test-helpers.ts";

describe("CapturingTransport", () => {
  test("records writes and forwards them", async () => {
    const inner = new FakePrinterTransport();
    const capture = new CapturingTransport(inner);

    await capture.writeWithoutResponse(Buffer.from([0x5a, 0x02]));

    expect(inner.written).toEqual([Buffer.from([0x5a, 0x02])]);
    expect(capture.getFrames()).toHaveLength(1);
    expect(capture.getFrames()[0]?.direction).toBe("send");
  });

  test("records notifications as they pass through", async () => {
    const inner = new FakePrinterTransport();
    const capture = new CapturingTransport(inner);
    inner.notify("5A 06 01 00");
    inner.disconnect();

    const received: Buffer[] = [];
    for await (const frame of capture.notifications()) {
      received.push(frame);
    }

    expect(received).toEqual([Buffer.from([0x5a, 0x06, 0x01, 0x00])]);
    expect(capture.getFrames().map((frame) => frame.direction)).toEqual(["recv"]);
  });

  test("formats one line per frame", async () => {
    const capture = new CapturingTransport(new FakePrinterTransport());
    await capture.writeWithoutResponse(Buffer.from([0x55, 0x00]));

    expect(capture.format()).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z SEND 55 00$/);
  });

  test("clear() empties the capture", async () => {
    const capture = new CapturingTransport(new FakePrinterTransport());
    await capture.writeWithoutResponse(Buffer.from([1]));
    capture.clear();

    expect(capture.getFrames()).toHaveLength(0);
    expect(capture.format()).toBe("");
  });
});
