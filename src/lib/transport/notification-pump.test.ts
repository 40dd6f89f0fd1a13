import { describe, test, expect } from "vitest";
import { NotificationPump } from "./notification-pump.ts";
import { TransportError } from "../utils/errors.ts";
import { FakePrinterTransport, flushMicrotasks } from "../../__tests__/utils/test-helpers.ts";

describe("NotificationPump", () => {
  test("routes notifications to the attached inbox", async () => {
    const transport = new FakePrinterTransport();
    const pump = new NotificationPump(transport);
    const inbox = pump.attach();

    transport.notify("5A 02 00 00 00 00 00 00 00 00 00 00");
    const event = await inbox.next(1);

    expect(event.type).toBe("frame");
    expect(event.type === "frame" && event.data[1]).toBe(0x02);
  });

  test("drops notifications while detached", async () => {
    const transport = new FakePrinterTransport();
    const pump = new NotificationPump(transport);
    const first = pump.attach();
    pump.detach(first);

    transport.notify("5A 06 01 00 01 00 00 00 00 00 00 00");
    await flushMicrotasks();

    const second = pump.attach();
    expect(pump.droppedCount).toBe(1);
    expect(await second.next(0)).toEqual({ type: "timeout" });
  });

  test("detach closes the inbox", () => {
    const pump = new NotificationPump(new FakePrinterTransport());
    const inbox = pump.attach();
    pump.detach(inbox);

    expect(inbox.isClosed).toBe(true);
  });

  test("attaching again closes the previous inbox", () => {
    const pump = new NotificationPump(new FakePrinterTransport());
    const first = pump.attach();
    pump.attach();

    expect(first.isClosed).toBe(true);
  });

  test("stream end closes the attached inbox and later ones", async () => {
    const transport = new FakePrinterTransport();
    const pump = new NotificationPump(transport);
    const inbox = pump.attach();

    transport.disconnect();
    await pump.done();

    const event = await inbox.next(1);
    expect(event.type).toBe("closed");
    expect(event.type === "closed" && event.reason).toBeInstanceOf(TransportError);
    expect(pump.closed).toBe(true);
    expect(pump.attach().isClosed).toBe(true);
  });
});
