import { describe, test, expect, beforeAll } from "vitest";
import { LabelPrinter, type ConnectableTransport } from "./label-printer.ts";
import { DEFAULT_RASTER_CONFIG } from "../protocol/interfaces/defaults.ts";
import { ImageProcessingError } from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";
import { FakePrinterTransport } from "../../__tests__/utils/test-helpers.ts";

class ConnectableFake extends FakePrinterTransport implements ConnectableTransport {
  connects = 0;

  async connect(): Promise<void> {
    this.connects++;
  }

  async disconnect(): Promise<void> {
    super.disconnect();
  }
}

const driverOptions = {
  skipStatusWait: true,
  completionWaitTimeout: 0.5,
  ackDrainGrace: 0.05,
  writeTimeout: 0.5,
};

describe("LabelPrinter", () => {
  beforeAll(() => {
    logger.setConsoleEnabled(false);
  });

  test("prints the test pattern as 16-byte blocks", async () => {
    const transport = new ConnectableFake({ complete: true });
    const printer = new LabelPrinter(transport, {
      rasterConfig: { ...DEFAULT_RASTER_CONFIG, printWidth: 16 },
      driverOptions,
    });

    await printer.connect();
    const result = await printer.print({ testPattern: true });
    await printer.disconnect();

    // 16x16 dots in 2-dot squares = 32 bytes = 2 blocks
    expect(result).toEqual({ ok: true, blockCount: 2, status: null, repeatedCompletions: 0 });
    expect(transport.connects).toBe(1);
    expect(transport.dataFrames[0]?.subarray(4)).toEqual(
      Buffer.from([
        0xcc, 0xcc, 0xcc, 0xcc, 0x33, 0x33, 0x33, 0x33,
        0xcc, 0xcc, 0xcc, 0xcc, 0x33, 0x33, 0x33, 0x33,
      ]),
    );
  });

  test("missing image is reported without sending", async () => {
    const transport = new ConnectableFake();
    const printer = new LabelPrinter(transport, { driverOptions });

    const result = await printer.print({});

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error).toBeInstanceOf(ImageProcessingError);
    expect(transport.written).toHaveLength(0);
  });

  test("capture records both directions", async () => {
    const transport = new ConnectableFake({ complete: true });
    const printer = new LabelPrinter(transport, {
      rasterConfig: { ...DEFAULT_RASTER_CONFIG, printWidth: 8 },
      driverOptions,
      capture: true,
    });

    // 8x8 dots = 8 bytes = 1 block
    await printer.print({ testPattern: true });

    const directions = printer.getCapture()?.getFrames().map((frame) => frame.direction);
    expect(directions).toEqual(["send", "send", "recv", "send"]);
  });

  test("capture is off by default", () => {
    expect(new LabelPrinter(new ConnectableFake()).getCapture()).toBeNull();
  });
});
