import { useState, useEffect } from "react";
import { writeFile } from "node:fs/promises";
import { BleTransport } from "../lib/ble/ble-transport.ts";
import { LabelPrinter } from "../lib/core/label-printer.ts";
import { logger, LogEventType, LogLevel } from "../lib/utils/logger.ts";
import { PrintError } from "../lib/utils/errors.ts";
import type { ConnectionStep } from "../components/index.ts";
import { advanceJobSteps, updateStepStatus } from "../utils/app-utils.ts";
import type { PrintCommandOptions } from "../cli/types.ts";

const LOG_TAIL = 6;

export type PrintStatus = "connecting" | "printing" | "success" | "error";

export function usePrint(options: PrintCommandOptions, verbose: boolean) {
  const [status, setStatus] = useState<PrintStatus>("connecting");
  const [message, setMessage] = useState<string>("Initializing...");
  const [progress, setProgress] = useState<number>(0);
  const [logTail, setLogTail] = useState<string[]>([]);

  const [jobSteps, setJobSteps] = useState<ConnectionStep[]>([
    { id: "status", label: "Waiting for device status", status: "pending" },
    { id: "start", label: "Starting job", status: "pending" },
    { id: "data", label: "Sending image data", status: "pending" },
    { id: "complete", label: "Waiting for the printer", status: "pending" },
    { id: "ack", label: "Acknowledging completion", status: "pending" },
  ]);

  const [connectionSteps, setConnectionSteps] = useState<ConnectionStep[]>([
    { id: "scan", label: "Scanning for device", status: "pending" },
    { id: "connect", label: "Connecting to device", status: "pending" },
    { id: "discover", label: "Discovering characteristics", status: "pending" },
  ]);

  useEffect(() => {
    const unsubscribe = logger.onLog((entry) => {
      if (verbose && entry.level >= LogLevel.INFO) {
        setLogTail((prev) => [...prev, entry.message].slice(-LOG_TAIL));
      }

      switch (entry.eventType) {
        case LogEventType.SCAN_START:
          setConnectionSteps((prev) =>
            updateStepStatus(prev, "scan", "active"),
          );
          break;

        case LogEventType.DEVICE_FOUND:
          setConnectionSteps((prev) =>
            updateStepStatus(prev, "scan", "complete", "connect"),
          );
          break;

        case LogEventType.CONNECT_START:
          setConnectionSteps((prev) =>
            updateStepStatus(prev, "connect", "active"),
          );
          break;

        case LogEventType.CONNECTED:
          setConnectionSteps((prev) =>
            updateStepStatus(prev, "connect", "complete", "discover"),
          );
          break;

        case LogEventType.DISCOVER_CHAR:
          setConnectionSteps((prev) =>
            updateStepStatus(prev, "discover", "complete"),
          );
          break;

        case LogEventType.STATUS_RECEIVED:
          setMessage("Printer status received");
          break;
      }
    });

    return unsubscribe;
  }, [verbose]);

  useEffect(() => {
    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort();
    process.once("SIGINT", onInterrupt);

    const runPrint = async (): Promise<void> => {
      const printer = new LabelPrinter(new BleTransport(options.address ?? null), {
        capture: options.capture !== undefined,
        driverOptions: {
          copies: options.copies,
          flowControlWindow: options.window,
          skipStatusWait: options.skipStatus,
          completionWaitTimeout: options.completionTimeout,
        },
      });

      try {
        setStatus("connecting");
        setMessage("Connecting to LX-D01 printer...");
        await printer.connect();

        setStatus("printing");
        setMessage(options.test ? "Printing test pattern..." : "Printing image...");

        const result = await printer.print({
          imagePath: options.image,
          testPattern: options.test,
          signal: controller.signal,
          onTransition: (to) => setJobSteps((prev) => advanceJobSteps(prev, to)),
          onProgress: ({ blocksSent, blockCount }) =>
            setProgress((blocksSent / blockCount) * 100),
        });

        if (result.ok) {
          setStatus("success");
          setMessage(`Printed ${result.blockCount} blocks successfully!`);
        } else {
          setStatus("error");
          setMessage(`Print failed: ${result.error.message}`);
        }
      } catch (error) {
        setStatus("error");
        if (error instanceof PrintError) {
          setMessage(`Print failed: ${error.message}`);
        } else {
          setMessage(`Print failed: ${error}`);
        }
      } finally {
        process.removeListener("SIGINT", onInterrupt);
        await printer.disconnect();

        const capture = printer.getCapture();
        if (capture && options.capture) {
          await writeFile(options.capture, `${capture.format()}\n`).catch(
            (error: unknown) =>
              logger.error(`Failed to write capture to ${options.capture}: ${error}`),
          );
        }
      }
    };

    runPrint().catch((error: unknown) => {
      setStatus("error");
      setMessage(`Print failed: ${error}`);
    });

    return () => {
      process.removeListener("SIGINT", onInterrupt);
      controller.abort();
    };
  }, [options]);

  return {
    status,
    message,
    progress,
    logTail,
    jobSteps,
    connectionSteps,
  };
}
