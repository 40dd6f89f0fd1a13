import { statSync } from "node:fs";
import { Command } from "commander";
import { LogLevel, logger } from "../lib/utils/logger.ts";
import { DEFAULT_DRIVER_OPTIONS } from "../lib/protocol/interfaces/defaults.ts";
import { parseInteger, parseSeconds } from "./options.ts";
import type { PrintCommandOptions } from "./types.ts";

export function setupCLI() {
  const program = new Command();

  program
    .name("lxprintctl")
    .description("CLI tool for printing labels on LX-D01 thermal printers")
    .version("0.1.0")
    .option("-v, --verbose", "Show detailed logs including frame data", false);

  program
    .command("print [image]")
    .description("Print an image (or a test pattern) on an LX-D01 printer")
    .option("--image <path>", "Path to image file (alternative to positional argument)")
    .option("--address <address>", "BLE device address (optional)")
    .option("--test", "Print a checkerboard test pattern", false)
    .option(
      "--copies <n>",
      "Copies / job id sent with the start frame",
      parseInteger(1, 0xffff),
      DEFAULT_DRIVER_OPTIONS.copies,
    )
    .option(
      "--window <n>",
      "Maximum data frames awaiting transport confirmation",
      parseInteger(1),
      DEFAULT_DRIVER_OPTIONS.flowControlWindow,
    )
    .option("--skip-status", "Do not wait for the device status frame", false)
    .option(
      "--completion-timeout <seconds>",
      "How long to wait for the printer to report completion",
      parseSeconds,
      DEFAULT_DRIVER_OPTIONS.completionWaitTimeout,
    )
    .option("--capture <file>", "Write a hex dump of all frames to a file")
    .action(async (imageArg: string | undefined, options: PrintCommandOptions) => {
      const { verbose } = program.opts<{ verbose: boolean }>();

      logger.setLevel(verbose ? LogLevel.DEBUG : LogLevel.INFO);

      const imagePath = imageArg || options.image;
      if (imagePath) {
        options.image = imagePath;
      }

      if (!options.test && !options.image) {
        console.error("Error: Either provide an image path or use --test flag");
        console.error(
          "Usage: lxprintctl print <image>  or  lxprintctl print --image <path>  or  lxprintctl print --test",
        );
        process.exit(1);
      }

      if (options.image && !options.test) {
        try {
          if (!statSync(options.image).isFile()) {
            console.error(`Error: Path is not a file: ${options.image}`);
            process.exit(1);
          }
        } catch (error) {
          console.error(`Error: Cannot access path: ${options.image} (${error})`);
          process.exit(1);
        }
      }

      // ink owns the terminal from here on; log entries reach it through listeners
      logger.setConsoleEnabled(false);

      const { App } = await import("../components/App.tsx");
      const { render } = await import("ink");
      render(<App options={options} verbose={verbose} />);
    });

  return program;
}
