import type { DriverOptions, RasterConfig } from "../protocol/interfaces/config.ts";
import { DEFAULT_RASTER_CONFIG } from "../protocol/interfaces/defaults.ts";
import type { TransportPort } from "../transport/transport-port.ts";
import { CapturingTransport } from "../transport/capturing-transport.ts";
import { ImageRasterizer, type RasterImage } from "../processing/image-rasterizer.ts";
import { PrinterDriver, type PrintOptions, type PrintResult } from "./printer-driver.ts";
import { ImageProcessingError, toPrintError } from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";

/**
 * A transport that manages its own link, such as BleTransport
 */
export interface ConnectableTransport extends TransportPort {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
}

export interface LabelPrinterOptions {
  rasterConfig?: RasterConfig;
  driverOptions?: Partial<DriverOptions>;
  /** Record every frame for later inspection */
  capture?: boolean;
}

export interface LabelPrintRequest extends PrintOptions {
  /** Image file to print */
  imagePath?: string;
  /** Encoded image (PNG, JPEG, ...) to print */
  imageData?: Buffer;
  /** Print a checkerboard instead of an image */
  testPattern?: boolean;
}

/**
 * Main printer class: connect, rasterize, print, disconnect
 */
export class LabelPrinter {
  private rasterizer: ImageRasterizer;
  private capture: CapturingTransport | null;
  private driver: PrinterDriver;

  constructor(
    private transport: ConnectableTransport,
    options: LabelPrinterOptions = {},
  ) {
    this.rasterizer = new ImageRasterizer(options.rasterConfig ?? DEFAULT_RASTER_CONFIG);
    this.capture = options.capture ? new CapturingTransport(transport) : null;
    this.driver = new PrinterDriver(this.capture ?? transport, options.driverOptions);
  }

  /**
   * Connect to the device
   * @throws {DeviceNotFoundError} If the printer is not found
   * @throws {ConnectionError} If the link cannot be set up
   */
  public async connect(): Promise<void> {
    await this.transport.connect();
  }

  public async disconnect(): Promise<void> {
    await this.transport.disconnect();
  }

  /**
   * Captured traffic, when capture is enabled
   */
  public getCapture(): CapturingTransport | null {
    return this.capture;
  }

  /**
   * Turn the request into a 1-bit raster
   * @throws {ImageProcessingError} If no image was given or it cannot be decoded
   */
  public async prepare(request: LabelPrintRequest): Promise<RasterImage> {
    if (request.testPattern) {
      return this.rasterizer.generateCheckerboard();
    }
    if (request.imageData) {
      return this.rasterizer.rasterize(request.imageData);
    }
    if (request.imagePath) {
      return this.rasterizer.rasterize(request.imagePath);
    }
    throw new ImageProcessingError("No image provided");
  }

  /**
   * Rasterize and print one label on the connected device
   */
  public async print(request: LabelPrintRequest): Promise<PrintResult> {
    let raster: RasterImage;
    try {
      raster = await this.prepare(request);
    } catch (error) {
      const cause = toPrintError(error);
      logger.error(cause.message);
      return { ok: false, error: cause };
    }

    logger.info(
      `Raster ready: ${raster.width}x${raster.height} dots, ${raster.data.length} bytes`,
    );

    return this.driver.printImage(raster.data, {
      signal: request.signal,
      copies: request.copies,
      onTransition: request.onTransition,
      onProgress: request.onProgress,
    });
  }
}
