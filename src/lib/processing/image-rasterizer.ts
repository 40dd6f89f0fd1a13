import sharp from "sharp";
import type { RasterConfig } from "../protocol/interfaces/config.ts";
import { DEFAULT_RASTER_CONFIG } from "../protocol/interfaces/defaults.ts";
import { ImageProcessingError } from "../utils/errors.ts";

/**
 * 1-bit raster ready to be printed, rows top to bottom
 */
export interface RasterImage {
  width: number;
  height: number;
  bytesPerRow: number;
  /** MSB-first bits, 1 = black dot */
  data: Buffer;
}

/**
 * Pack 8-bit greyscale pixels into 1-bit rows
 *
 * Pixels darker than the threshold become black (1). Each row is padded to
 * a whole byte.
 *
 * @param pixels - One byte per pixel, row-major
 */
export function packBits(
  pixels: Uint8Array,
  width: number,
  height: number,
  threshold: number = DEFAULT_RASTER_CONFIG.threshold,
  invert: boolean = false,
): RasterImage {
  if (pixels.length < width * height) {
    throw new ImageProcessingError(
      `Expected ${width * height} pixels, got ${pixels.length}`,
    );
  }

  const bytesPerRow = Math.ceil(width / 8);
  const data = Buffer.alloc(bytesPerRow * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const value = pixels[y * width + x] ?? 255;
      const black = value < threshold !== invert;
      if (black) {
        const offset = y * bytesPerRow + (x >> 3);
        data[offset] = (data[offset] ?? 0) | (0x80 >> (x & 7));
      }
    }
  }

  return { width, height, bytesPerRow, data };
}

/**
 * Turns images into printer rasters using Sharp.
 * Scales to the print head width, keeps the aspect ratio and thresholds
 * without dithering.
 */
export class ImageRasterizer {
  constructor(private config: RasterConfig = DEFAULT_RASTER_CONFIG) {}

  /**
   * Rasterize an image file or encoded image buffer
   */
  public async rasterize(input: string | Buffer): Promise<RasterImage> {
    const { printWidth, threshold, invert } = this.config;

    let raw: { data: Buffer; info: sharp.OutputInfo };
    try {
      raw = await sharp(input)
        .flatten({ background: "#ffffff" })
        .resize({ width: printWidth })
        .greyscale()
        .raw()
        .toBuffer({ resolveWithObject: true });
    } catch (error) {
      const source = typeof input === "string" ? input : "buffer";
      throw new ImageProcessingError(`Failed to rasterize ${source}: ${error}`);
    }

    const { width, height, channels } = raw.info;
    const pixels =
      channels === 1
        ? raw.data
        : Uint8Array.from({ length: width * height }, (_, i) => raw.data[i * channels] ?? 255);

    return packBits(pixels, width, height, threshold, invert);
  }

  /**
   * Generate a checkerboard test pattern
   * @param height Defaults to the print width (a square label)
   * @param squares Number of squares across the width
   */
  public generateCheckerboard(
    height: number = this.config.printWidth,
    squares: number = this.config.checkerboardSquares,
  ): RasterImage {
    const width = this.config.printWidth;
    const squareSize = Math.max(1, Math.floor(width / squares));
    const pixels = new Uint8Array(width * height);

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const dark = (Math.floor(x / squareSize) + Math.floor(y / squareSize)) % 2 === 0;
        pixels[y * width + x] = dark ? 0 : 255;
      }
    }

    return packBits(pixels, width, height, 128, false);
  }
}
