export {
  ImageRasterizer,
  packBits,
  type RasterImage,
} from "./image-rasterizer.ts";
