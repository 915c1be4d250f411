import sharp from "sharp";
import type { ImageFormat, Transform } from "../contracts";
import { alphaBounds } from "../atlas/trim";
import { assertNever } from "../lib/assertNever";
import { ProcessorError } from "../lib/errors";
import type { Processor } from "./types";

// Explicit PNG output settings for deterministic output across environments.
export const PNG_OUTPUT_OPTIONS: sharp.PngOptions = {
  compressionLevel: 9,
  adaptiveFiltering: false,
  palette: false,
};

// Between steps only determinism matters, not size.
const INTERMEDIATE_PNG_OPTIONS: sharp.PngOptions = {
  compressionLevel: 1,
  adaptiveFiltering: false,
  palette: false,
};

/** Largest power of two that is <= n (n >= 1). */
export function floorPowerOfTwo(n: number): number {
  let p = 1;
  while (p * 2 <= n) p *= 2;
  return p;
}

async function dimensions(input: Buffer): Promise<{ width: number; height: number }> {
  const meta = await sharp(input).metadata();
  if (meta.width === undefined || meta.height === undefined) {
    throw new ProcessorError("decode", "image has no dimensions");
  }
  return { width: meta.width, height: meta.height };
}

/**
 * Encode a sharp pipeline to the requested format. `lossless` keeps PNG
 * full-colour and WebP lossless; otherwise PNG is palette-quantized at
 * `quality`.
 */
export async function encodeImage(
  image: sharp.Sharp,
  format: ImageFormat,
  quality: number,
  lossless: boolean
): Promise<Buffer> {
  switch (format) {
    case "png":
      return lossless
        ? image.png(PNG_OUTPUT_OPTIONS).toBuffer()
        : image.png({ ...PNG_OUTPUT_OPTIONS, palette: true, quality }).toBuffer();
    case "jpeg":
      return image.flatten({ background: "#000000" }).jpeg({ quality, mozjpeg: false }).toBuffer();
    case "webp":
      return image.webp({ quality, lossless }).toBuffer();
    case "ktx2":
      throw new ProcessorError(
        "recompress",
        "KTX2 output needs an external Basis Universal encoder, which is not installed"
      );
    default:
      return assertNever(format, "image format");
  }
}

async function resize(input: Buffer, maxSize: number): Promise<Buffer> {
  const { width, height } = await dimensions(input);
  if (width <= maxSize && height <= maxSize) return input;
  return sharp(input)
    .resize({ width: maxSize, height: maxSize, fit: "inside", withoutEnlargement: true })
    .png(INTERMEDIATE_PNG_OPTIONS)
    .toBuffer();
}

async function trim(input: Buffer): Promise<Buffer> {
  const { data, info } = await sharp(input).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  const bounds = alphaBounds(data, info.width, info.height);
  if (bounds === null) return input;
  if (bounds.width === info.width && bounds.height === info.height) return input;
  return sharp(input).extract(bounds).png(INTERMEDIATE_PNG_OPTIONS).toBuffer();
}

/** Shrink each side to a power of two so the GPU can build a full mip chain. */
async function conformForMips(input: Buffer): Promise<Buffer> {
  const { width, height } = await dimensions(input);
  const w = floorPowerOfTwo(width);
  const h = floorPowerOfTwo(height);
  if (w === width && h === height) return input;
  return sharp(input).resize({ width: w, height: h, fit: "fill" }).png(INTERMEDIATE_PNG_OPTIONS).toBuffer();
}

export function createImageProcessor(): Processor {
  return {
    kind: "image",
    async transform(input: Buffer, step: Transform): Promise<Buffer> {
      switch (step.op) {
        case "resize":
          return resize(input, step.maxSize);
        case "trim":
          return trim(input);
        case "generateMip":
          return conformForMips(input);
        case "recompress":
          return encodeImage(sharp(input), step.format, step.quality, step.lossless);
        case "simplify":
        case "bufferCompress":
        case "normalize":
        case "resample":
        case "encode":
          throw new ProcessorError(step.op, "not an image operation");
        default:
          return assertNever(step, "transform");
      }
    },
  };
}

// --- Info ---

export interface ImageInfo {
  format: string;
  width: number;
  height: number;
  channels: number;
  hasAlpha: boolean;
}

export async function imageInfo(input: Buffer): Promise<ImageInfo> {
  const meta = await sharp(input).metadata();
  return {
    format: meta.format ?? "unknown",
    width: meta.width ?? 0,
    height: meta.height ?? 0,
    channels: meta.channels ?? 0,
    hasAlpha: meta.hasAlpha ?? false,
  };
}
