import sharp from "sharp";
import type { AtlasMetadata, AtlasPage, AtlasSettings, SpriteImage } from "../contracts";
import { ProcessorError, errorMessage } from "../lib/errors";
import { PNG_OUTPUT_OPTIONS } from "../processors/image";
import type { ProcessorSet } from "../processors/types";
import { packRects } from "./packer";
import { trimSprite, type TrimmedSprite } from "./trim";

export interface SpriteSource {
  id: string;
  bytes: Buffer;
}

export interface AtlasBuildResult {
  image: Buffer;
  metadata: AtlasMetadata;
  page: AtlasPage;
}

/** Decode any sharp-readable image into raw RGBA. */
export async function decodeSprite(source: SpriteSource, trim: boolean): Promise<SpriteImage> {
  try {
    const { data, info } = await sharp(source.bytes)
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    return { id: source.id, data, width: info.width, height: info.height, trim };
  } catch (err) {
    throw new ProcessorError("decode", `sprite "${source.id}": ${errorMessage(err)}`);
  }
}

/** Draw every packed rect onto a transparent page and encode it as PNG. */
export async function composePage(page: AtlasPage, sprites: Map<string, TrimmedSprite>): Promise<Buffer> {
  const layers: sharp.OverlayOptions[] = page.rects.map((rect) => {
    const sprite = sprites.get(rect.id);
    if (sprite === undefined) {
      throw new ProcessorError("atlas", `no pixels for packed sprite "${rect.id}"`);
    }
    return {
      input: sprite.data,
      raw: { width: sprite.w, height: sprite.h, channels: 4 },
      left: rect.x,
      top: rect.y,
    };
  });

  return sharp({
    create: {
      width: page.width,
      height: page.height,
      channels: 4,
      background: { r: 0, g: 0, b: 0, alpha: 0 },
    },
  })
    .composite(layers)
    .png(PNG_OUTPUT_OPTIONS)
    .toBuffer();
}

/** Runtime metadata; sprites sorted by id. */
export function toMetadata(page: AtlasPage, imageName: string): AtlasMetadata {
  const sprites = [...page.rects]
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .map((r) => ({
      id: r.id,
      x: r.x,
      y: r.y,
      width: r.w,
      height: r.h,
      trimmed: {
        offsetX: r.trimOffset.x,
        offsetY: r.trimOffset.y,
        originalWidth: r.originalSize.w,
        originalHeight: r.originalSize.h,
      },
    }));
  return { image: imageName, width: page.width, height: page.height, sprites };
}

/**
 * Decode, trim, pack and compose a group of sprites, then hand the page to
 * the image processor for its final encoding. Atlas pages are always
 * encoded losslessly so sprite edges survive.
 */
export async function buildAtlas(
  sources: SpriteSource[],
  settings: AtlasSettings,
  imageName: string,
  processors: ProcessorSet
): Promise<AtlasBuildResult> {
  if (sources.length === 0) {
    throw new ProcessorError("atlas", "atlas group has no sprites");
  }

  const decoded = await Promise.all(sources.map((s) => decodeSprite(s, settings.trim)));
  const trimmed = decoded.map(trimSprite);
  const page = packRects(trimmed, settings.maxWidth, settings.maxHeight, settings.padding);

  const png = await composePage(page, new Map(trimmed.map((t) => [t.id, t])));
  const image = await processors.image.transform(png, {
    op: "recompress",
    format: settings.format,
    quality: settings.quality,
    lossless: true,
  });
  return { image, metadata: toMetadata(page, imageName), page };
}
