import type { SpriteImage } from "../contracts";

const RGBA = 4;

export interface AlphaBounds {
  left: number;
  top: number;
  width: number;
  height: number;
}

/** A sprite after trimming, with what is needed to restore its original frame. */
export interface TrimmedSprite {
  id: string;
  data: Buffer;
  w: number;
  h: number;
  trimOffset: { x: number; y: number };
  originalSize: { w: number; h: number };
}

/**
 * Tightest box around pixels with alpha > 0, or null when every pixel is
 * fully transparent. `data` is raw RGBA.
 */
export function alphaBounds(data: Buffer, width: number, height: number): AlphaBounds | null {
  let minX = width;
  let minY = height;
  let maxX = -1;
  let maxY = -1;

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      if (data[(y * width + x) * RGBA + 3] === 0) continue;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }

  if (maxX < 0) return null;
  return { left: minX, top: minY, width: maxX - minX + 1, height: maxY - minY + 1 };
}

/** Copy a sub-rectangle out of a raw RGBA buffer. */
export function cropRaw(data: Buffer, width: number, bounds: AlphaBounds): Buffer {
  const rowBytes = bounds.width * RGBA;
  const out = Buffer.alloc(rowBytes * bounds.height);
  for (let row = 0; row < bounds.height; row += 1) {
    const start = ((bounds.top + row) * width + bounds.left) * RGBA;
    data.copy(out, row * rowBytes, start, start + rowBytes);
  }
  return out;
}

/**
 * Trim a sprite to its alpha bounds when requested. Fully transparent
 * sprites keep their full frame.
 */
export function trimSprite(sprite: SpriteImage): TrimmedSprite {
  const untrimmed: TrimmedSprite = {
    id: sprite.id,
    data: sprite.data,
    w: sprite.width,
    h: sprite.height,
    trimOffset: { x: 0, y: 0 },
    originalSize: { w: sprite.width, h: sprite.height },
  };
  if (!sprite.trim) return untrimmed;

  const bounds = alphaBounds(sprite.data, sprite.width, sprite.height);
  if (bounds === null) return untrimmed;
  if (bounds.width === sprite.width && bounds.height === sprite.height) return untrimmed;

  return {
    id: sprite.id,
    data: cropRaw(sprite.data, sprite.width, bounds),
    w: bounds.width,
    h: bounds.height,
    trimOffset: { x: bounds.left, y: bounds.top },
    originalSize: { w: sprite.width, h: sprite.height },
  };
}
