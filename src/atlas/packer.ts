import type { AtlasPage, AtlasRequest, PackedRect } from "../contracts";
import { AtlasOverflowError, ProcessorError } from "../lib/errors";
import { trimSprite, type TrimmedSprite } from "./trim";

interface Shelf {
  y: number;
  height: number;
  cursorX: number;
}

type ShelfResult =
  | { ok: true; rects: PackedRect[]; width: number; height: number }
  | { ok: false };

/** Descending height, then descending width, then id. */
export function compareForPacking(
  a: { id: string; w: number; h: number },
  b: { id: string; w: number; h: number }
): number {
  if (a.h !== b.h) return b.h - a.h;
  if (a.w !== b.w) return b.w - a.w;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * Shelf packing over pre-sorted sprites. A sprite goes on the first shelf
 * with room for it; otherwise a new shelf opens below the last one.
 * Neighbours are `padding` pixels apart on both axes.
 */
function shelfPack(
  sprites: TrimmedSprite[],
  maxWidth: number,
  maxHeight: number,
  padding: number
): ShelfResult {
  const shelves: Shelf[] = [];
  const rects: PackedRect[] = [];
  let width = 0;
  let height = 0;

  for (const sprite of sprites) {
    if (sprite.w > maxWidth) return { ok: false };

    let shelf = shelves.find((s) => s.cursorX + sprite.w <= maxWidth);
    if (shelf === undefined) {
      const last = shelves[shelves.length - 1];
      const y = last === undefined ? 0 : last.y + last.height + padding;
      if (y + sprite.h > maxHeight) return { ok: false };
      shelf = { y, height: sprite.h, cursorX: 0 };
      shelves.push(shelf);
    }

    rects.push({
      id: sprite.id,
      x: shelf.cursorX,
      y: shelf.y,
      w: sprite.w,
      h: sprite.h,
      trimOffset: { ...sprite.trimOffset },
      originalSize: { ...sprite.originalSize },
    });
    shelf.cursorX += sprite.w + padding;
    width = Math.max(width, shelf.cursorX - padding);
    height = Math.max(height, shelf.y + sprite.h);
  }

  return { ok: true, rects, width, height };
}

/**
 * Pack already-trimmed sprites into a single page no larger than
 * maxWidth x maxHeight. The page is sized to the placed content.
 *
 * Throws AtlasOverflowError with the smallest page this packer would need
 * when the sprites do not fit.
 */
export function packRects(
  sprites: TrimmedSprite[],
  maxWidth: number,
  maxHeight: number,
  padding: number
): AtlasPage {
  const seen = new Set<string>();
  for (const sprite of sprites) {
    if (seen.has(sprite.id)) {
      throw new ProcessorError("atlas", `duplicate sprite id "${sprite.id}"`);
    }
    seen.add(sprite.id);
  }

  const sorted = [...sprites].sort(compareForPacking);
  const result = shelfPack(sorted, maxWidth, maxHeight, padding);
  if (result.ok) {
    return { width: result.width, height: result.height, rects: result.rects };
  }

  // Same layout with the height bound lifted (and the width bound widened
  // to the widest sprite) gives the size that would have been needed.
  const widest = sorted.reduce((m, s) => Math.max(m, s.w), 0);
  const boundWidth = Math.max(maxWidth, widest);
  const unbounded = shelfPack(sorted, boundWidth, Number.POSITIVE_INFINITY, padding);
  throw new AtlasOverflowError(
    unbounded.ok ? unbounded.width : boundWidth,
    unbounded.ok ? unbounded.height : maxHeight,
    maxWidth,
    maxHeight
  );
}

/** Trim every sprite that asks for it, then pack. */
export function pack(
  request: AtlasRequest,
  maxWidth: number,
  maxHeight: number,
  padding: number
): AtlasPage {
  return packRects(request.sprites.map(trimSprite), maxWidth, maxHeight, padding);
}

/** True when no two padded rects intersect and every rect is inside the page. */
export function isValidPage(page: AtlasPage, padding: number): boolean {
  for (const r of page.rects) {
    if (r.x < 0 || r.y < 0 || r.x + r.w > page.width || r.y + r.h > page.height) {
      return false;
    }
  }
  for (let i = 0; i < page.rects.length; i++) {
    for (let j = i + 1; j < page.rects.length; j++) {
      const a = page.rects[i];
      const b = page.rects[j];
      const apart =
        a.x + a.w + padding <= b.x ||
        b.x + b.w + padding <= a.x ||
        a.y + a.h + padding <= b.y ||
        b.y + b.h + padding <= a.y;
      if (!apart) return false;
    }
  }
  return true;
}
