import { describe, it, expect } from "vitest";
import type { SpriteImage } from "../../src/contracts";
import { isValidPage, pack, packRects } from "../../src/atlas/packer";
import { alphaBounds, trimSprite } from "../../src/atlas/trim";
import { AtlasOverflowError, ProcessorError } from "../../src/lib/errors";

/** Raw RGBA sprite; pixels inside `opaque` get alpha 255, the rest 0. */
function sprite(
  id: string,
  width: number,
  height: number,
  options: { trim?: boolean; opaque?: { x: number; y: number; w: number; h: number } } = {}
): SpriteImage {
  const data = Buffer.alloc(width * height * 4);
  const block = options.opaque ?? { x: 0, y: 0, w: width, h: height };
  for (let y = block.y; y < block.y + block.h; y++) {
    for (let x = block.x; x < block.x + block.w; x++) {
      data[(y * width + x) * 4 + 3] = 255;
    }
  }
  return { id, data, width, height, trim: options.trim ?? false };
}

function placements(sprites: SpriteImage[], maxWidth: number, maxHeight: number, padding: number) {
  const page = pack({ sprites }, maxWidth, maxHeight, padding);
  return {
    page,
    at: Object.fromEntries(page.rects.map((r) => [r.id, { x: r.x, y: r.y }])),
  };
}

describe("pack", () => {
  it("places tallest first along one shelf with padding", () => {
    const { page, at } = placements(
      [sprite("small", 16, 16), sprite("large", 64, 64), sprite("medium", 32, 32)],
      2048,
      2048,
      2
    );
    expect(at).toEqual({
      large: { x: 0, y: 0 },
      medium: { x: 66, y: 0 },
      small: { x: 100, y: 0 },
    });
    expect(page.width).toBe(116);
    expect(page.height).toBe(64);
    expect(isValidPage(page, 2)).toBe(true);
  });

  it("packs 32, 16 and 64 pixel squares onto a 128x128 page", () => {
    const { page, at } = placements([sprite("a", 32, 32), sprite("b", 16, 16), sprite("c", 64, 64)], 128, 128, 2);
    expect(at).toEqual({
      c: { x: 0, y: 0 },
      a: { x: 66, y: 0 },
      b: { x: 100, y: 0 },
    });
    expect({ width: page.width, height: page.height }).toEqual({ width: 116, height: 64 });
    expect(isValidPage(page, 2)).toBe(true);
  });

  it("opens a new shelf and back-fills earlier shelves with room", () => {
    const { page, at } = placements(
      [sprite("large", 64, 64), sprite("medium", 32, 32), sprite("small", 16, 16)],
      70,
      2048,
      2
    );
    expect(at).toEqual({
      large: { x: 0, y: 0 },
      medium: { x: 0, y: 66 },
      small: { x: 34, y: 66 },
    });
    expect(page.width).toBe(64);
    expect(page.height).toBe(98);
    expect(isValidPage(page, 2)).toBe(true);
  });

  it("breaks ties by id", () => {
    const { at } = placements([sprite("b", 16, 16), sprite("a", 16, 16)], 2048, 2048, 2);
    expect(at).toEqual({ a: { x: 0, y: 0 }, b: { x: 18, y: 0 } });
  });

  it("is independent of input order", () => {
    const sprites = [sprite("a", 10, 20), sprite("b", 30, 5), sprite("c", 12, 20), sprite("d", 7, 7)];
    const forward = pack({ sprites }, 40, 100, 1);
    const backward = pack({ sprites: [...sprites].reverse() }, 40, 100, 1);
    expect(backward).toEqual(forward);
  });

  it("reports the size that would have been needed on overflow", () => {
    const sprites = [sprite("large", 64, 64), sprite("medium", 32, 32), sprite("small", 16, 16)];
    let caught: unknown;
    try {
      pack({ sprites }, 100, 64, 2);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(AtlasOverflowError);
    expect(caught).toMatchObject({ requiredWidth: 98, requiredHeight: 82, maxWidth: 100, maxHeight: 64 });
    expect(caught instanceof Error ? caught.message : "").toBe(
      "Sprites do not fit a 100x64 page; required at least 98x82"
    );
  });

  it("overflows when one sprite is wider than the page", () => {
    expect(() => pack({ sprites: [sprite("wide", 50, 4)] }, 32, 32, 0)).toThrow(AtlasOverflowError);
  });

  it("rejects duplicate ids", () => {
    expect(() => pack({ sprites: [sprite("a", 4, 4), sprite("a", 8, 8)] }, 64, 64, 0)).toThrow(ProcessorError);
  });

  it("packs trimmed sizes and keeps the original frame", () => {
    const page = pack(
      { sprites: [sprite("t", 10, 8, { trim: true, opaque: { x: 2, y: 1, w: 4, h: 3 } })] },
      64,
      64,
      0
    );
    expect(page.rects).toEqual([
      { id: "t", x: 0, y: 0, w: 4, h: 3, trimOffset: { x: 2, y: 1 }, originalSize: { w: 10, h: 8 } },
    ]);
    expect(page.width).toBe(4);
    expect(page.height).toBe(3);
  });
});

describe("trimSprite", () => {
  it("leaves a sprite alone when trim is off", () => {
    const t = trimSprite(sprite("s", 10, 8, { opaque: { x: 2, y: 1, w: 4, h: 3 } }));
    expect([t.w, t.h]).toEqual([10, 8]);
    expect(t.trimOffset).toEqual({ x: 0, y: 0 });
  });

  it("keeps the full frame of a fully transparent sprite", () => {
    const t = trimSprite(sprite("s", 6, 6, { trim: true, opaque: { x: 0, y: 0, w: 0, h: 0 } }));
    expect([t.w, t.h]).toEqual([6, 6]);
  });

  it("crops pixel data to the alpha bounds", () => {
    const t = trimSprite(sprite("s", 10, 8, { trim: true, opaque: { x: 2, y: 1, w: 4, h: 3 } }));
    expect(t.data.length).toBe(4 * 3 * 4);
    expect(alphaBounds(t.data, t.w, t.h)).toEqual({ left: 0, top: 0, width: 4, height: 3 });
  });
});

/** Small deterministic PRNG so failures reproduce. */
function mulberry32(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe("pack over random inputs", () => {
  it("either returns a valid page or reports the size it would need", () => {
    const random = mulberry32(20261019);
    const between = (lo: number, hi: number): number => lo + Math.floor(random() * (hi - lo + 1));
    let packed = 0;
    let overflowed = 0;

    for (let trial = 0; trial < 300; trial++) {
      const maxWidth = between(24, 128);
      const maxHeight = between(24, 128);
      const padding = between(0, 3);
      const sprites = Array.from({ length: between(1, 12) }, (_, i) =>
        sprite(`s${i}`, between(1, 48), between(1, 48))
      );

      try {
        const page = pack({ sprites }, maxWidth, maxHeight, padding);
        packed++;
        expect(isValidPage(page, padding)).toBe(true);
        expect(page.width).toBeLessThanOrEqual(maxWidth);
        expect(page.height).toBeLessThanOrEqual(maxHeight);
        expect(page.rects.map((r) => r.id).sort()).toEqual(sprites.map((s) => s.id).sort());
      } catch (err) {
        if (!(err instanceof AtlasOverflowError)) throw err;
        overflowed++;
        expect(err.requiredWidth > maxWidth || err.requiredHeight > maxHeight).toBe(true);
      }
    }

    expect(packed).toBeGreaterThan(0);
    expect(overflowed).toBeGreaterThan(0);
  });
});
