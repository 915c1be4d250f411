import { describe, it, expect } from "vitest";
import sharp from "sharp";
import type { AtlasSettings } from "../../src/contracts";
import { buildAtlas } from "../../src/atlas/compose";
import { ProcessorError } from "../../src/lib/errors";
import { createDefaultProcessors } from "../../src/processors";
import { createSpritePng } from "../fixtures";

const SETTINGS: AtlasSettings = {
  maxWidth: 256,
  maxHeight: 256,
  padding: 1,
  trim: true,
  format: "png",
  quality: 90,
};

async function alphaAt(png: Buffer, x: number, y: number): Promise<number> {
  const { data, info } = await sharp(png).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return data[(y * info.width + x) * 4 + 3];
}

describe("buildAtlas", () => {
  it("composes trimmed sprites and describes them", async () => {
    const sources = [
      { id: "gem", bytes: await createSpritePng(4, 4, { x: 0, y: 0, w: 4, h: 4 }) },
      { id: "coin", bytes: await createSpritePng(8, 8, { x: 2, y: 2, w: 4, h: 4 }) },
    ];
    const { image, metadata } = await buildAtlas(sources, SETTINGS, "sheet.png", createDefaultProcessors());

    expect(metadata).toEqual({
      image: "sheet.png",
      width: 9,
      height: 4,
      sprites: [
        {
          id: "coin",
          x: 0,
          y: 0,
          width: 4,
          height: 4,
          trimmed: { offsetX: 2, offsetY: 2, originalWidth: 8, originalHeight: 8 },
        },
        {
          id: "gem",
          x: 5,
          y: 0,
          width: 4,
          height: 4,
          trimmed: { offsetX: 0, offsetY: 0, originalWidth: 4, originalHeight: 4 },
        },
      ],
    });

    const meta = await sharp(image).metadata();
    expect([meta.format, meta.width, meta.height]).toEqual(["png", 9, 4]);
    expect(await alphaAt(image, 0, 0)).toBe(255);
    expect(await alphaAt(image, 4, 0)).toBe(0);
    expect(await alphaAt(image, 5, 3)).toBe(255);
  });

  it("produces identical bytes for identical input", async () => {
    const sources = [{ id: "a", bytes: await createSpritePng(6, 6, { x: 1, y: 1, w: 3, h: 3 }) }];
    const first = await buildAtlas(sources, SETTINGS, "a.png", createDefaultProcessors());
    const second = await buildAtlas(sources, SETTINGS, "a.png", createDefaultProcessors());
    expect(second.image.equals(first.image)).toBe(true);
  });

  it("rejects an empty group and undecodable sprites", async () => {
    await expect(buildAtlas([], SETTINGS, "x.png", createDefaultProcessors())).rejects.toThrow(ProcessorError);
    await expect(
      buildAtlas([{ id: "bad", bytes: Buffer.from("not an image") }], SETTINGS, "x.png", createDefaultProcessors())
    ).rejects.toThrow('sprite "bad"');
  });
});
