import { describe, it, expect } from "vitest";
import { defaultConfig, type Rule } from "../../src/config/schema";
import { ConfigError } from "../../src/lib/errors";
import { NO_OP_PIPELINE, RuleEngine, assetKindOf, atlasGroupOf } from "../../src/pipeline/rules";

const OUTPUT_ROOT = "/project/build";

function engine(rules: Rule[] = [], preset = "desktop"): RuleEngine {
  const config = defaultConfig();
  config.rules = rules;
  return new RuleEngine(config, { preset, outputRoot: OUTPUT_ROOT });
}

describe("assetKindOf", () => {
  it("classifies by extension, case-insensitively", () => {
    expect(assetKindOf("a/b/Hero.PNG")).toBe("image");
    expect(assetKindOf("ship.gltf")).toBe("model");
    expect(assetKindOf("ship.glb")).toBe("model");
    expect(assetKindOf("theme.wav")).toBe("audio");
    expect(assetKindOf("notes.txt")).toBeNull();
  });
});

describe("RuleEngine", () => {
  it("builds an image pipeline from the preset", () => {
    const route = engine().route("textures/rock.png");
    expect(route.pipeline).toEqual({
      kind: "image",
      format: "png",
      steps: [
        { op: "resize", maxSize: 4096 },
        { op: "generateMip" },
        { op: "recompress", format: "png", quality: 90, lossless: true },
      ],
    });
    expect(route.outputPath).toBe("textures/rock.png");
    expect(route.atlasGroup).toBeNull();
  });

  it("changes the output extension with the preset format", () => {
    const route = engine([], "web").route("rock.png");
    expect(route.outputPath).toBe("rock.webp");
    expect(route.pipeline.steps).toEqual([
      { op: "resize", maxSize: 2048 },
      { op: "recompress", format: "webp", quality: 80, lossless: false },
    ]);
  });

  it("uses jpg as the jpeg extension", () => {
    const route = engine([{ pattern: "photos/*", override: { format: "jpeg" } }]).route("photos/sky.png");
    expect(route.outputPath).toBe("photos/sky.jpg");
  });

  it("lets later rules override earlier ones field by field", () => {
    const rules: Rule[] = [
      { pattern: "**/*.png", override: { quality: 50, mipmap: false } },
      { pattern: "hero/*.png", override: { quality: 70 } },
    ];
    const e = engine(rules);
    expect(e.effectiveOverride("hero/a.png")).toEqual({ quality: 70, mipmap: false });
    expect(e.effectiveOverride("other/b.png")).toEqual({ quality: 50, mipmap: false });
    expect(e.resolve("hero/a.png").steps).toEqual([
      { op: "resize", maxSize: 4096 },
      { op: "recompress", format: "png", quality: 70, lossless: true },
    ]);
  });

  it("matches dotted paths", () => {
    const e = engine([{ pattern: "**/*.png", override: { quality: 60 } }]);
    expect(e.effectiveOverride(".hidden/a.png")).toEqual({ quality: 60 });
  });

  it("routes atlas members to their directory's group", () => {
    const e = engine([{ pattern: "sprites/**/*.png", override: { atlas: true, trim: true, padding: 2 } }]);
    const route = e.route("sprites/ui/button.png");
    expect(route.atlasGroup).toBe("sprites/ui");
    expect(route.outputPath).toBe("sprites/ui.png");
    expect(route.atlas).toEqual({
      maxWidth: 4096,
      maxHeight: 4096,
      padding: 2,
      trim: true,
      format: "png",
      quality: 90,
    });
  });

  it("names root-level sprites' group atlas", () => {
    expect(atlasGroupOf("coin.png")).toBe("atlas");
    expect(atlasGroupOf("a/b/coin.png")).toBe("a/b");
  });

  it("builds model pipelines", () => {
    const e = engine([{ pattern: "models/heavy/*", override: { draco: true } }]);
    expect(e.route("models/ship.gltf")).toEqual({
      pipeline: { kind: "model", format: "glb", steps: [{ op: "encode", format: "glb" }] },
      outputPath: "models/ship.glb",
      atlasGroup: null,
      atlas: null,
    });
    expect(e.resolve("models/heavy/rock.glb").steps).toEqual([
      { op: "bufferCompress", method: "draco" },
      { op: "encode", format: "glb" },
    ]);
  });

  it("builds audio pipelines", () => {
    const e = engine([{ pattern: "audio/music/*.wav", override: { normalize: true } }]);
    expect(e.resolve("audio/music/theme.wav")).toEqual({
      kind: "audio",
      format: "wav",
      steps: [
        { op: "normalize", peak: 0.95 },
        { op: "encode", format: "wav", quality: 10 },
      ],
    });
    const resampled = engine([{ pattern: "*.wav", override: { sampleRate: 22050 } }]);
    expect(resampled.resolve("hit.wav").steps).toEqual([
      { op: "resample", sampleRate: 22050 },
      { op: "encode", format: "wav", quality: 10 },
    ]);
  });

  it("returns the no-op pipeline for unknown files", () => {
    expect(engine().resolve("readme.txt")).toEqual(NO_OP_PIPELINE);
    expect(engine().route("readme.txt").outputPath).toBe("");
  });

  it("expands output patterns", () => {
    const e = engine([{ pattern: "ui/*.png", override: { output: "gui/{name}_hd.{ext}" } }]);
    expect(e.route("ui/icon.png").outputPath).toBe("gui/icon_hd.png");
  });

  it("rejects output patterns that leave the output root", () => {
    const e = engine([{ pattern: "*.png", override: { output: "../{name}.{ext}" } }]);
    expect(() => e.route("a.png")).toThrow(ConfigError);
    const absolute = engine([{ pattern: "*.png", override: { output: "/tmp/{name}.{ext}" } }]);
    expect(() => absolute.route("a.png")).toThrow(ConfigError);
  });

  it("rejects a format that does not fit the asset kind", () => {
    const e = engine([{ pattern: "*", override: { format: "glb" } }]);
    expect(() => e.resolve("a.png")).toThrow(ConfigError);
    expect(() => e.resolve("a.wav")).toThrow(ConfigError);
  });

  it("rejects an unknown preset", () => {
    expect(() => engine([], "console")).toThrow('Unknown preset "console". Available: desktop, mobile, web');
  });
});
