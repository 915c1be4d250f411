import * as path from "path";
import picomatch from "picomatch";
import type {
  AssetKind,
  AssetRoute,
  AtlasSettings,
  AudioFormat,
  ImageFormat,
  OutputFormat,
  Pipeline,
  Transform,
} from "../contracts";
import type { AssetpressConfig, PresetConfig, RuleOverride } from "../config/schema";
import { ConfigError } from "../lib/errors";
import { PathEscapeError, resolveUnder } from "../lib/pathSafety";

// --- Asset Kinds ---

const KIND_BY_EXTENSION: Readonly<Record<string, AssetKind>> = {
  png: "image",
  jpg: "image",
  jpeg: "image",
  webp: "image",
  gif: "image",
  tiff: "image",
  gltf: "model",
  glb: "model",
  wav: "audio",
};

const EXTENSION_BY_FORMAT: Readonly<Record<OutputFormat, string>> = {
  png: "png",
  jpeg: "jpg",
  webp: "webp",
  ktx2: "ktx2",
  glb: "glb",
  wav: "wav",
  ogg: "ogg",
};

const IMAGE_FORMATS: readonly OutputFormat[] = ["png", "jpeg", "webp", "ktx2"];
const AUDIO_FORMATS: readonly OutputFormat[] = ["wav", "ogg"];

/** Format-inferred defaults, used when neither a rule nor the preset sets a field. */
export const KIND_DEFAULTS = {
  imageQuality: 80,
  audioFormat: "wav",
  audioQuality: 5,
  normalizePeak: 0.95,
  atlasMaxSize: 2048,
  atlasPadding: 2,
} as const;

export const NO_OP_PIPELINE: Pipeline = { kind: "none", format: null, steps: [] };

export function assetKindOf(filePath: string): AssetKind | null {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return KIND_BY_EXTENSION[ext] ?? null;
}

export function extensionFor(format: OutputFormat): string {
  return EXTENSION_BY_FORMAT[format];
}

function isImageFormat(format: OutputFormat): format is ImageFormat {
  return IMAGE_FORMATS.includes(format);
}

function isAudioFormat(format: OutputFormat): format is AudioFormat {
  return AUDIO_FORMATS.includes(format);
}

/** Source format kept as-is when nothing chooses one. */
export function sourceImageFormat(relPath: string): ImageFormat {
  const ext = path.extname(relPath).slice(1).toLowerCase();
  if (ext === "jpg" || ext === "jpeg") return "jpeg";
  if (ext === "webp") return "webp";
  return "png";
}

// --- Rule Engine ---

interface CompiledRule {
  pattern: string;
  matches: (relPath: string) => boolean;
  override: RuleOverride;
}

export interface RuleEngineOptions {
  preset: string;
  /** Absolute output root; rule `output` patterns must stay inside it. */
  outputRoot: string;
}

/**
 * Resolves a source path to a Pipeline and an output location.
 *
 * Rules are matched in configuration order against the forward-slash path
 * relative to the source root. Every matching rule contributes its fields;
 * later rules override earlier ones field by field. Unset fields fall back
 * to the active preset, then to the per-kind defaults.
 */
export class RuleEngine {
  readonly presetName: string;
  private readonly preset: PresetConfig;
  private readonly rules: CompiledRule[];
  private readonly outputRoot: string;

  constructor(config: AssetpressConfig, options: RuleEngineOptions) {
    const preset = config.presets[options.preset];
    if (preset === undefined) {
      const available = Object.keys(config.presets).sort().join(", ");
      throw new ConfigError(`Unknown preset "${options.preset}". Available: ${available}`);
    }
    this.presetName = options.preset;
    this.preset = preset;
    this.outputRoot = path.resolve(options.outputRoot);
    this.rules = config.rules.map((rule) => ({
      pattern: rule.pattern,
      matches: picomatch(rule.pattern, { dot: true }),
      override: rule.override,
    }));
  }

  /** Merge the fields of every matching rule; last match wins per field. */
  effectiveOverride(relPath: string): RuleOverride {
    const merged: RuleOverride = {};
    for (const rule of this.rules) {
      if (rule.matches(relPath)) {
        Object.assign(merged, rule.override);
      }
    }
    return merged;
  }

  resolve(relPath: string): Pipeline {
    const kind = assetKindOf(relPath);
    if (kind === null) return NO_OP_PIPELINE;
    const override = this.effectiveOverride(relPath);
    return this.buildPipeline(kind, relPath, override);
  }

  route(relPath: string): AssetRoute {
    const kind = assetKindOf(relPath);
    if (kind === null) {
      return { pipeline: NO_OP_PIPELINE, outputPath: "", atlasGroup: null, atlas: null };
    }
    const override = this.effectiveOverride(relPath);
    const pipeline = this.buildPipeline(kind, relPath, override);

    if (kind === "image" && override.atlas === true) {
      const atlas = this.atlasSettings(relPath, override);
      const group = atlasGroupOf(relPath);
      return {
        pipeline,
        outputPath: this.checkOutputPath(`${group}.${extensionFor(atlas.format)}`, relPath),
        atlasGroup: group,
        atlas,
      };
    }

    return {
      pipeline,
      outputPath: this.outputPathFor(relPath, pipeline, override),
      atlasGroup: null,
      atlas: null,
    };
  }

  // --- Pipelines ---

  private buildPipeline(kind: AssetKind, relPath: string, override: RuleOverride): Pipeline {
    switch (kind) {
      case "image":
        return this.imagePipeline(relPath, override);
      case "model":
        return this.modelPipeline(relPath, override);
      case "audio":
        return this.audioPipeline(relPath, override);
    }
  }

  private imageFormat(relPath: string, override: RuleOverride): ImageFormat {
    const format = override.format ?? this.preset.textureFormat ?? sourceImageFormat(relPath);
    if (!isImageFormat(format)) {
      throw new ConfigError(`Rule format "${format}" does not apply to image ${relPath}`);
    }
    return format;
  }

  private imagePipeline(relPath: string, override: RuleOverride): Pipeline {
    const format = this.imageFormat(relPath, override);
    const steps: Transform[] = [];
    const maxSize = override.maxSize ?? this.preset.textureMaxSize;
    if (maxSize !== undefined) steps.push({ op: "resize", maxSize });
    if (override.trim === true) steps.push({ op: "trim" });
    if (override.mipmap ?? this.preset.generateMipmaps ?? false) {
      steps.push({ op: "generateMip" });
    }
    steps.push({
      op: "recompress",
      format,
      quality: override.quality ?? this.preset.textureQuality ?? KIND_DEFAULTS.imageQuality,
      lossless: this.preset.compressTextures === false,
    });
    return { kind: "image", format, steps };
  }

  private modelPipeline(relPath: string, override: RuleOverride): Pipeline {
    if (override.format !== undefined && override.format !== "glb") {
      throw new ConfigError(`Rule format "${override.format}" does not apply to model ${relPath}`);
    }
    const steps: Transform[] = [];
    if (override.draco === true) steps.push({ op: "bufferCompress", method: "draco" });
    if (override.meshopt === true) steps.push({ op: "bufferCompress", method: "meshopt" });
    steps.push({ op: "encode", format: "glb" });
    return { kind: "model", format: "glb", steps };
  }

  private audioPipeline(relPath: string, override: RuleOverride): Pipeline {
    const format = override.format ?? this.preset.audioFormat ?? KIND_DEFAULTS.audioFormat;
    if (!isAudioFormat(format)) {
      throw new ConfigError(`Rule format "${format}" does not apply to audio ${relPath}`);
    }
    const steps: Transform[] = [];
    if (override.normalize === true) {
      steps.push({ op: "normalize", peak: KIND_DEFAULTS.normalizePeak });
    }
    if (override.sampleRate !== undefined) {
      steps.push({ op: "resample", sampleRate: override.sampleRate });
    }
    steps.push({
      op: "encode",
      format,
      quality: override.quality ?? this.preset.audioQuality ?? KIND_DEFAULTS.audioQuality,
    });
    return { kind: "audio", format, steps };
  }

  // --- Atlas ---

  private atlasSettings(relPath: string, override: RuleOverride): AtlasSettings {
    const maxSize = override.maxSize ?? this.preset.textureMaxSize ?? KIND_DEFAULTS.atlasMaxSize;
    return {
      maxWidth: maxSize,
      maxHeight: maxSize,
      padding: override.padding ?? KIND_DEFAULTS.atlasPadding,
      trim: override.trim === true,
      format: this.imageFormat(relPath, override),
      quality: override.quality ?? this.preset.textureQuality ?? KIND_DEFAULTS.imageQuality,
    };
  }

  // --- Output Paths ---

  private outputPathFor(relPath: string, pipeline: Pipeline, override: RuleOverride): string {
    const dir = path.posix.dirname(relPath);
    const name = path.posix.basename(relPath, path.posix.extname(relPath));
    const ext = pipeline.format !== null ? extensionFor(pipeline.format) : "";
    const pattern = override.output ?? "{dir}/{name}.{ext}";
    const expanded = pattern
      .split("{dir}").join(dir)
      .split("{name}").join(name)
      .split("{ext}").join(ext);
    return this.checkOutputPath(expanded, relPath);
  }

  /** Normalize to a forward-slash relative path and keep it under the output root. */
  private checkOutputPath(candidate: string, relPath: string): string {
    const normalized = path.posix.normalize(candidate);
    if (path.posix.isAbsolute(normalized) || path.isAbsolute(normalized)) {
      throw new ConfigError(`Output path for ${relPath} must be relative: "${candidate}"`);
    }
    try {
      resolveUnder(this.outputRoot, normalized, `Output path for ${relPath}`);
    } catch (err) {
      if (err instanceof PathEscapeError) {
        throw new ConfigError(err.message);
      }
      throw err;
    }
    return normalized;
  }
}

/** Sprites are grouped by their directory; files at the source root go to "atlas". */
export function atlasGroupOf(relPath: string): string {
  const dir = path.posix.dirname(relPath);
  return dir === "." ? "atlas" : dir;
}
