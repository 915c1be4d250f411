import type {
  AudioFormat,
  ImageFormat,
  OutputFormat,
} from "../contracts";
import { ConfigError } from "../lib/errors";

// --- Config Types ---

export interface ProjectConfig {
  name: string;
  /** Output root, relative to the config file's directory. */
  output: string;
  /** Source root, relative to the config file's directory. */
  source: string;
}

/**
 * Platform preset. Every field is optional in a config file; unset fields
 * fall through to the per-kind defaults in the rule engine.
 */
export interface PresetConfig {
  textureMaxSize?: number;
  textureFormat?: ImageFormat;
  textureQuality?: number;
  audioFormat?: AudioFormat;
  audioQuality?: number;
  compressTextures?: boolean;
  generateMipmaps?: boolean;
}

/** Partial pipeline override attached to a glob rule. */
export interface RuleOverride {
  format?: OutputFormat;
  atlas?: boolean;
  trim?: boolean;
  mipmap?: boolean;
  draco?: boolean;
  meshopt?: boolean;
  normalize?: boolean;
  quality?: number;
  maxSize?: number;
  output?: string;
  padding?: number;
  sampleRate?: number;
}

export interface Rule {
  pattern: string;
  override: RuleOverride;
}

export interface CacheConfig {
  enabled: boolean;
  directory: string;
}

export interface AssetpressConfig {
  project: ProjectConfig;
  presets: Record<string, PresetConfig>;
  /** In file order; later rules take precedence. */
  rules: Rule[];
  cache: CacheConfig;
}

// --- Defaults ---

export const DEFAULT_PRESET = "desktop";
export const DEFAULT_CACHE_DIR = ".assetpress-cache";

export const BUILTIN_PRESETS: Readonly<Record<string, PresetConfig>> = {
  mobile: {
    textureMaxSize: 1024,
    textureFormat: "png",
    textureQuality: 75,
    audioFormat: "wav",
    audioQuality: 6,
    compressTextures: true,
    generateMipmaps: true,
  },
  desktop: {
    textureMaxSize: 4096,
    textureFormat: "png",
    textureQuality: 90,
    audioFormat: "wav",
    audioQuality: 10,
    compressTextures: false,
    generateMipmaps: true,
  },
  web: {
    textureMaxSize: 2048,
    textureFormat: "webp",
    textureQuality: 80,
    audioFormat: "wav",
    audioQuality: 7,
    compressTextures: true,
    generateMipmaps: false,
  },
};

export function defaultConfig(): AssetpressConfig {
  return {
    project: { name: "my-game", output: "./build/assets", source: "./assets" },
    presets: { ...BUILTIN_PRESETS },
    rules: [],
    cache: { enabled: true, directory: DEFAULT_CACHE_DIR },
  };
}

// --- Validation ---

const IMAGE_FORMATS: readonly ImageFormat[] = ["png", "jpeg", "webp", "ktx2"];
const AUDIO_FORMATS: readonly AudioFormat[] = ["wav", "ogg"];
const OUTPUT_FORMATS: readonly OutputFormat[] = [...IMAGE_FORMATS, "glb", ...AUDIO_FORMATS];

/** TOML key → RuleOverride field. Any other key in a rule is an error. */
const RULE_FIELDS: Readonly<Record<string, keyof RuleOverride>> = {
  format: "format",
  atlas: "atlas",
  trim: "trim",
  mipmap: "mipmap",
  draco: "draco",
  meshopt: "meshopt",
  normalize: "normalize",
  quality: "quality",
  max_size: "maxSize",
  output: "output",
  padding: "padding",
  sample_rate: "sampleRate",
};

const PRESET_FIELDS = [
  "texture_max_size",
  "texture_format",
  "texture_quality",
  "audio_format",
  "audio_quality",
  "compress_textures",
  "generate_mipmaps",
];

const TOP_LEVEL_SECTIONS = ["project", "presets", "rules", "cache"];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickOne<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
  return allowed.find((a) => a === value);
}

/** Collects problems while reading typed fields out of an untyped table. */
class FieldReader {
  constructor(
    private readonly table: Record<string, unknown>,
    private readonly where: string,
    private readonly errors: string[]
  ) {}

  string(key: string): string | undefined {
    const v = this.table[key];
    if (v === undefined) return undefined;
    if (typeof v !== "string" || v.length === 0) {
      this.errors.push(`${this.where}.${key} must be a non-empty string`);
      return undefined;
    }
    return v;
  }

  boolean(key: string): boolean | undefined {
    const v = this.table[key];
    if (v === undefined) return undefined;
    if (typeof v !== "boolean") {
      this.errors.push(`${this.where}.${key} must be true or false`);
      return undefined;
    }
    return v;
  }

  integer(key: string, min: number, max: number): number | undefined {
    const raw = this.table[key];
    if (raw === undefined) return undefined;
    // smol-toml returns integers as number unless they exceed 2^53
    const v = typeof raw === "bigint" ? Number(raw) : raw;
    if (typeof v !== "number" || !Number.isInteger(v) || v < min || v > max) {
      this.errors.push(`${this.where}.${key} must be an integer between ${min} and ${max}`);
      return undefined;
    }
    return v;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[]): T | undefined {
    const v = this.table[key];
    if (v === undefined) return undefined;
    const picked = pickOne(allowed, v);
    if (picked === undefined) {
      this.errors.push(`${this.where}.${key} must be one of: ${allowed.join(", ")}`);
    }
    return picked;
  }
}

function parsePreset(name: string, raw: unknown, errors: string[]): PresetConfig {
  const where = `presets.${name}`;
  if (!isRecord(raw)) {
    errors.push(`${where} must be a table`);
    return {};
  }
  for (const key of Object.keys(raw)) {
    if (!PRESET_FIELDS.includes(key)) {
      errors.push(`${where}: unknown field "${key}"`);
    }
  }
  const r = new FieldReader(raw, where, errors);
  const preset: PresetConfig = {
    textureMaxSize: r.integer("texture_max_size", 1, 16384),
    textureFormat: r.oneOf("texture_format", IMAGE_FORMATS),
    textureQuality: r.integer("texture_quality", 1, 100),
    audioFormat: r.oneOf("audio_format", AUDIO_FORMATS),
    audioQuality: r.integer("audio_quality", 1, 10),
    compressTextures: r.boolean("compress_textures"),
    generateMipmaps: r.boolean("generate_mipmaps"),
  };
  return dropUndefined(preset);
}

function parseRule(pattern: string, raw: unknown, errors: string[]): Rule {
  const where = `rules."${pattern}"`;
  if (!isRecord(raw)) {
    errors.push(`${where} must be an inline table`);
    return { pattern, override: {} };
  }
  for (const key of Object.keys(raw)) {
    if (RULE_FIELDS[key] === undefined) {
      errors.push(
        `${where}: unknown parameter "${key}" (allowed: ${Object.keys(RULE_FIELDS).join(", ")})`
      );
    }
  }
  const r = new FieldReader(raw, where, errors);
  const override: RuleOverride = {
    format: r.oneOf("format", OUTPUT_FORMATS),
    atlas: r.boolean("atlas"),
    trim: r.boolean("trim"),
    mipmap: r.boolean("mipmap"),
    draco: r.boolean("draco"),
    meshopt: r.boolean("meshopt"),
    normalize: r.boolean("normalize"),
    quality: r.integer("quality", 1, 100),
    maxSize: r.integer("max_size", 1, 16384),
    output: r.string("output"),
    padding: r.integer("padding", 0, 256),
    sampleRate: r.integer("sample_rate", 1000, 384000),
  };
  if (override.draco === true && override.meshopt === true) {
    errors.push(`${where}: draco and meshopt are mutually exclusive`);
  }
  return { pattern, override: dropUndefined(override) };
}

function dropUndefined<T extends object>(obj: T): T {
  for (const key of Object.keys(obj)) {
    if (Reflect.get(obj, key) === undefined) Reflect.deleteProperty(obj, key);
  }
  return obj;
}

/**
 * Validate a parsed TOML document into a typed config.
 *
 * All problems are collected and reported together as one ConfigError.
 * Unknown top-level sections are warnings, not errors.
 */
export function parseConfig(raw: unknown): { config: AssetpressConfig; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];
  const config = defaultConfig();

  if (!isRecord(raw)) {
    throw new ConfigError("Configuration must be a table");
  }

  for (const key of Object.keys(raw)) {
    if (!TOP_LEVEL_SECTIONS.includes(key)) {
      warnings.push(`Ignoring unknown section "${key}"`);
    }
  }

  // Project
  if (raw.project !== undefined) {
    if (!isRecord(raw.project)) {
      errors.push("project must be a table");
    } else {
      const r = new FieldReader(raw.project, "project", errors);
      config.project = {
        name: r.string("name") ?? config.project.name,
        output: r.string("output") ?? config.project.output,
        source: r.string("source") ?? config.project.source,
      };
    }
  }

  // Presets
  if (raw.presets !== undefined) {
    if (!isRecord(raw.presets)) {
      errors.push("presets must be a table of named presets");
    } else {
      for (const [name, value] of Object.entries(raw.presets)) {
        config.presets[name] = parsePreset(name, value, errors);
      }
    }
  }

  // Rules
  if (raw.rules !== undefined) {
    if (!isRecord(raw.rules)) {
      errors.push("rules must be a table of glob = { ... } entries");
    } else {
      config.rules = Object.entries(raw.rules).map(([pattern, value]) =>
        parseRule(pattern, value, errors)
      );
    }
  }

  // Cache
  if (raw.cache !== undefined) {
    if (!isRecord(raw.cache)) {
      errors.push("cache must be a table");
    } else {
      const r = new FieldReader(raw.cache, "cache", errors);
      config.cache = {
        enabled: r.boolean("enabled") ?? config.cache.enabled,
        directory: r.string("directory") ?? config.cache.directory,
      };
    }
  }

  if (errors.length > 0) {
    throw new ConfigError("Invalid configuration", errors);
  }
  return { config, warnings };
}
