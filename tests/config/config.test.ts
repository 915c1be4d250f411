import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { parse as parseToml } from "smol-toml";
import { findConfigFile, loadConfig, readEnvSettings } from "../../src/config/loader";
import { BUILTIN_PRESETS, parseConfig } from "../../src/config/schema";
import { DEFAULT_CONFIG_TEMPLATE } from "../../src/config/template";
import { ConfigError } from "../../src/lib/errors";
import { createTempDir, cleanupTempDir, writeFile } from "../fixtures";

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("parseConfig", () => {
  it("accepts the init template", () => {
    const { config, warnings } = parseConfig(parseToml(DEFAULT_CONFIG_TEMPLATE));
    expect(warnings).toEqual([]);
    expect(config.project).toEqual({ name: "my-game", output: "./build/assets", source: "./assets" });
    expect(config.rules.map((r) => r.pattern)).toEqual([
      "sprites/**/*.png",
      "ui/**/*.png",
      "audio/music/*.wav",
    ]);
    expect(config.rules[0].override).toEqual({ atlas: true, trim: true, padding: 2 });
    expect(config.presets.desktop).toEqual(BUILTIN_PRESETS.desktop);
  });

  it("fills defaults for an empty document", () => {
    const { config } = parseConfig({});
    expect(config.cache).toEqual({ enabled: true, directory: ".assetpress-cache" });
    expect(Object.keys(config.presets).sort()).toEqual(["desktop", "mobile", "web"]);
    expect(config.rules).toEqual([]);
  });

  it("maps snake_case rule fields", () => {
    const { config } = parseConfig({
      rules: { "audio/*.wav": { sample_rate: 22050, normalize: true } },
    });
    expect(config.rules[0].override).toEqual({ sampleRate: 22050, normalize: true });
  });

  it("reports every problem at once", () => {
    const err = configErrorOf(() =>
      parseConfig({
        rules: {
          "a/*.png": { shiny: true },
          "b/*.glb": { draco: true, meshopt: true },
        },
        presets: { custom: { texture_quality: 500 } },
      })
    );
    expect(err.problems).toEqual([
      "presets.custom.texture_quality must be an integer between 1 and 100",
      'rules."a/*.png": unknown parameter "shiny" (allowed: format, atlas, trim, mipmap, draco, meshopt, normalize, quality, max_size, output, padding, sample_rate)',
      'rules."b/*.glb": draco and meshopt are mutually exclusive',
    ]);
  });

  it("warns about unknown top-level sections", () => {
    const { warnings } = parseConfig({ extras: {} });
    expect(warnings).toEqual(['Ignoring unknown section "extras"']);
  });

  it("replaces a built-in preset of the same name", () => {
    const { config } = parseConfig({ presets: { mobile: { texture_max_size: 512 } } });
    expect(config.presets.mobile).toEqual({ textureMaxSize: 512 });
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it("finds the config in a parent directory and resolves paths against it", () => {
    writeFile(dir, "assetpress.toml", '[project]\nsource = "src-assets"\noutput = "out"\n');
    const nested = path.join(dir, "a", "b");
    fs.mkdirSync(nested, { recursive: true });

    expect(findConfigFile(nested)).toBe(path.join(dir, "assetpress.toml"));
    const loaded = loadConfig({ cwd: nested, env: {} });
    expect(loaded.sourceDir).toBe(path.join(dir, "src-assets"));
    expect(loaded.outputDir).toBe(path.join(dir, "out"));
    expect(loaded.cacheDir).toBe(path.join(dir, ".assetpress-cache"));
  });

  it("lets ASSETPRESS_CACHE_DIR replace the cache directory", () => {
    writeFile(dir, "assetpress.toml", "");
    const loaded = loadConfig({ cwd: dir, env: { ASSETPRESS_CACHE_DIR: "tmp-cache" } });
    expect(loaded.cacheDir).toBe(path.join(dir, "tmp-cache"));
  });

  it("fails without a config unless missing is allowed", () => {
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(ConfigError);
    const loaded = loadConfig({ cwd: dir, allowMissing: true, env: {} });
    expect(loaded.configPath).toBeNull();
    expect(loaded.sourceDir).toBe(path.join(dir, "assets"));
  });

  it("reports the location of malformed TOML", () => {
    writeFile(dir, "assetpress.toml", "[project\nname = 1\n");
    const err = configErrorOf(() => loadConfig({ cwd: dir, env: {} }));
    expect(err.message).toContain("Malformed TOML");
    expect(err.message).toMatch(/at line \d+, column \d+/);
  });

  it("names the file when validation fails", () => {
    writeFile(dir, "assetpress.toml", '[rules]\n"*.png" = { bogus = 1 }\n');
    const err = configErrorOf(() => loadConfig({ cwd: dir, env: {} }));
    expect(err.message.split("\n")[0]).toBe(`Invalid configuration in ${path.join(dir, "assetpress.toml")}`);
    expect(err.problems).toHaveLength(1);
  });
});

describe("readEnvSettings", () => {
  it("reads jobs and log level", () => {
    expect(readEnvSettings({ ASSETPRESS_JOBS: "4", ASSETPRESS_LOG_LEVEL: "quiet" })).toEqual({
      jobs: 4,
      logLevel: "quiet",
    });
  });

  it("ignores unset and blank values", () => {
    expect(readEnvSettings({ ASSETPRESS_JOBS: " " })).toEqual({});
  });

  it("rejects invalid values", () => {
    const err = configErrorOf(() => readEnvSettings({ ASSETPRESS_JOBS: "0", ASSETPRESS_LOG_LEVEL: "loud" }));
    expect(err.problems).toEqual([
      'ASSETPRESS_JOBS must be a positive integer, got "0"',
      'ASSETPRESS_LOG_LEVEL must be quiet, info or verbose, got "loud"',
    ]);
  });
});
