import * as fs from "fs";
import * as path from "path";
import { parse as parseToml, TomlError } from "smol-toml";
import { ConfigError, errorMessage } from "../lib/errors";
import { isLogLevel, type LogLevel } from "../lib/logger";
import { parseConfig, defaultConfig, type AssetpressConfig } from "./schema";

export const CONFIG_FILE_NAMES = ["assetpress.toml", ".assetpress.toml"];

/** Config plus the absolute directories derived from it. */
export interface LoadedConfig {
  config: AssetpressConfig;
  /** Absolute path of the file read, or null when defaults were used. */
  configPath: string | null;
  /** Directory that relative config paths resolve against. */
  baseDir: string;
  sourceDir: string;
  outputDir: string;
  cacheDir: string;
  warnings: string[];
}

export interface LoadConfigOptions {
  cwd: string;
  /** Explicit --config path. Must exist. */
  configPath?: string;
  /** Fall back to defaults when no config file is found. */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Look for a config file in `startDir` and each of its parents.
 */
export function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(dir, name);
      if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
        return candidate;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export function readConfigFile(configPath: string): { config: AssetpressConfig; warnings: string[] } {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = parseToml(text);
  } catch (err) {
    if (err instanceof TomlError) {
      throw new ConfigError(
        `Malformed TOML in ${configPath} at line ${err.line}, column ${err.column}: ${err.message}`
      );
    }
    throw err;
  }

  try {
    return parseConfig(raw);
  } catch (err) {
    if (err instanceof ConfigError && err.problems.length > 0) {
      throw new ConfigError(`Invalid configuration in ${configPath}`, err.problems);
    }
    if (err instanceof ConfigError) {
      throw new ConfigError(`${configPath}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Discover, parse and validate the configuration, then resolve its
 * directories. ASSETPRESS_CACHE_DIR in the environment replaces
 * cache.directory.
 */
export function loadConfig(options: LoadConfigOptions): LoadedConfig {
  const env = options.env ?? process.env;
  let configPath: string | null;

  if (options.configPath !== undefined) {
    configPath = path.resolve(options.cwd, options.configPath);
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
  } else {
    configPath = findConfigFile(options.cwd);
    if (configPath === null && !options.allowMissing) {
      throw new ConfigError(
        `No ${CONFIG_FILE_NAMES[0]} found in ${options.cwd} or its parents. Run 'assetpress init' first.`
      );
    }
  }

  const { config, warnings } =
    configPath !== null ? readConfigFile(configPath) : { config: defaultConfig(), warnings: [] };

  const envCacheDir = env.ASSETPRESS_CACHE_DIR;
  if (envCacheDir !== undefined && envCacheDir.trim().length > 0) {
    config.cache.directory = envCacheDir.trim();
  }

  const baseDir = configPath !== null ? path.dirname(configPath) : path.resolve(options.cwd);
  return {
    config,
    configPath,
    baseDir,
    sourceDir: path.resolve(baseDir, config.project.source),
    outputDir: path.resolve(baseDir, config.project.output),
    cacheDir: path.resolve(baseDir, config.cache.directory),
    warnings,
  };
}

// --- Environment ---

export interface EnvSettings {
  jobs?: number;
  logLevel?: LogLevel;
}

/** Read ASSETPRESS_JOBS and ASSETPRESS_LOG_LEVEL. Invalid values are fatal. */
export function readEnvSettings(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const settings: EnvSettings = {};
  const errors: string[] = [];

  const jobsRaw = env.ASSETPRESS_JOBS;
  if (jobsRaw !== undefined && jobsRaw.trim().length > 0) {
    const jobs = Number(jobsRaw);
    if (!Number.isInteger(jobs) || jobs < 1) {
      errors.push(`ASSETPRESS_JOBS must be a positive integer, got "${jobsRaw}"`);
    } else {
      settings.jobs = jobs;
    }
  }

  const levelRaw = env.ASSETPRESS_LOG_LEVEL;
  if (levelRaw !== undefined && levelRaw.trim().length > 0) {
    const level = levelRaw.trim();
    if (isLogLevel(level)) {
      settings.logLevel = level;
    } else {
      errors.push(`ASSETPRESS_LOG_LEVEL must be quiet, info or verbose, got "${levelRaw}"`);
    }
  }

  if (errors.length > 0) {
    throw new ConfigError("Invalid environment", errors);
  }
  return settings;
}
