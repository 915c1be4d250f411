/**
 * Error taxonomy.
 *
 * ConfigError and UsageError are fatal and raised before any job runs.
 * AssetIOError, ProcessorError and AtlasOverflowError are recorded per job
 * in the BuildReport. CacheCorruptionError never leaves CacheStore.load().
 */

export class AssetpressError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AssetpressError";
  }
}

export class ConfigError extends AssetpressError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}\n  - ${problems.join("\n  - ")}` : message);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export class UsageError extends AssetpressError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class CacheCorruptionError extends AssetpressError {
  readonly manifestPath: string;

  constructor(manifestPath: string, reason: string) {
    super(`Cache manifest ${manifestPath} is unreadable: ${reason}`);
    this.name = "CacheCorruptionError";
    this.manifestPath = manifestPath;
  }
}

export class AssetIOError extends AssetpressError {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(`${filePath}: ${reason}`);
    this.name = "AssetIOError";
    this.filePath = filePath;
  }
}

export class ProcessorError extends AssetpressError {
  readonly step: string;

  constructor(step: string, reason: string) {
    super(`${step}: ${reason}`);
    this.name = "ProcessorError";
    this.step = step;
  }
}

export class AtlasOverflowError extends AssetpressError {
  readonly requiredWidth: number;
  readonly requiredHeight: number;
  readonly maxWidth: number;
  readonly maxHeight: number;

  constructor(requiredWidth: number, requiredHeight: number, maxWidth: number, maxHeight: number) {
    super(
      `Sprites do not fit a ${maxWidth}x${maxHeight} page; ` +
        `required at least ${requiredWidth}x${requiredHeight}`
    );
    this.name = "AtlasOverflowError";
    this.requiredWidth = requiredWidth;
    this.requiredHeight = requiredHeight;
    this.maxWidth = maxWidth;
    this.maxHeight = maxHeight;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
