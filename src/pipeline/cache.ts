import * as fs from "fs";
import * as path from "path";
import type { CacheEntry, CacheManifest } from "../contracts";
import { writeFileAtomic } from "../lib/atomicWrite";
import { directorySize, isNotFound } from "../lib/dirSize";
import { CacheCorruptionError, errorMessage } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { isRecord } from "../config/schema";

export const MANIFEST_FILE_NAME = "manifest.json";
export const MANIFEST_VERSION = 1;

const log = createLogger("cache");

export interface CacheStoreOptions {
  /** Absolute cache directory. */
  directory: string;
  /** When false the store is always empty and never writes. */
  enabled?: boolean;
  /** Clock for entry timestamps. */
  now?: () => number;
}

export interface CacheStats {
  entries: number;
  /** Entries whose output file is still on disk. */
  live: number;
}

/**
 * Content-addressed record of completed build outputs.
 *
 * Entries are keyed by CacheKey. The store is loaded once per build,
 * mutated in memory by the scheduler and flushed once at the end. The
 * manifest is written with temp-then-rename, so a crash loses at most the
 * entries committed since the last flush.
 */
export class CacheStore {
  readonly directory: string;
  readonly manifestPath: string;
  readonly enabled: boolean;
  private readonly clock: () => number;
  private readonly entries = new Map<string, CacheEntry>();
  /** outputPath → key, so a new build of an output replaces the old entry. */
  private readonly keyByOutput = new Map<string, string>();
  private dirty = false;

  constructor(options: CacheStoreOptions) {
    this.directory = path.resolve(options.directory);
    this.manifestPath = path.join(this.directory, MANIFEST_FILE_NAME);
    this.enabled = options.enabled ?? true;
    this.clock = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  now(): number {
    return this.clock();
  }

  /**
   * Read the manifest. A missing manifest is an empty cache; an unreadable
   * one is logged as a warning and also treated as empty.
   */
  async load(): Promise<CacheManifest> {
    this.entries.clear();
    this.keyByOutput.clear();
    this.dirty = false;
    if (!this.enabled) return this.snapshot();

    let text: string;
    try {
      text = await fs.promises.readFile(this.manifestPath, "utf-8");
    } catch (err) {
      if (!isNotFound(err)) {
        log.warn(new CacheCorruptionError(this.manifestPath, errorMessage(err)).message);
        this.dirty = true;
      }
      return this.snapshot();
    }

    try {
      for (const entry of parseManifest(text, this.manifestPath)) {
        this.insert(entry);
      }
    } catch (err) {
      if (!(err instanceof CacheCorruptionError)) throw err;
      log.warn(`${err.message}; rebuilding everything`);
      this.entries.clear();
      this.keyByOutput.clear();
      this.dirty = true;
    }
    log.debug(`Loaded ${this.entries.size} entries from ${this.manifestPath}`);
    return this.snapshot();
  }

  lookup(key: string): CacheEntry | undefined {
    return this.enabled ? this.entries.get(key) : undefined;
  }

  /** Record a completed output. Replaces any entry for the same output path. */
  commit(entry: CacheEntry): void {
    if (!this.enabled) return;
    const previousKey = this.keyByOutput.get(entry.outputPath);
    if (previousKey !== undefined && previousKey !== entry.key) {
      this.entries.delete(previousKey);
    }
    this.insert({ ...entry });
    this.dirty = true;
  }

  /** Entries produced from `sourcePath` (a relative source path or atlas group id). */
  entriesFor(sourcePath: string): CacheEntry[] {
    return [...this.entries.values()].filter((e) => e.sourcePath === sourcePath);
  }

  /** Remove every entry produced from `sourcePath`. Returns the removed entries. */
  invalidate(sourcePath: string): CacheEntry[] {
    const removed = this.entriesFor(sourcePath);
    for (const entry of removed) {
      this.entries.delete(entry.key);
      if (this.keyByOutput.get(entry.outputPath) === entry.key) {
        this.keyByOutput.delete(entry.outputPath);
      }
    }
    if (removed.length > 0) this.dirty = true;
    return removed;
  }

  /** Source paths that have at least one entry. */
  sources(): string[] {
    return [...new Set([...this.entries.values()].map((e) => e.sourcePath))].sort();
  }

  snapshot(): CacheManifest {
    const entries = [...this.entries.values()]
      .sort((a, b) => compareStrings(a.key, b.key))
      .map((e) => ({
        key: e.key,
        sourcePath: e.sourcePath,
        outputPath: e.outputPath,
        outputHash: e.outputHash,
        timestamp: e.timestamp,
      }));
    return { version: MANIFEST_VERSION, entries };
  }

  /**
   * Persist the manifest if anything changed since load. Entries are
   * sorted by key, so equal contents always serialize to equal bytes.
   */
  async flush(): Promise<boolean> {
    if (!this.enabled || !this.dirty) return false;
    const text = JSON.stringify(this.snapshot(), null, 2) + "\n";
    await writeFileAtomic(this.manifestPath, text);
    this.dirty = false;
    log.debug(`Wrote ${this.entries.size} entries to ${this.manifestPath}`);
    return true;
  }

  /** Entry count, and how many of those outputs still exist under `outputRoot`. */
  async stats(outputRoot: string): Promise<CacheStats> {
    let live = 0;
    for (const entry of this.entries.values()) {
      const target = path.join(outputRoot, ...entry.outputPath.split("/"));
      try {
        await fs.promises.access(target);
        live++;
      } catch (err) {
        if (!isNotFound(err)) throw err;
      }
    }
    return { entries: this.entries.size, live };
  }

  /** Delete the cache directory and forget every entry. Returns bytes freed. */
  async purge(): Promise<number> {
    const freed = await directorySize(this.directory);
    await fs.promises.rm(this.directory, { recursive: true, force: true });
    this.entries.clear();
    this.keyByOutput.clear();
    this.dirty = false;
    return freed;
  }

  private insert(entry: CacheEntry): void {
    this.entries.set(entry.key, entry);
    this.keyByOutput.set(entry.outputPath, entry.key);
  }
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Parse manifest text. Unknown fields are ignored. Entries missing a key,
 * output path or output hash are dropped; a missing source path or
 * timestamp gets an empty default.
 */
export function parseManifest(text: string, manifestPath: string): CacheEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new CacheCorruptionError(manifestPath, errorMessage(err));
  }
  if (!isRecord(raw)) {
    throw new CacheCorruptionError(manifestPath, "top level is not an object");
  }
  if (raw.version !== MANIFEST_VERSION) {
    throw new CacheCorruptionError(
      manifestPath,
      `unsupported version ${JSON.stringify(raw.version)} (expected ${MANIFEST_VERSION})`
    );
  }
  if (!Array.isArray(raw.entries)) {
    throw new CacheCorruptionError(manifestPath, "entries is not a list");
  }

  const entries: CacheEntry[] = [];
  let dropped = 0;
  for (const item of raw.entries) {
    if (
      !isRecord(item) ||
      typeof item.key !== "string" ||
      typeof item.outputPath !== "string" ||
      typeof item.outputHash !== "string"
    ) {
      dropped++;
      continue;
    }
    entries.push({
      key: item.key,
      sourcePath: typeof item.sourcePath === "string" ? item.sourcePath : "",
      outputPath: item.outputPath,
      outputHash: item.outputHash,
      timestamp: typeof item.timestamp === "number" ? item.timestamp : 0,
    });
  }
  if (dropped > 0) {
    log.warn(`Dropped ${dropped} malformed entries from ${manifestPath}`);
  }
  return entries;
}
