import * as path from "path";
import type { AudioFormat, ImageFormat } from "../contracts";
import { UsageError } from "../lib/errors";
import type { LogLevel } from "../lib/logger";

// --- CLI Arg Types ---

export type QualityPreset = "fast" | "balanced" | "high" | "ultra";

export interface InitArgs {
  command: "init";
  force: boolean;
}

export interface OptimizeArgs {
  command: "optimize";
  input: string;
  output?: string;
  format?: ImageFormat;
  quality: QualityPreset;
  mipmap: boolean;
}

export interface BuildArgs {
  command: "build";
  /** Source directory; defaults to the config's project.source. */
  input?: string;
  output?: string;
  preset?: string;
  config?: string;
  force: boolean;
  jobs?: number;
  dryRun: boolean;
}

export interface AtlasArgs {
  command: "atlas";
  input: string;
  output: string;
  json?: string;
  maxWidth: number;
  maxHeight: number;
  padding: number;
  trim: boolean;
  format: ImageFormat;
}

export interface WatchArgs {
  command: "watch";
  input?: string;
  output?: string;
  config?: string;
  preset?: string;
  debounce: number;
}

export interface ModelArgs {
  command: "model";
  input: string;
  output?: string;
  compress: boolean;
  lod: boolean;
  lodCount: number;
  lodRatio: number;
  info: boolean;
}

export interface AudioArgs {
  command: "audio";
  input: string;
  output?: string;
  format: AudioFormat;
  quality: number;
  sampleRate?: number;
  normalize: boolean;
  info: boolean;
}

export interface InfoArgs {
  command: "info";
  input: string;
}

export interface CleanArgs {
  command: "clean";
  cacheDir?: string;
  config?: string;
  all: boolean;
}

export interface HelpArgs {
  command: "help";
}

export type CommandArgs =
  | InitArgs
  | OptimizeArgs
  | BuildArgs
  | AtlasArgs
  | WatchArgs
  | ModelArgs
  | AudioArgs
  | InfoArgs
  | CleanArgs
  | HelpArgs;

export type ParsedArgs = CommandArgs & { logLevel?: LogLevel };

// --- Constants ---

const IMAGE_FORMATS: ImageFormat[] = ["png", "jpeg", "webp", "ktx2"];
const AUDIO_FORMATS: AudioFormat[] = ["ogg", "wav"];
const QUALITY_PRESETS: QualityPreset[] = ["fast", "balanced", "high", "ultra"];

export const QUALITY_VALUES: Readonly<Record<QualityPreset, number>> = {
  fast: 70,
  balanced: 80,
  high: 90,
  ultra: 95,
};

export const USAGE = [
  "Usage:",
  "  assetpress init [--force]",
  "  assetpress optimize <file> [-o <out>] [-f png|jpeg|webp|ktx2] [-q fast|balanced|high|ultra] [--mipmap]",
  "  assetpress build [<dir>] [-o <out>] [-p <preset>] [-c <config>] [--force] [-j <n>] [--dry-run]",
  "  assetpress atlas <dir> [-o atlas.png] [--json <path>] [--max-width 2048] [--max-height 2048] [--padding 2] [--trim] [-f <format>]",
  "  assetpress watch [<dir>] [-o <out>] [-c <config>] [-p <preset>] [--debounce 300]",
  "  assetpress model <file> [-o <out>] [--compress] [--lod] [--lod-count 3] [--lod-ratio 0.5] [--info]",
  "  assetpress audio <file> [-o <out>] [-f wav|ogg] [-q 1-10 (ogg only)] [--sample-rate <hz>] [--normalize] [--info]",
  "  assetpress info <file>",
  "  assetpress clean [--cache-dir <dir>] [-c <config>] [--all]",
  "Global flags: -v/--verbose, --quiet",
].join("\n");

// --- Helpers ---

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || (value.startsWith("-") && !/^-\d/.test(value))) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function takeInteger(args: string[], i: number, flag: string, min: number, max: number): number {
  const raw = takeValue(args, i, flag);
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new UsageError(`${flag} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return n;
}

function takeNumber(args: string[], i: number, flag: string, min: number, max: number): number {
  const raw = takeValue(args, i, flag);
  const n = Number(raw);
  if (!Number.isFinite(n) || n < min || n > max) {
    throw new UsageError(`${flag} must be a number between ${min} and ${max}, got "${raw}"`);
  }
  return n;
}

function takeChoice<T extends string>(args: string[], i: number, flag: string, choices: readonly T[]): T {
  const raw = takeValue(args, i, flag);
  const picked = choices.find((c) => c === raw);
  if (picked === undefined) {
    throw new UsageError(`${flag} must be one of: ${choices.join(", ")}`);
  }
  return picked;
}

/** Split off the positional argument that follows the command, if any. */
function positional(args: string[], command: string, required: boolean): { value?: string; rest: string[] } {
  const first = args[0];
  if (first === undefined || first.startsWith("-")) {
    if (required) throw new UsageError(`'${command}' requires an input path`);
    return { rest: args };
  }
  return { value: path.resolve(first), rest: args.slice(1) };
}

function unknown(arg: string): never {
  throw new UsageError(`Unknown argument "${arg}"`);
}

// --- Per-command parsers ---

function parseInit(args: string[]): InitArgs {
  let force = false;
  for (const arg of args) {
    if (arg === "--force" || arg === "-f") force = true;
    else unknown(arg);
  }
  return { command: "init", force };
}

function parseOptimize(args: string[]): OptimizeArgs {
  const { value, rest } = positional(args, "optimize", true);
  const parsed: OptimizeArgs = { command: "optimize", input: value ?? "", quality: "balanced", mipmap: false };
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "-o" || arg === "--output") parsed.output = path.resolve(takeValue(rest, i++, arg));
    else if (arg === "-f" || arg === "--format") parsed.format = takeChoice(rest, i++, arg, IMAGE_FORMATS);
    else if (arg === "-q" || arg === "--quality") parsed.quality = takeChoice(rest, i++, arg, QUALITY_PRESETS);
    else if (arg === "--mipmap") parsed.mipmap = true;
    else unknown(arg);
  }
  return parsed;
}

function parseBuild(args: string[]): BuildArgs {
  const { value, rest } = positional(args, "build", false);
  const parsed: BuildArgs = { command: "build", input: value, force: false, dryRun: false };
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "-o" || arg === "--output") parsed.output = path.resolve(takeValue(rest, i++, arg));
    else if (arg === "-p" || arg === "--preset") parsed.preset = takeValue(rest, i++, arg);
    else if (arg === "-c" || arg === "--config") parsed.config = path.resolve(takeValue(rest, i++, arg));
    else if (arg === "-j" || arg === "--jobs") parsed.jobs = takeInteger(rest, i++, arg, 1, 1024);
    else if (arg === "--force") parsed.force = true;
    else if (arg === "--dry-run") parsed.dryRun = true;
    else unknown(arg);
  }
  return parsed;
}

function parseAtlas(args: string[]): AtlasArgs {
  const { value, rest } = positional(args, "atlas", true);
  const parsed: AtlasArgs = {
    command: "atlas",
    input: value ?? "",
    output: path.resolve("atlas.png"),
    maxWidth: 2048,
    maxHeight: 2048,
    padding: 2,
    trim: false,
    format: "png",
  };
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "-o" || arg === "--output") parsed.output = path.resolve(takeValue(rest, i++, arg));
    else if (arg === "--json") parsed.json = path.resolve(takeValue(rest, i++, arg));
    else if (arg === "--max-width") parsed.maxWidth = takeInteger(rest, i++, arg, 1, 16384);
    else if (arg === "--max-height") parsed.maxHeight = takeInteger(rest, i++, arg, 1, 16384);
    else if (arg === "--padding") parsed.padding = takeInteger(rest, i++, arg, 0, 256);
    else if (arg === "--trim") parsed.trim = true;
    else if (arg === "-f" || arg === "--format") parsed.format = takeChoice(rest, i++, arg, IMAGE_FORMATS);
    else unknown(arg);
  }
  return parsed;
}

function parseWatch(args: string[]): WatchArgs {
  const { value, rest } = positional(args, "watch", false);
  const parsed: WatchArgs = { command: "watch", input: value, debounce: 300 };
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "-o" || arg === "--output") parsed.output = path.resolve(takeValue(rest, i++, arg));
    else if (arg === "-c" || arg === "--config") parsed.config = path.resolve(takeValue(rest, i++, arg));
    else if (arg === "-p" || arg === "--preset") parsed.preset = takeValue(rest, i++, arg);
    else if (arg === "--debounce") parsed.debounce = takeInteger(rest, i++, arg, 0, 60000);
    else unknown(arg);
  }
  return parsed;
}

function parseModel(args: string[]): ModelArgs {
  const { value, rest } = positional(args, "model", true);
  const parsed: ModelArgs = {
    command: "model",
    input: value ?? "",
    compress: false,
    lod: false,
    lodCount: 3,
    lodRatio: 0.5,
    info: false,
  };
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "-o" || arg === "--output") parsed.output = path.resolve(takeValue(rest, i++, arg));
    else if (arg === "--compress") parsed.compress = true;
    else if (arg === "--lod") parsed.lod = true;
    else if (arg === "--lod-count") parsed.lodCount = takeInteger(rest, i++, arg, 1, 4);
    else if (arg === "--lod-ratio") parsed.lodRatio = takeNumber(rest, i++, arg, 0.1, 0.9);
    else if (arg === "--info") parsed.info = true;
    else unknown(arg);
  }
  return parsed;
}

function parseAudio(args: string[]): AudioArgs {
  const { value, rest } = positional(args, "audio", true);
  const parsed: AudioArgs = {
    command: "audio",
    input: value ?? "",
    format: "wav",
    quality: 5,
    normalize: false,
    info: false,
  };
  let qualityGiven = false;
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "-o" || arg === "--output") parsed.output = path.resolve(takeValue(rest, i++, arg));
    else if (arg === "-f" || arg === "--format") parsed.format = takeChoice(rest, i++, arg, AUDIO_FORMATS);
    else if (arg === "-q" || arg === "--quality") {
      parsed.quality = takeInteger(rest, i++, arg, 1, 10);
      qualityGiven = true;
    } else if (arg === "--sample-rate") parsed.sampleRate = takeInteger(rest, i++, arg, 1000, 384000);
    else if (arg === "--normalize") parsed.normalize = true;
    else if (arg === "--info") parsed.info = true;
    else unknown(arg);
  }
  if (qualityGiven && parsed.format === "wav") {
    throw new UsageError("-q applies to ogg output only; wav is written as 16-bit PCM");
  }
  return parsed;
}

function parseInfo(args: string[]): InfoArgs {
  const { value, rest } = positional(args, "info", true);
  if (rest.length > 0) {
    throw new UsageError("'info' does not accept additional arguments.");
  }
  return { command: "info", input: value ?? "" };
}

function parseClean(args: string[]): CleanArgs {
  const parsed: CleanArgs = { command: "clean", all: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--cache-dir") parsed.cacheDir = path.resolve(takeValue(args, i++, arg));
    else if (arg === "-c" || arg === "--config") parsed.config = path.resolve(takeValue(args, i++, arg));
    else if (arg === "--all") parsed.all = true;
    else unknown(arg);
  }
  return parsed;
}

// --- CLI Parsing ---

/**
 * Parse `process.argv`. Global flags may appear anywhere. Throws
 * UsageError on any problem; the caller prints usage and exits.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  let logLevel: LogLevel | undefined;
  const args: string[] = [];
  for (const arg of argv.slice(2)) {
    if (arg === "-v" || arg === "--verbose") logLevel = "verbose";
    else if (arg === "--quiet") logLevel = "quiet";
    else args.push(arg);
  }

  if (args.length === 0) {
    throw new UsageError("No command or arguments provided.");
  }

  const [command, ...rest] = args;
  const withLevel = (parsed: CommandArgs): ParsedArgs =>
    logLevel === undefined ? parsed : { ...parsed, logLevel };

  switch (command) {
    case "init":
      return withLevel(parseInit(rest));
    case "optimize":
      return withLevel(parseOptimize(rest));
    case "build":
      return withLevel(parseBuild(rest));
    case "atlas":
      return withLevel(parseAtlas(rest));
    case "watch":
      return withLevel(parseWatch(rest));
    case "model":
      return withLevel(parseModel(rest));
    case "audio":
      return withLevel(parseAudio(rest));
    case "info":
      return withLevel(parseInfo(rest));
    case "clean":
      return withLevel(parseClean(rest));
    case "help":
    case "-h":
    case "--help":
      return { command: "help" };
    default:
      if (command.startsWith("-")) {
        throw new UsageError(`Unknown flag "${command}"`);
      }
      throw new UsageError(`Unknown command "${command}"`);
  }
}
