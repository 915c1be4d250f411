import * as path from "path";
import { loadConfig, readEnvSettings, type LoadedConfig } from "../config/loader";
import { DEFAULT_PRESET } from "../config/schema";
import { createLogger } from "../lib/logger";
import { CacheStore } from "../pipeline/cache";
import { Planner } from "../pipeline/planner";
import { RuleEngine } from "../pipeline/rules";
import { Scheduler, defaultConcurrency } from "../pipeline/scheduler";
import { createDefaultProcessors } from "../processors";
import type { CommandContext } from "./context";

const log = createLogger("build");

export interface SessionOptions {
  input?: string;
  output?: string;
  preset?: string;
  config?: string;
  jobs?: number;
  force?: boolean;
  dryRun?: boolean;
}

/** Everything one build or watch invocation shares. */
export interface BuildSession {
  loaded: LoadedConfig;
  sourceDir: string;
  outputDir: string;
  rules: RuleEngine;
  planner: Planner;
  cache: CacheStore;
  scheduler: Scheduler;
  concurrency: number;
}

/**
 * Resolve config, flags and environment into the collaborators of a build.
 * Precedence: flags, then environment, then the config file.
 * The cache is created but not loaded; the caller owns load and flush.
 */
export function openBuildSession(options: SessionOptions, ctx: CommandContext): BuildSession {
  const env = readEnvSettings(ctx.env);
  const loaded = loadConfig({
    cwd: ctx.cwd,
    configPath: options.config,
    allowMissing: options.input !== undefined,
    env: ctx.env,
  });
  for (const warning of loaded.warnings) log.warn(warning);

  const sourceDir = options.input !== undefined ? path.resolve(ctx.cwd, options.input) : loaded.sourceDir;
  const outputDir = options.output !== undefined ? path.resolve(ctx.cwd, options.output) : loaded.outputDir;
  const rules = new RuleEngine(loaded.config, {
    preset: options.preset ?? DEFAULT_PRESET,
    outputRoot: outputDir,
  });
  const cache = new CacheStore({
    directory: loaded.cacheDir,
    enabled: loaded.config.cache.enabled,
    now: ctx.now,
  });
  const planner = new Planner({
    sourceDir,
    outputDir,
    rules,
    ignore: [outputDir, loaded.cacheDir],
  });
  const concurrency = options.jobs ?? env.jobs ?? defaultConcurrency();
  const scheduler = new Scheduler({
    cache,
    processors: ctx.processors ?? createDefaultProcessors(),
    concurrency,
    dryRun: options.dryRun,
    force: options.force,
  });

  return { loaded, sourceDir, outputDir, rules, planner, cache, scheduler, concurrency };
}
