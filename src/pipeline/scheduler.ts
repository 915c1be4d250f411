import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type {
  AssetJob,
  AtlasJob,
  BuildJob,
  BuildReport,
  JobOutcome,
} from "../contracts";
import { buildAtlas, type SpriteSource } from "../atlas/compose";
import { writeFileAtomic } from "../lib/atomicWrite";
import { AssetIOError, errorMessage } from "../lib/errors";
import { sha256 } from "../lib/hash";
import { createLogger } from "../lib/logger";
import { runPipeline } from "../processors";
import type { ProcessorSet } from "../processors/types";
import type { CacheStore } from "./cache";
import { classifyError, createReport } from "./report";
import { atlasSignature, combinedMemberHash, computeCacheKey, pipelineSignature } from "./signature";

const log = createLogger("build");

export interface SchedulerOptions {
  cache: CacheStore;
  processors: ProcessorSet;
  /** Worker count; defaults to the available parallelism. */
  concurrency?: number;
  /** Decide hit/miss only; never run a processor or write a file. */
  dryRun?: boolean;
  /** Rebuild even when the cache has a valid entry. */
  force?: boolean;
  onOutcome?: (outcome: JobOutcome) => void;
}

export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism());
}

/** Cache key for a job, from its inputs, pipeline and output path. */
export function cacheKeyFor(job: BuildJob): string {
  if (job.type === "asset") {
    return computeCacheKey(job.record.contentHash, pipelineSignature(job.pipeline), job.id);
  }
  const members = job.members.map((m) => ({ id: m.relPath, contentHash: m.contentHash }));
  return computeCacheKey(combinedMemberHash(members), atlasSignature(job.settings), job.id);
}

function sourcesOf(job: BuildJob): string[] {
  return job.type === "asset" ? [job.record.relPath] : job.members.map((m) => m.relPath);
}

function inputBytesOf(job: BuildJob): number {
  return job.type === "asset" ? job.record.size : job.members.reduce((sum, m) => sum + m.size, 0);
}

function outputsOf(job: BuildJob): string[] {
  return job.type === "asset" ? [job.outputPath] : [job.outputPath, job.metadataPath];
}

/** Size of the first output when every output exists, else null. */
async function existingOutputSize(paths: string[]): Promise<number | null> {
  let first: number | null = null;
  for (const p of paths) {
    try {
      const stat = await fs.promises.stat(p);
      if (!stat.isFile()) return null;
      if (first === null) first = stat.size;
    } catch {
      return null;
    }
  }
  return first;
}

async function readInput(filePath: string): Promise<Buffer> {
  try {
    return await fs.promises.readFile(filePath);
  } catch (err) {
    throw new AssetIOError(filePath, `cannot read: ${errorMessage(err)}`);
  }
}

async function writeOutput(filePath: string, data: Buffer | string): Promise<void> {
  try {
    await writeFileAtomic(filePath, data);
  } catch (err) {
    throw new AssetIOError(filePath, `cannot write: ${errorMessage(err)}`);
  }
}

/**
 * Runs BuildJobs over a bounded pool of async workers.
 *
 * Each worker pulls the next undispatched job. A job failure is recorded
 * in its outcome and never stops the other workers. Aborting the signal
 * stops dispatch; jobs already running finish (their writes are atomic)
 * and the rest are reported as cancelled.
 */
export class Scheduler {
  private readonly cache: CacheStore;
  private readonly processors: ProcessorSet;
  private readonly concurrency: number;
  private readonly dryRun: boolean;
  private readonly force: boolean;
  private readonly onOutcome?: (outcome: JobOutcome) => void;

  constructor(options: SchedulerOptions) {
    this.cache = options.cache;
    this.processors = options.processors;
    this.concurrency = Math.max(1, options.concurrency ?? defaultConcurrency());
    this.dryRun = options.dryRun ?? false;
    this.force = options.force ?? false;
    this.onOutcome = options.onOutcome;
  }

  async submit(jobs: BuildJob[], signal?: AbortSignal): Promise<BuildReport> {
    const outcomes: Array<JobOutcome | undefined> = new Array(jobs.length).fill(undefined);
    let next = 0;

    const worker = async (): Promise<void> => {
      for (;;) {
        if (signal?.aborted) return;
        const index = next++;
        if (index >= jobs.length) return;
        const outcome = await this.runJob(jobs[index]);
        outcomes[index] = outcome;
        this.onOutcome?.(outcome);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, jobs.length) }, () => worker());
    await Promise.all(workers);

    const finished = jobs.map((job, i) => outcomes[i] ?? this.cancelled(job));
    return createReport(finished, this.dryRun);
  }

  private cancelled(job: BuildJob): JobOutcome {
    return {
      id: job.id,
      type: job.type,
      sources: sourcesOf(job),
      status: "cancelled",
      inputBytes: inputBytesOf(job),
      outputBytes: 0,
      durationMs: 0,
    };
  }

  /** Never throws: every failure becomes a "failed" outcome. */
  private async runJob(job: BuildJob): Promise<JobOutcome> {
    const started = performance.now();
    const base = {
      id: job.id,
      type: job.type,
      sources: sourcesOf(job),
      inputBytes: inputBytesOf(job),
    };

    try {
      const key = cacheKeyFor(job);
      if (!this.force && this.cache.lookup(key) !== undefined) {
        const size = await existingOutputSize(outputsOf(job));
        if (size !== null) {
          log.debug(`cached ${job.id}`);
          return { ...base, status: "cached", outputBytes: size, durationMs: performance.now() - started };
        }
      }

      if (this.dryRun) {
        return { ...base, status: "planned", outputBytes: 0, durationMs: 0 };
      }

      const output = job.type === "asset"
        ? await this.buildAsset(job, key)
        : await this.buildAtlasJob(job, key);
      const durationMs = performance.now() - started;
      log.debug(`built ${job.id} (${Math.round(durationMs)}ms)`);
      return { ...base, status: "built", outputBytes: output.length, durationMs };
    } catch (err) {
      return {
        ...base,
        status: "failed",
        error: classifyError(err),
        outputBytes: 0,
        durationMs: performance.now() - started,
      };
    }
  }

  private async buildAsset(job: AssetJob, key: string): Promise<Buffer> {
    const input = await readInput(job.record.path);
    const output = await runPipeline(input, job.pipeline, this.processors);
    await writeOutput(job.outputPath, output);
    this.cache.commit({
      key,
      sourcePath: job.record.relPath,
      outputPath: job.id,
      outputHash: sha256(output),
      timestamp: this.cache.now(),
    });
    return output;
  }

  private async buildAtlasJob(job: AtlasJob, key: string): Promise<Buffer> {
    const sources: SpriteSource[] = [];
    for (const member of job.members) {
      sources.push({
        id: path.posix.basename(member.relPath, path.posix.extname(member.relPath)),
        bytes: await readInput(member.path),
      });
    }
    const { image, metadata } = await buildAtlas(
      sources,
      job.settings,
      path.basename(job.outputPath),
      this.processors
    );
    // Image before metadata
    await writeOutput(job.outputPath, image);
    await writeOutput(job.metadataPath, JSON.stringify(metadata, null, 2) + "\n");
    this.cache.commit({
      key,
      sourcePath: job.groupId,
      outputPath: job.id,
      outputHash: sha256(image),
      timestamp: this.cache.now(),
    });
    return image;
  }
}
