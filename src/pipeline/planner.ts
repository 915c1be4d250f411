import * as fs from "fs";
import * as path from "path";
import type {
  AssetJob,
  AssetRecord,
  AssetRoute,
  AtlasJob,
  AtlasSettings,
  BuildJob,
} from "../contracts";
import { isNotFound } from "../lib/dirSize";
import { AssetIOError, ConfigError, errorMessage } from "../lib/errors";
import { resolveUnder, toRelativePosix } from "../lib/pathSafety";
import type { RuleEngine } from "./rules";
import { isHiddenName, isWithin, readAssetRecord, scanSourceTree } from "./scan";

export interface PlannerOptions {
  sourceDir: string;
  outputDir: string;
  rules: RuleEngine;
  /** Directories never scanned (output and cache dirs when nested in the source). */
  ignore?: string[];
}

/** A source that could not be planned; reported as a failed job. */
export interface PlanFailure {
  id: string;
  source: string;
  error: AssetIOError | ConfigError;
}

export interface BuildPlan {
  jobs: BuildJob[];
  failures: PlanFailure[];
  /** Relative paths of every recognized source, for pruning stale cache entries. */
  sources: string[];
  /** Relative paths with no pipeline. */
  skipped: string[];
}

/** Result of planning a watch flush. */
export interface DirtyPlan {
  jobs: BuildJob[];
  failures: PlanFailure[];
  /** Cache sourcePaths to invalidate: deleted files and emptied atlas groups. */
  removed: string[];
}

interface AtlasGroup {
  id: string;
  members: AssetRecord[];
  /** Route of the first member in path order; decides the group's settings. */
  route: AssetRoute;
  firstRelPath: string;
}

/**
 * Turns source files into BuildJobs. Non-atlas files map one-to-one to
 * asset jobs; atlas sprites are grouped by directory into one atlas job
 * per group.
 */
export class Planner {
  readonly sourceDir: string;
  readonly outputDir: string;
  private readonly rules: RuleEngine;
  private readonly ignore: string[];

  constructor(options: PlannerOptions) {
    this.sourceDir = path.resolve(options.sourceDir);
    this.outputDir = path.resolve(options.outputDir);
    this.rules = options.rules;
    this.ignore = (options.ignore ?? []).map((d) => path.resolve(d));
  }

  /** True for paths the planner never turns into jobs. */
  isIgnored(filePath: string): boolean {
    const absolute = path.resolve(filePath);
    if (!isWithin(absolute, this.sourceDir) || absolute === this.sourceDir) return true;
    if (this.ignore.some((d) => isWithin(absolute, d))) return true;
    return toRelativePosix(this.sourceDir, absolute).split("/").some(isHiddenName);
  }

  relativePath(filePath: string): string {
    return toRelativePosix(this.sourceDir, path.resolve(filePath));
  }

  /** Plan a full build over the whole source tree. */
  async planAll(): Promise<BuildPlan> {
    if (!fs.existsSync(this.sourceDir) || !fs.statSync(this.sourceDir).isDirectory()) {
      throw new ConfigError(`Source directory not found: ${this.sourceDir}`);
    }
    const files = await scanSourceTree(this.sourceDir, this.ignore);
    const plan: BuildPlan = { jobs: [], failures: [], sources: [], skipped: [] };
    const groups = new Map<string, AtlasGroup>();

    for (const file of files) {
      const relPath = this.relativePath(file);
      const route = this.rules.route(relPath);
      if (route.pipeline.kind === "none") {
        plan.skipped.push(relPath);
        continue;
      }
      plan.sources.push(relPath);

      let record: AssetRecord;
      try {
        record = await readAssetRecord(this.sourceDir, file);
      } catch (err) {
        plan.failures.push(this.failure(route, relPath, err));
        continue;
      }

      if (route.atlasGroup !== null) {
        addToGroup(groups, route.atlasGroup, record, route);
      } else {
        plan.jobs.push(this.assetJob(record, route));
      }
    }

    for (const group of groups.values()) {
      plan.jobs.push(this.atlasJob(group));
    }
    assertUniqueOutputs(plan.jobs);
    plan.jobs.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return plan;
  }

  /**
   * Plan jobs for a set of changed paths. A changed atlas sprite re-plans
   * its whole group from the directory's current contents; a deleted
   * non-atlas source is reported for cache invalidation.
   */
  async planPaths(paths: Iterable<string>): Promise<DirtyPlan> {
    const plan: DirtyPlan = { jobs: [], failures: [], removed: [] };
    const dirtyGroups = new Set<string>();

    for (const filePath of [...new Set(paths)].sort()) {
      if (this.isIgnored(filePath)) continue;
      const relPath = this.relativePath(filePath);
      const route = this.rules.route(relPath);
      if (route.pipeline.kind === "none") continue;

      if (route.atlasGroup !== null) {
        dirtyGroups.add(route.atlasGroup);
        continue;
      }
      if (!fs.existsSync(filePath)) {
        plan.removed.push(relPath);
        continue;
      }
      try {
        plan.jobs.push(this.assetJob(await readAssetRecord(this.sourceDir, filePath), route));
      } catch (err) {
        plan.failures.push(this.failure(route, relPath, err));
      }
    }

    for (const groupId of [...dirtyGroups].sort()) {
      let group: AtlasGroup | null;
      try {
        group = await this.collectGroup(groupId);
      } catch (err) {
        const error = err instanceof AssetIOError ? err : new AssetIOError(groupId, errorMessage(err));
        plan.failures.push({ id: groupId, source: groupId, error });
        continue;
      }
      if (group === null) {
        plan.removed.push(groupId);
      } else {
        plan.jobs.push(this.atlasJob(group));
      }
    }
    if (plan.jobs.length > 0) {
      const owners = await this.outputOwners();
      plan.jobs = plan.jobs.filter((job) => {
        const clash = findCollision(job, owners);
        if (clash === null) return true;
        plan.failures.push({ id: job.id, source: jobSource(job), error: new ConfigError("Output path collision", [clash]) });
        return false;
      });
    }
    return plan;
  }

  /**
   * Every output id the current source tree would write, with the sources
   * that claim it. Routes only; no file contents are read.
   */
  private async outputOwners(): Promise<Map<string, string[]>> {
    const owners = new Map<string, string[]>();
    const claim = (id: string, source: string): void => {
      const list = owners.get(id);
      if (list === undefined) owners.set(id, [source]);
      else if (!list.includes(source)) list.push(source);
    };
    const groups = new Map<string, { route: AssetRoute; firstRelPath: string }>();

    for (const file of await scanSourceTree(this.sourceDir, this.ignore)) {
      const relPath = this.relativePath(file);
      const route = this.rules.route(relPath);
      if (route.pipeline.kind === "none") continue;
      if (route.atlasGroup === null) {
        claim(route.outputPath, relPath);
        continue;
      }
      const group = groups.get(route.atlasGroup);
      if (group === undefined || relPath < group.firstRelPath) {
        groups.set(route.atlasGroup, { route, firstRelPath: relPath });
      }
    }
    for (const [groupId, group] of groups) {
      const source = `atlas group ${groupId}`;
      claim(group.route.outputPath, source);
      claim(`${groupId}.json`, source);
    }
    return owners;
  }

  /** Current members of one atlas group, read from its directory. */
  private async collectGroup(groupId: string): Promise<AtlasGroup | null> {
    // Root-level sprites share the "atlas" id with a top-level atlas/ directory
    const dirs = groupId === "atlas" ? [".", "atlas"] : [groupId];
    const groups = new Map<string, AtlasGroup>();

    for (const dirRel of dirs) {
      const dir = path.resolve(this.sourceDir, ...dirRel.split("/"));
      let names: string[];
      try {
        names = (await fs.promises.readdir(dir, { withFileTypes: true }))
          .filter((e) => e.isFile() && !isHiddenName(e.name))
          .map((e) => e.name)
          .sort();
      } catch (err) {
        // Directory removed along with its sprites
        if (isNotFound(err)) continue;
        throw new AssetIOError(dir, `cannot list directory: ${errorMessage(err)}`);
      }
      for (const name of names) {
        const file = path.join(dir, name);
        if (this.isIgnored(file)) continue;
        const relPath = this.relativePath(file);
        const route = this.rules.route(relPath);
        if (route.atlasGroup !== groupId) continue;
        addToGroup(groups, groupId, await readAssetRecord(this.sourceDir, file), route);
      }
    }
    return groups.get(groupId) ?? null;
  }

  private assetJob(record: AssetRecord, route: AssetRoute): AssetJob {
    return {
      type: "asset",
      id: route.outputPath,
      record,
      pipeline: route.pipeline,
      outputPath: resolveUnder(this.outputDir, route.outputPath, `Output for ${record.relPath}`),
    };
  }

  private atlasJob(group: AtlasGroup): AtlasJob {
    const settings: AtlasSettings | null = group.route.atlas;
    if (settings === null) {
      throw new ConfigError(`Atlas group ${group.id} has no atlas settings`);
    }
    const id = group.route.outputPath;
    const metadataRel = `${group.id}.json`;
    return {
      type: "atlas",
      id,
      groupId: group.id,
      members: [...group.members].sort((a, b) => (a.relPath < b.relPath ? -1 : a.relPath > b.relPath ? 1 : 0)),
      settings,
      outputPath: resolveUnder(this.outputDir, id, `Atlas ${group.id}`),
      metadataPath: resolveUnder(this.outputDir, metadataRel, `Atlas metadata ${group.id}`),
    };
  }

  private failure(route: AssetRoute, relPath: string, err: unknown): PlanFailure {
    const error = err instanceof AssetIOError ? err : new AssetIOError(relPath, errorMessage(err));
    return { id: route.outputPath, source: relPath, error };
  }
}

function addToGroup(groups: Map<string, AtlasGroup>, id: string, record: AssetRecord, route: AssetRoute): void {
  const existing = groups.get(id);
  if (existing === undefined) {
    groups.set(id, { id, members: [record], route, firstRelPath: record.relPath });
    return;
  }
  existing.members.push(record);
  if (record.relPath < existing.firstRelPath) {
    existing.route = route;
    existing.firstRelPath = record.relPath;
  }
}

function jobSource(job: BuildJob): string {
  return job.type === "asset" ? job.record.relPath : `atlas group ${job.groupId}`;
}

/** First output of `job` that another current source also writes, described. */
function findCollision(job: BuildJob, owners: Map<string, string[]>): string | null {
  const source = jobSource(job);
  const ids = job.type === "atlas" ? [job.id, `${job.groupId}.json`] : [job.id];
  for (const id of ids) {
    const other = (owners.get(id) ?? []).find((owner) => owner !== source);
    if (other !== undefined) return `${other} and ${source} both write ${id}`;
  }
  return null;
}

/** Two sources writing the same output would race; refuse before building. */
function assertUniqueOutputs(jobs: BuildJob[]): void {
  const seen = new Map<string, string>();
  const problems: string[] = [];
  for (const job of jobs) {
    const source = jobSource(job);
    const other = seen.get(job.id);
    if (other !== undefined) {
      problems.push(`${other} and ${source} both write ${job.id}`);
    } else {
      seen.set(job.id, source);
    }
    if (job.type === "atlas") {
      const metadataId = `${job.groupId}.json`;
      const owner = seen.get(metadataId);
      if (owner !== undefined) problems.push(`${owner} and ${source} both write ${metadataId}`);
      seen.set(metadataId, source);
    }
  }
  if (problems.length > 0) {
    throw new ConfigError("Output path collision", problems);
  }
}
