import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { defaultConfig, type Rule } from "../../src/config/schema";
import { ConfigError } from "../../src/lib/errors";
import { Planner } from "../../src/pipeline/planner";
import { RuleEngine } from "../../src/pipeline/rules";
import { createPng, createTempDir, cleanupTempDir, writeFile } from "../fixtures";

const SPRITE_RULE: Rule = { pattern: "sprites/*.png", override: { atlas: true, padding: 1 } };

function planner(root: string, rules: Rule[] = [SPRITE_RULE]): Planner {
  const config = defaultConfig();
  config.rules = rules;
  const outputDir = path.join(root, "out");
  return new Planner({
    sourceDir: path.join(root, "assets"),
    outputDir,
    rules: new RuleEngine(config, { preset: "desktop", outputRoot: outputDir }),
  });
}

describe("Planner", () => {
  let root: string;
  let assets: string;

  beforeAll(async () => {
    root = createTempDir();
    assets = path.join(root, "assets");
    const png = await createPng({ width: 8, height: 8 });
    writeFile(assets, "textures/rock.png", png);
    writeFile(assets, "sprites/gem.png", png);
    writeFile(assets, "sprites/coin.png", png);
    writeFile(assets, "notes.txt", "not an asset");
    writeFile(assets, ".hidden.png", png);
  });

  afterAll(() => {
    cleanupTempDir(root);
  });

  it("plans one job per asset and one per atlas group", async () => {
    const plan = await planner(root).planAll();

    expect(plan.jobs.map((j) => j.id)).toEqual(["sprites.png", "textures/rock.png"]);
    expect(plan.skipped).toEqual(["notes.txt"]);
    expect(plan.sources).toEqual(["sprites/coin.png", "sprites/gem.png", "textures/rock.png"]);
    expect(plan.failures).toEqual([]);

    const atlas = plan.jobs[0];
    expect(atlas.type).toBe("atlas");
    if (atlas.type === "atlas") {
      expect(atlas.groupId).toBe("sprites");
      expect(atlas.members.map((m) => m.relPath)).toEqual(["sprites/coin.png", "sprites/gem.png"]);
      expect(atlas.outputPath).toBe(path.join(root, "out", "sprites.png"));
      expect(atlas.metadataPath).toBe(path.join(root, "out", "sprites.json"));
      expect(atlas.settings.padding).toBe(1);
    }

    const asset = plan.jobs[1];
    expect(asset.type).toBe("asset");
    if (asset.type === "asset") {
      expect(asset.record.relPath).toBe("textures/rock.png");
      expect(asset.record.contentHash).toMatch(/^[0-9a-f]{64}$/);
      expect(asset.outputPath).toBe(path.join(root, "out", "textures", "rock.png"));
    }
  });

  it("fails when the source directory is missing", async () => {
    const p = new Planner({
      sourceDir: path.join(root, "nope"),
      outputDir: path.join(root, "out"),
      rules: new RuleEngine(defaultConfig(), { preset: "desktop", outputRoot: path.join(root, "out") }),
    });
    await expect(p.planAll()).rejects.toThrow(ConfigError);
  });

  it("refuses two sources writing one output", async () => {
    const p = planner(root, [{ pattern: "**/*.png", override: { output: "all.png" } }]);
    await expect(p.planAll()).rejects.toThrow("Output path collision");
  });

  it("re-plans only the changed paths", async () => {
    const plan = await planner(root).planPaths([path.join(assets, "textures", "rock.png")]);
    expect(plan.jobs.map((j) => j.id)).toEqual(["textures/rock.png"]);
    expect(plan.removed).toEqual([]);
  });

  it("re-plans a whole atlas group when one sprite changes", async () => {
    const plan = await planner(root).planPaths([path.join(assets, "sprites", "gem.png")]);
    expect(plan.jobs).toHaveLength(1);
    const job = plan.jobs[0];
    expect(job.type === "atlas" ? job.members.map((m) => m.relPath) : []).toEqual([
      "sprites/coin.png",
      "sprites/gem.png",
    ]);
  });

  it("reports deleted files and ignores hidden or foreign paths", async () => {
    const plan = await planner(root).planPaths([
      path.join(assets, "textures", "gone.png"),
      path.join(assets, ".hidden.png"),
      path.join(root, "elsewhere.png"),
    ]);
    expect(plan.jobs).toEqual([]);
    expect(plan.removed).toEqual(["textures/gone.png"]);
  });

  it("reports an emptied atlas group as removed", async () => {
    const emptied = path.join(assets, "sprites-old");
    fs.mkdirSync(emptied, { recursive: true });
    const p = planner(root, [{ pattern: "sprites-old/*.png", override: { atlas: true } }]);
    const plan = await p.planPaths([path.join(emptied, "a.png")]);
    expect(plan.jobs).toEqual([]);
    expect(plan.removed).toEqual(["sprites-old"]);
  });
});

describe("Planner output collisions on re-plan", () => {
  let root: string;
  let assets: string;

  beforeAll(async () => {
    root = createTempDir();
    assets = path.join(root, "assets");
    const png = await createPng({ width: 4, height: 4 });
    writeFile(assets, "sprites/coin.png", png);
    writeFile(assets, "sprites/gem.png", png);
    writeFile(assets, "sprites.png", png);
  });

  afterAll(() => {
    cleanupTempDir(root);
  });

  it("rejects the tree on a full plan", async () => {
    await expect(planner(root).planAll()).rejects.toBeInstanceOf(ConfigError);
  });

  it("fails a changed file whose output an atlas group already writes", async () => {
    const plan = await planner(root).planPaths([path.join(assets, "sprites.png")]);
    expect(plan.jobs).toEqual([]);
    expect(plan.failures.map((f) => [f.id, f.source])).toEqual([["sprites.png", "sprites.png"]]);
    const error = plan.failures[0].error;
    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError ? error.problems : []).toEqual([
      "atlas group sprites and sprites.png both write sprites.png",
    ]);
  });

  it("fails a changed atlas group whose image another source writes", async () => {
    const plan = await planner(root).planPaths([path.join(assets, "sprites", "gem.png")]);
    expect(plan.jobs).toEqual([]);
    expect(plan.failures.map((f) => f.source)).toEqual(["atlas group sprites"]);
    expect(plan.failures[0].error.message).toContain("sprites.png and atlas group sprites both write sprites.png");
  });
});
