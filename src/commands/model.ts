import type { Pipeline, Transform } from "../contracts";
import type { ModelArgs } from "../cli/parseArgs";
import { UsageError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { EXIT_OK } from "../pipeline/report";
import { assetKindOf } from "../pipeline/rules";
import { estimateLodLevels, modelInfo } from "../processors/model";
import type { CommandContext } from "./context";
import { printModelInfo, readSource } from "./info";
import { defaultOutputPath, runSingleFile } from "./single";

const log = createLogger("model");

/**
 * Steps for a single-model run. LOD generation needs a mesh simplifier,
 * so `--lod` only reports the suggested levels and the output holds LOD 0.
 */
export function modelPipeline(args: ModelArgs): Pipeline {
  const steps: Transform[] = [];
  if (args.compress) steps.push({ op: "bufferCompress", method: "draco" });
  steps.push({ op: "encode", format: "glb" });
  return { kind: "model", format: "glb", steps };
}

/** Repack a glTF/GLB model, or print its statistics with --info. */
export async function runModel(args: ModelArgs, ctx: CommandContext): Promise<number> {
  if (assetKindOf(args.input) !== "model") {
    throw new UsageError(`'model' expects a .gltf or .glb file, got ${args.input}`);
  }
  if (args.info) {
    printModelInfo(await readSource(args.input), log);
    return EXIT_OK;
  }
  if (args.lod) {
    log.info(`LOD generation (${args.lodCount} levels, ${Math.round(args.lodRatio * 100)}% ratio)`);
    const levels = estimateLodLevels(modelInfo(await readSource(args.input)));
    for (const lod of levels.slice(0, args.lodCount + 1)) {
      log.info(`  LOD ${lod.level}: ~${lod.triangles} triangles (distance: ${lod.distance})`);
    }
    log.warn("No mesh simplifier is available; writing LOD 0 only");
  }
  const pipeline = modelPipeline(args);
  const output = args.output ?? defaultOutputPath(args.input, pipeline.format);
  const { exitCode } = await runSingleFile(args.input, output, pipeline, ctx, log);
  return exitCode;
}
