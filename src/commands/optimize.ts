import type { Pipeline, Transform } from "../contracts";
import { QUALITY_VALUES, type OptimizeArgs } from "../cli/parseArgs";
import { UsageError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { assetKindOf, sourceImageFormat } from "../pipeline/rules";
import type { CommandContext } from "./context";
import { defaultOutputPath, runSingleFile } from "./single";

const log = createLogger("optimize");

export function optimizePipeline(args: OptimizeArgs): Pipeline {
  const format = args.format ?? sourceImageFormat(args.input);
  const steps: Transform[] = [];
  if (args.mipmap) steps.push({ op: "generateMip" });
  steps.push({ op: "recompress", format, quality: QUALITY_VALUES[args.quality], lossless: false });
  return { kind: "image", format, steps };
}

/** Recompress one texture. */
export async function runOptimize(args: OptimizeArgs, ctx: CommandContext): Promise<number> {
  if (assetKindOf(args.input) !== "image") {
    throw new UsageError(`'optimize' expects an image file, got ${args.input}`);
  }
  const pipeline = optimizePipeline(args);
  const output = args.output ?? defaultOutputPath(args.input, pipeline.format);
  const { exitCode } = await runSingleFile(args.input, output, pipeline, ctx, log);
  return exitCode;
}
