import type { Pipeline, Transform } from "../contracts";
import type { AudioArgs } from "../cli/parseArgs";
import { UsageError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { EXIT_OK } from "../pipeline/report";
import { KIND_DEFAULTS, assetKindOf } from "../pipeline/rules";
import type { CommandContext } from "./context";
import { printAudioInfo, readSource } from "./info";
import { defaultOutputPath, runSingleFile } from "./single";

const log = createLogger("audio");

export function audioPipeline(args: AudioArgs): Pipeline {
  const steps: Transform[] = [];
  if (args.normalize) steps.push({ op: "normalize", peak: KIND_DEFAULTS.normalizePeak });
  if (args.sampleRate !== undefined) steps.push({ op: "resample", sampleRate: args.sampleRate });
  steps.push({ op: "encode", format: args.format, quality: args.quality });
  return { kind: "audio", format: args.format, steps };
}

/** Re-encode one audio clip, or print its properties with --info. */
export async function runAudio(args: AudioArgs, ctx: CommandContext): Promise<number> {
  if (assetKindOf(args.input) !== "audio") {
    throw new UsageError(`'audio' expects a .wav file, got ${args.input}`);
  }
  if (args.info) {
    printAudioInfo(await readSource(args.input), log);
    return EXIT_OK;
  }
  const pipeline = audioPipeline(args);
  const output = args.output ?? defaultOutputPath(args.input, pipeline.format);
  const { exitCode } = await runSingleFile(args.input, output, pipeline, ctx, log);
  return exitCode;
}
