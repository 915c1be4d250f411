/**
 * Processor registry: maps asset kinds to codec implementations.
 *
 * Adding a new codec:
 * 1. Implement Processor in src/processors/<kind>.ts
 * 2. Register it here
 */

import type { AssetKind, Pipeline } from "../contracts";
import { ProcessorError, errorMessage } from "../lib/errors";
import { createAudioProcessor } from "./audio";
import { createImageProcessor } from "./image";
import { createModelProcessor } from "./model";
import type { Processor, ProcessorSet } from "./types";

export type { Processor, ProcessorSet };

type ProcessorFactory = () => Processor;

const REGISTRY: Record<AssetKind, ProcessorFactory> = {
  image: createImageProcessor,
  model: createModelProcessor,
  audio: createAudioProcessor,
};

export function createDefaultProcessors(): ProcessorSet {
  return {
    image: REGISTRY.image(),
    model: REGISTRY.model(),
    audio: REGISTRY.audio(),
  };
}

/**
 * Fold a pipeline's steps over the input bytes. Any failure that is not
 * already a ProcessorError (a codec throwing on corrupt input, say) is
 * wrapped in one naming the step.
 */
export async function runPipeline(
  input: Buffer,
  pipeline: Pipeline,
  processors: ProcessorSet
): Promise<Buffer> {
  if (pipeline.kind === "none") {
    throw new ProcessorError("pipeline", "no-op pipeline has nothing to build");
  }
  const processor = processors[pipeline.kind];
  let bytes = input;
  for (const step of pipeline.steps) {
    try {
      bytes = await processor.transform(bytes, step);
    } catch (err) {
      if (err instanceof ProcessorError) throw err;
      throw new ProcessorError(step.op, errorMessage(err));
    }
  }
  return bytes;
}
