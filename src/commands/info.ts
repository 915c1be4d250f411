import * as fs from "fs";
import * as path from "path";
import type { InfoArgs } from "../cli/parseArgs";
import { AssetIOError, errorMessage } from "../lib/errors";
import { formatSize } from "../lib/format";
import { createLogger, type Logger } from "../lib/logger";
import { EXIT_OK } from "../pipeline/report";
import { assetKindOf } from "../pipeline/rules";
import { audioInfo } from "../processors/audio";
import { imageInfo } from "../processors/image";
import { estimateLodLevels, modelInfo } from "../processors/model";
import type { CommandContext } from "./context";

const log = createLogger("info");

export async function readSource(filePath: string): Promise<Buffer> {
  try {
    return await fs.promises.readFile(filePath);
  } catch (err) {
    throw new AssetIOError(filePath, `cannot read: ${errorMessage(err)}`);
  }
}

export function printModelInfo(input: Buffer, out: Logger): void {
  const info = modelInfo(input);
  out.info(`Container: ${info.container}`);
  out.info(`Meshes: ${info.meshes} (${info.primitives} primitives)`);
  out.info(`Vertices: ${info.vertices}`);
  out.info(`Indices: ${info.indices}`);
  out.info(`Triangles: ${info.triangles}`);
  out.info(`Materials: ${info.materials}`);
  out.info(`Textures: ${info.textures}`);
  out.info(`Animations: ${info.animations}`);
  out.info(`Nodes: ${info.nodes}`);
  out.info(`Binary data: ${formatSize(info.binaryBytes)}`);

  const levels = estimateLodLevels(info);
  if (levels.length > 1) {
    out.info("Recommended LOD levels:");
    for (const lod of levels) {
      out.info(
        `  LOD ${lod.level}: ${Math.round(lod.vertexRatio * 100)}% vertices ` +
          `(~${lod.triangles} triangles) at distance ${lod.distance}`
      );
    }
  }
}

export function printAudioInfo(input: Buffer, out: Logger): void {
  const info = audioInfo(input);
  out.info(`Channels: ${info.channels}`);
  out.info(`Sample rate: ${info.sampleRate} Hz`);
  out.info(`Bits per sample: ${info.bitsPerSample}`);
  out.info(`Duration: ${info.durationSecs.toFixed(2)}s (${info.frames} frames)`);
  out.info(`Bitrate: ${Math.round(info.bitrate / 1000)} kbps`);
}

/** Print size, kind and kind-specific details of one asset file. */
export async function runInfo(args: InfoArgs, _ctx: CommandContext): Promise<number> {
  const input = await readSource(args.input);
  const kind = assetKindOf(args.input);

  log.info(`File: ${path.basename(args.input)}`);
  log.info(`Size: ${formatSize(input.length)}`);
  log.info(`Type: ${kind ?? "unknown"}`);

  switch (kind) {
    case "image": {
      const info = await imageInfo(input);
      log.info(`Format: ${info.format}`);
      log.info(`Dimensions: ${info.width}x${info.height}`);
      log.info(`Channels: ${info.channels}${info.hasAlpha ? " (alpha)" : ""}`);
      break;
    }
    case "model":
      printModelInfo(input, log);
      break;
    case "audio":
      printAudioInfo(input, log);
      break;
    case null:
      break;
  }
  return EXIT_OK;
}
