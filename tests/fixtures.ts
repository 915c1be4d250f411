import sharp from "sharp";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import type { AssetKind, Transform } from "../src/contracts";
import type { Processor, ProcessorSet } from "../src/processors/types";

/**
 * Create an empty temporary directory. Caller is responsible for cleanup.
 */
export function createTempDir(prefix = "assetpress-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Remove a temporary directory and all contents.
 */
export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(root: string, relPath: string, data: Buffer | string): string {
  const full = path.join(root, ...relPath.split("/"));
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, data);
  return full;
}

// --- Images ---

export interface PngOptions {
  width: number;
  height: number;
  color?: { r: number; g: number; b: number; alpha?: number };
}

/** Solid-colour RGBA PNG. */
export async function createPng(options: PngOptions): Promise<Buffer> {
  const color = options.color ?? { r: 34, g: 139, b: 34 };
  return sharp({
    create: {
      width: options.width,
      height: options.height,
      channels: 4,
      background: { r: color.r, g: color.g, b: color.b, alpha: color.alpha ?? 1 },
    },
  })
    .png()
    .toBuffer();
}

/**
 * Transparent PNG with an opaque block at (x, y) of size w x h.
 */
export async function createSpritePng(
  width: number,
  height: number,
  block: { x: number; y: number; w: number; h: number }
): Promise<Buffer> {
  const data = Buffer.alloc(width * height * 4);
  for (let y = block.y; y < block.y + block.h; y++) {
    for (let x = block.x; x < block.x + block.w; x++) {
      const i = (y * width + x) * 4;
      data[i] = 200;
      data[i + 1] = 40;
      data[i + 2] = 40;
      data[i + 3] = 255;
    }
  }
  return sharp(data, { raw: { width, height, channels: 4 } }).png().toBuffer();
}

// --- Audio ---

/**
 * 16-bit PCM WAV holding `frames` frames of a constant `level` per channel.
 */
export function createWav(options: {
  sampleRate?: number;
  channels?: number;
  frames: number;
  level?: number;
}): Buffer {
  const sampleRate = options.sampleRate ?? 8000;
  const channels = options.channels ?? 1;
  const sample = Math.round((options.level ?? 0.25) * 32767);
  const dataBytes = options.frames * channels * 2;
  const out = Buffer.alloc(44 + dataBytes);
  out.write("RIFF", 0, "ascii");
  out.writeUInt32LE(36 + dataBytes, 4);
  out.write("WAVE", 8, "ascii");
  out.write("fmt ", 12, "ascii");
  out.writeUInt32LE(16, 16);
  out.writeUInt16LE(1, 20);
  out.writeUInt16LE(channels, 22);
  out.writeUInt32LE(sampleRate, 24);
  out.writeUInt32LE(sampleRate * channels * 2, 28);
  out.writeUInt16LE(channels * 2, 32);
  out.writeUInt16LE(16, 34);
  out.write("data", 36, "ascii");
  out.writeUInt32LE(dataBytes, 40);
  for (let i = 0; i < options.frames * channels; i++) {
    out.writeInt16LE(sample, 44 + i * 2);
  }
  return out;
}

// --- Models ---

/**
 * A single indexed triangle as a glTF document with an embedded buffer.
 * Positions take 36 bytes, indices 6.
 */
export function createTriangleGltf(): Record<string, unknown> {
  const positions = Buffer.alloc(36);
  [0, 0, 0, 1, 0, 0, 0, 1, 0].forEach((v, i) => positions.writeFloatLE(v, i * 4));
  const indices = Buffer.alloc(6);
  [0, 1, 2].forEach((v, i) => indices.writeUInt16LE(v, i * 2));
  const data = Buffer.concat([positions, indices]);

  return {
    asset: { version: "2.0" },
    scene: 0,
    scenes: [{ nodes: [0] }],
    nodes: [{ mesh: 0 }],
    meshes: [{ primitives: [{ attributes: { POSITION: 0 }, indices: 1 }] }],
    accessors: [
      { bufferView: 0, componentType: 5126, count: 3, type: "VEC3", min: [0, 0, 0], max: [1, 1, 0] },
      { bufferView: 1, componentType: 5123, count: 3, type: "SCALAR" },
    ],
    bufferViews: [
      { buffer: 0, byteOffset: 0, byteLength: 36 },
      { buffer: 0, byteOffset: 36, byteLength: 6 },
    ],
    buffers: [
      {
        byteLength: data.length,
        uri: `data:application/octet-stream;base64,${data.toString("base64")}`,
      },
    ],
  };
}

// --- Processors ---

export interface CountingProcessors {
  processors: ProcessorSet;
  /** Calls per kind. */
  calls: Record<AssetKind, number>;
}

/**
 * Wrap a processor set so tests can count calls and make chosen inputs
 * fail. `failWhen` sees the input bytes of every step.
 */
export function countingProcessors(
  inner: ProcessorSet,
  failWhen?: (input: Buffer, step: Transform) => boolean
): CountingProcessors {
  const calls: Record<AssetKind, number> = { image: 0, model: 0, audio: 0 };
  const wrap = (processor: Processor): Processor => ({
    kind: processor.kind,
    async transform(input: Buffer, step: Transform): Promise<Buffer> {
      calls[processor.kind]++;
      if (failWhen?.(input, step)) {
        throw new Error(`injected failure at ${step.op}`);
      }
      return processor.transform(input, step);
    },
  });
  return {
    processors: { image: wrap(inner.image), model: wrap(inner.model), audio: wrap(inner.audio) },
    calls,
  };
}

/**
 * Processors that copy their input. Useful where only scheduling matters.
 */
export function passthroughProcessors(): ProcessorSet {
  const make = (kind: AssetKind): Processor => ({
    kind,
    async transform(input: Buffer): Promise<Buffer> {
      return input;
    },
  });
  return { image: make("image"), model: make("model"), audio: make("audio") };
}
