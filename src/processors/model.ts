import type { Transform } from "../contracts";
import { isRecord } from "../config/schema";
import { assertNever } from "../lib/assertNever";
import { ProcessorError } from "../lib/errors";
import type { Processor } from "./types";

// --- GLB Container ---

const GLB_MAGIC = 0x46546c67; // "glTF"
const GLB_VERSION = 2;
const CHUNK_JSON = 0x4e4f534a; // "JSON"
const CHUNK_BIN = 0x004e4942; // "BIN\0"
const HEADER_BYTES = 12;
const CHUNK_HEADER_BYTES = 8;

const DATA_URI_PREFIXES = [
  "data:application/octet-stream;base64,",
  "data:application/gltf-buffer;base64,",
];

type GltfDocument = Record<string, unknown>;

interface GlbParts {
  json: GltfDocument;
  bin: Buffer | null;
}

function pad4(n: number): number {
  return (n + 3) & ~3;
}

export function isGlb(input: Buffer): boolean {
  return input.length >= HEADER_BYTES && input.readUInt32LE(0) === GLB_MAGIC;
}

function parseJsonDocument(text: string, step: string): GltfDocument {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new ProcessorError(step, `invalid glTF JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(doc) || !isRecord(doc.asset)) {
    throw new ProcessorError(step, "not a glTF document (missing asset)");
  }
  return doc;
}

/** Split a GLB container into its JSON document and optional BIN chunk. */
export function readGlb(input: Buffer, step = "decode"): GlbParts {
  if (!isGlb(input)) throw new ProcessorError(step, "missing glTF magic");
  const version = input.readUInt32LE(4);
  if (version !== GLB_VERSION) {
    throw new ProcessorError(step, `unsupported GLB version ${version}`);
  }
  const length = input.readUInt32LE(8);
  if (length !== input.length) {
    throw new ProcessorError(step, `GLB length field ${length} does not match ${input.length} bytes`);
  }

  let offset = HEADER_BYTES;
  let json: GltfDocument | null = null;
  let bin: Buffer | null = null;
  while (offset + CHUNK_HEADER_BYTES <= input.length) {
    const chunkLength = input.readUInt32LE(offset);
    const chunkType = input.readUInt32LE(offset + 4);
    const start = offset + CHUNK_HEADER_BYTES;
    const end = start + chunkLength;
    if (end > input.length) throw new ProcessorError(step, "truncated GLB chunk");
    if (chunkType === CHUNK_JSON && json === null) {
      json = parseJsonDocument(input.subarray(start, end).toString("utf-8"), step);
    } else if (chunkType === CHUNK_BIN && bin === null) {
      bin = input.subarray(start, end);
    }
    offset = end;
  }
  if (json === null) throw new ProcessorError(step, "GLB has no JSON chunk");
  return { json, bin };
}

/** Serialize a document and binary payload into a GLB container. */
export function writeGlb(json: GltfDocument, bin: Buffer | null): Buffer {
  const jsonBytes = Buffer.from(JSON.stringify(json), "utf-8");
  const jsonChunk = Buffer.alloc(pad4(jsonBytes.length), 0x20);
  jsonBytes.copy(jsonChunk);

  const chunks: Buffer[] = [chunkHeader(jsonChunk.length, CHUNK_JSON), jsonChunk];
  if (bin !== null && bin.length > 0) {
    const binChunk = Buffer.alloc(pad4(bin.length), 0);
    bin.copy(binChunk);
    chunks.push(chunkHeader(binChunk.length, CHUNK_BIN), binChunk);
  }

  const body = Buffer.concat(chunks);
  const header = Buffer.alloc(HEADER_BYTES);
  header.writeUInt32LE(GLB_MAGIC, 0);
  header.writeUInt32LE(GLB_VERSION, 4);
  header.writeUInt32LE(HEADER_BYTES + body.length, 8);
  return Buffer.concat([header, body]);
}

function chunkHeader(length: number, type: number): Buffer {
  const header = Buffer.alloc(CHUNK_HEADER_BYTES);
  header.writeUInt32LE(length, 0);
  header.writeUInt32LE(type, 4);
  return header;
}

function decodeDataUri(uri: string): Buffer | null {
  const prefix = DATA_URI_PREFIXES.find((p) => uri.startsWith(p));
  return prefix === undefined ? null : Buffer.from(uri.slice(prefix.length), "base64");
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Pack a glTF JSON document with embedded (data URI) buffers into a GLB.
 * All buffers are merged into the single BIN chunk, each aligned to four
 * bytes, and buffer views are re-pointed at it.
 */
export function gltfToGlb(doc: GltfDocument): Buffer {
  const buffers = records(doc.buffers);
  const parts: Buffer[] = [];
  const baseOffsets: number[] = [];
  let total = 0;

  buffers.forEach((buffer, index) => {
    const uri = buffer.uri;
    if (typeof uri !== "string") {
      throw new ProcessorError("encode", `buffer ${index} has no uri`);
    }
    const data = decodeDataUri(uri);
    if (data === null) {
      throw new ProcessorError(
        "encode",
        `buffer ${index} references external file "${uri}"; only embedded buffers can be packed`
      );
    }
    baseOffsets.push(total);
    const padded = Buffer.alloc(pad4(data.length), 0);
    data.copy(padded);
    parts.push(padded);
    total += padded.length;
  });

  const out: GltfDocument = { ...doc };
  if (buffers.length > 0) {
    out.buffers = [{ byteLength: total }];
    out.bufferViews = records(doc.bufferViews).map((view) => {
      const source = typeof view.buffer === "number" ? view.buffer : 0;
      const base = baseOffsets[source] ?? 0;
      const offset = typeof view.byteOffset === "number" ? view.byteOffset : 0;
      return { ...view, buffer: 0, byteOffset: base + offset };
    });
  }
  return writeGlb(out, parts.length > 0 ? Buffer.concat(parts) : null);
}

function encodeGlb(input: Buffer): Buffer {
  if (isGlb(input)) {
    readGlb(input, "encode");
    return input;
  }
  return gltfToGlb(parseJsonDocument(input.toString("utf-8"), "encode"));
}

export function createModelProcessor(): Processor {
  return {
    kind: "model",
    async transform(input: Buffer, step: Transform): Promise<Buffer> {
      switch (step.op) {
        case "encode":
          if (step.format !== "glb") {
            throw new ProcessorError("encode", `models cannot be encoded as ${step.format}`);
          }
          return encodeGlb(input);
        case "simplify":
          throw new ProcessorError(
            "simplify",
            `LOD generation (${step.levels} levels at ratio ${step.ratio}) needs an external mesh simplifier, which is not installed`
          );
        case "bufferCompress":
          throw new ProcessorError(
            "bufferCompress",
            `${step.method} compression needs an external mesh codec, which is not installed`
          );
        case "resize":
        case "trim":
        case "recompress":
        case "generateMip":
        case "normalize":
        case "resample":
          throw new ProcessorError(step.op, "not a model operation");
        default:
          return assertNever(step, "transform");
      }
    },
  };
}

// --- Info ---

export interface ModelInfo {
  container: "glb" | "gltf";
  meshes: number;
  primitives: number;
  vertices: number;
  indices: number;
  triangles: number;
  materials: number;
  textures: number;
  animations: number;
  nodes: number;
  binaryBytes: number;
}

/** A suggested reduced-detail level for a model. */
export interface LodEstimate {
  level: number;
  /** Share of the full vertex count kept at this level. */
  vertexRatio: number;
  /** Suggested switch distance in scene units. */
  distance: number;
  triangles: number;
}

const LOD_TIERS = [
  { aboveVertices: 1000, vertexRatio: 0.5, distance: 10 },
  { aboveVertices: 5000, vertexRatio: 0.25, distance: 25 },
  { aboveVertices: 10000, vertexRatio: 0.1, distance: 50 },
] as const;

/** LOD 0, plus one level for each vertex-count tier the model exceeds. */
export function estimateLodLevels(info: ModelInfo): LodEstimate[] {
  const levels: LodEstimate[] = [{ level: 0, vertexRatio: 1, distance: 0, triangles: info.triangles }];
  LOD_TIERS.forEach((tier, i) => {
    if (info.vertices > tier.aboveVertices) {
      levels.push({
        level: i + 1,
        vertexRatio: tier.vertexRatio,
        distance: tier.distance,
        triangles: Math.floor(info.triangles * tier.vertexRatio),
      });
    }
  });
  return levels;
}

function accessorCount(accessors: Record<string, unknown>[], index: unknown): number {
  if (typeof index !== "number") return 0;
  const accessor = accessors[index];
  return accessor !== undefined && typeof accessor.count === "number" ? accessor.count : 0;
}

export function modelInfo(input: Buffer): ModelInfo {
  const container = isGlb(input) ? "glb" : "gltf";
  const { json, bin } = container === "glb"
    ? readGlb(input, "info")
    : { json: parseJsonDocument(input.toString("utf-8"), "info"), bin: null };

  const accessors = records(json.accessors);
  const meshes = records(json.meshes);
  let primitives = 0;
  let vertices = 0;
  let indices = 0;
  let triangles = 0;

  for (const mesh of meshes) {
    for (const primitive of records(mesh.primitives)) {
      primitives++;
      const attributes = isRecord(primitive.attributes) ? primitive.attributes : {};
      const positionCount = accessorCount(accessors, attributes.POSITION);
      const indexCount = accessorCount(accessors, primitive.indices);
      vertices += positionCount;
      indices += indexCount;
      // mode 4 (TRIANGLES) is the default
      if (primitive.mode === undefined || primitive.mode === 4) {
        triangles += Math.floor((indexCount > 0 ? indexCount : positionCount) / 3);
      }
    }
  }

  const binaryBytes = bin !== null
    ? bin.length
    : records(json.buffers).reduce((sum, b) => sum + (typeof b.byteLength === "number" ? b.byteLength : 0), 0);

  return {
    container,
    meshes: meshes.length,
    primitives,
    vertices,
    indices,
    triangles,
    materials: records(json.materials).length,
    textures: records(json.textures).length,
    animations: records(json.animations).length,
    nodes: records(json.nodes).length,
    binaryBytes,
  };
}
