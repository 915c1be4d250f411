/**
 * Shared contract types for the assetpress build.
 *
 * All pipeline, atlas, processor and watch modules import shared types from here.
 * No pipeline module should import types from another pipeline module.
 */

// --- Asset Kinds ---

export type AssetKind = "image" | "model" | "audio";

export type ImageFormat = "png" | "jpeg" | "webp" | "ktx2";
export type ModelFormat = "glb";
export type AudioFormat = "wav" | "ogg";
export type OutputFormat = ImageFormat | ModelFormat | AudioFormat;

// --- Asset Record ---

/** Immutable snapshot of one source file at one instant. */
export interface AssetRecord {
  /** Absolute path on disk. */
  path: string;
  /** Forward-slash path relative to the source root. */
  relPath: string;
  /** SHA-256 hex of the raw bytes. */
  contentHash: string;
  size: number;
  mtime: number;
}

// --- Transforms ---

export interface ResizeStep {
  op: "resize";
  maxSize: number;
}

export interface TrimStep {
  op: "trim";
}

export interface RecompressStep {
  op: "recompress";
  format: ImageFormat;
  quality: number;
  lossless: boolean;
}

/** Conform image dimensions to powers of two (never upscales). */
export interface GenerateMipStep {
  op: "generateMip";
}

export interface SimplifyStep {
  op: "simplify";
  ratio: number;
  levels: number;
}

export interface BufferCompressStep {
  op: "bufferCompress";
  method: "draco" | "meshopt";
}

export interface NormalizeStep {
  op: "normalize";
  peak: number;
}

export interface ResampleStep {
  op: "resample";
  sampleRate: number;
}

export interface EncodeStep {
  op: "encode";
  format: ModelFormat | AudioFormat;
  /** Audio quality 1-10; unused for models. */
  quality?: number;
}

export type Transform =
  | ResizeStep
  | TrimStep
  | RecompressStep
  | GenerateMipStep
  | SimplifyStep
  | BufferCompressStep
  | NormalizeStep
  | ResampleStep
  | EncodeStep;

export type TransformOp = Transform["op"];

// --- Pipeline ---

export interface Pipeline {
  kind: AssetKind | "none";
  format: OutputFormat | null;
  steps: Transform[];
}

// --- Atlas ---

export interface AtlasSettings {
  maxWidth: number;
  maxHeight: number;
  padding: number;
  trim: boolean;
  format: ImageFormat;
  quality: number;
}

/** Where a source file goes and how it gets there. */
export interface AssetRoute {
  pipeline: Pipeline;
  /** Forward-slash output path relative to the output root. */
  outputPath: string;
  /** Atlas group id when the file is a sprite, else null. */
  atlasGroup: string | null;
  atlas: AtlasSettings | null;
}

export interface SpriteImage {
  id: string;
  /** Raw RGBA pixels, row-major. */
  data: Buffer;
  width: number;
  height: number;
  trim: boolean;
}

export interface AtlasRequest {
  sprites: SpriteImage[];
}

export interface PackedRect {
  id: string;
  x: number;
  y: number;
  w: number;
  h: number;
  trimOffset: { x: number; y: number };
  originalSize: { w: number; h: number };
}

export interface AtlasPage {
  width: number;
  height: number;
  rects: PackedRect[];
}

export interface AtlasSpriteMetadata {
  id: string;
  x: number;
  y: number;
  width: number;
  height: number;
  trimmed: {
    offsetX: number;
    offsetY: number;
    originalWidth: number;
    originalHeight: number;
  };
}

export interface AtlasMetadata {
  image: string;
  width: number;
  height: number;
  sprites: AtlasSpriteMetadata[];
}

// --- Build Jobs ---

export interface AssetJob {
  type: "asset";
  /** Forward-slash output path relative to the output root. */
  id: string;
  record: AssetRecord;
  pipeline: Pipeline;
  outputPath: string;
}

export interface AtlasJob {
  type: "atlas";
  id: string;
  groupId: string;
  members: AssetRecord[];
  settings: AtlasSettings;
  outputPath: string;
  metadataPath: string;
}

export type BuildJob = AssetJob | AtlasJob;

// --- Cache ---

export interface CacheEntry {
  key: string;
  /** Relative source path, or the atlas group id. */
  sourcePath: string;
  /** Forward-slash output path relative to the output root. */
  outputPath: string;
  outputHash: string;
  timestamp: number;
}

export interface CacheManifest {
  version: number;
  entries: CacheEntry[];
}

// --- Build Report ---

export type JobStatus = "built" | "cached" | "planned" | "failed" | "cancelled";

export type JobErrorKind =
  | "ProcessorError"
  | "AssetIOError"
  | "AtlasOverflowError";

export interface JobOutcome {
  id: string;
  type: BuildJob["type"];
  sources: string[];
  status: JobStatus;
  error?: { kind: JobErrorKind; message: string };
  inputBytes: number;
  outputBytes: number;
  durationMs: number;
}

export interface BuildReport {
  dryRun: boolean;
  outcomes: JobOutcome[];
  counts: Record<JobStatus, number>;
  success: boolean;
}

// --- Watch ---

export type FsEventKind = "create" | "modify" | "delete";

export interface FsEvent {
  kind: FsEventKind;
  /** Absolute path. */
  path: string;
}

