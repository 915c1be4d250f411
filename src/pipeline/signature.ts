import type { AtlasSettings, Pipeline } from "../contracts";
import { sha256, stableStringify } from "../lib/hash";

/** Canonical serialization of a pipeline; part of every asset cache key. */
export function pipelineSignature(pipeline: Pipeline): string {
  return stableStringify(pipeline);
}

export function atlasSignature(settings: AtlasSettings): string {
  return stableStringify({ kind: "atlas", settings });
}

/**
 * CacheKey = sha256(contentHash ++ signature ++ normalizedOutputPath).
 * Newline separators keep the three fields unambiguous.
 */
export function computeCacheKey(contentHash: string, signature: string, outputPath: string): string {
  return sha256(`${contentHash}\n${signature}\n${outputPath}`);
}

/** Combined content hash of an atlas group, independent of scan order. */
export function combinedMemberHash(members: Array<{ id: string; contentHash: string }>): string {
  const lines = members
    .map((m) => `${m.id}:${m.contentHash}`)
    .sort();
  return sha256(lines.join("\n"));
}
