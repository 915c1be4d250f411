import * as fs from "fs";
import * as path from "path";
import type { AssetRecord } from "../contracts";
import { AssetIOError, errorMessage } from "../lib/errors";
import { sha256 } from "../lib/hash";
import { toRelativePosix } from "../lib/pathSafety";

/** True when `target` is `dir` or inside it. */
export function isWithin(target: string, dir: string): boolean {
  const rel = path.relative(dir, target);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/** Hidden files and directories (and our own temp files) are never assets. */
export function isHiddenName(name: string): boolean {
  return name.startsWith(".");
}

/**
 * Recursively list files under `root`, skipping hidden entries and any
 * directory in `ignore`. Results are sorted by forward-slash relative path.
 */
export async function scanSourceTree(root: string, ignore: string[] = []): Promise<string[]> {
  const resolvedRoot = path.resolve(root);
  const ignored = ignore.map((d) => path.resolve(d));
  const files: string[] = [];

  async function walk(dir: string): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      throw new AssetIOError(dir, `cannot list directory: ${errorMessage(err)}`);
    }
    for (const entry of entries) {
      if (isHiddenName(entry.name)) continue;
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (ignored.some((d) => isWithin(full, d))) continue;
        await walk(full);
      } else if (entry.isFile()) {
        files.push(full);
      }
    }
  }

  await walk(resolvedRoot);
  return files.sort((a, b) => {
    const ra = toRelativePosix(resolvedRoot, a);
    const rb = toRelativePosix(resolvedRoot, b);
    return ra < rb ? -1 : ra > rb ? 1 : 0;
  });
}

/** Snapshot one file: hash its bytes and record size and mtime. */
export async function readAssetRecord(root: string, filePath: string): Promise<AssetRecord> {
  const absolute = path.resolve(filePath);
  try {
    const [bytes, stat] = await Promise.all([
      fs.promises.readFile(absolute),
      fs.promises.stat(absolute),
    ]);
    return {
      path: absolute,
      relPath: toRelativePosix(path.resolve(root), absolute),
      contentHash: sha256(bytes),
      size: bytes.length,
      mtime: stat.mtimeMs,
    };
  } catch (err) {
    throw new AssetIOError(absolute, `cannot read: ${errorMessage(err)}`);
  }
}
