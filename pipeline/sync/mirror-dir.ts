/**
 * Stage the source archive tree into the working cache.
 *
 * Mirror semantics: after a run the destination holds exactly the source's entries.
 * Files whose size and mtime already match are not copied again, so repeated runs are cheap.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface DirectorySync {
  /** Returns false (after logging) when the mirror could not be completed. */
  mirror(source: string, destination: string): boolean;
}

function sameFile(a: fs.Stats, b: fs.Stats): boolean {
  return a.size === b.size && Math.trunc(a.mtimeMs) === Math.trunc(b.mtimeMs);
}

export function mirrorDir(source: string, destination: string): { copied: number; removed: number } {
  const stats = { copied: 0, removed: 0 };
  fs.mkdirSync(destination, { recursive: true });

  const srcEntries = new Map(fs.readdirSync(source, { withFileTypes: true }).map((d) => [d.name, d]));

  for (const name of fs.readdirSync(destination)) {
    const src = srcEntries.get(name);
    const dst = path.join(destination, name);
    const dstIsDir = fs.statSync(dst).isDirectory();
    if (!src || src.isDirectory() !== dstIsDir) {
      fs.rmSync(dst, { recursive: true, force: true });
      stats.removed++;
    }
  }

  for (const [name, ent] of srcEntries) {
    const src = path.join(source, name);
    const dst = path.join(destination, name);
    if (ent.isDirectory()) {
      const sub = mirrorDir(src, dst);
      stats.copied += sub.copied;
      stats.removed += sub.removed;
      continue;
    }
    if (!ent.isFile()) continue;

    const srcStat = fs.statSync(src);
    if (fs.existsSync(dst) && sameFile(srcStat, fs.statSync(dst))) continue;
    fs.copyFileSync(src, dst);
    fs.utimesSync(dst, srcStat.atime, srcStat.mtime);
    stats.copied++;
  }

  return stats;
}

export const fsDirectorySync: DirectorySync = {
  mirror(source: string, destination: string): boolean {
    try {
      const { copied, removed } = mirrorDir(source, destination);
      console.log(`[sync] Mirrored ${source} -> ${destination} (${copied} copied, ${removed} removed)`);
      return true;
    } catch (err) {
      console.error(`[sync] ❌ mirror ${source} -> ${destination} failed:`, err);
      return false;
    }
  },
};
