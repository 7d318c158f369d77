import * as fs from "fs";
import * as path from "path";

export interface ScanRoot {
  path: string;
  label: string;
}

export interface DirectoryEntry {
  path: string;
  name: string;
  locationTag: string;
}

/**
 * Immediate child directories of each root, in root order then name order.
 * Unreadable roots contribute nothing.
 */
export function listChildDirectories(roots: readonly ScanRoot[]): DirectoryEntry[] {
  const entries: DirectoryEntry[] = [];

  for (const root of roots) {
    let children: fs.Dirent[];
    try {
      children = fs.readdirSync(root.path, { withFileTypes: true });
    } catch {
      continue;
    }
    children
      .filter((c) => c.isDirectory())
      .sort((a, b) => a.name.localeCompare(b.name))
      .forEach((c) => {
        entries.push({ path: path.join(root.path, c.name), name: c.name, locationTag: root.label });
      });
  }

  return entries;
}

/**
 * Total bytes of regular files below `dirPath`.
 *
 * Throws if `dirPath` itself cannot be listed; nested entries that can't be
 * read are left out of the total. Symlinks are not followed.
 */
export function measureDirSize(dirPath: string): number {
  let total = 0;

  function walk(dir: string, entries: fs.Dirent[]) {
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        let nested: fs.Dirent[];
        try {
          nested = fs.readdirSync(fullPath, { withFileTypes: true });
        } catch {
          continue;
        }
        walk(fullPath, nested);
      } else if (entry.isFile()) {
        try {
          total += fs.lstatSync(fullPath).size;
        } catch {
          // vanished between listing and stat
        }
      }
    }
  }

  walk(dirPath, fs.readdirSync(dirPath, { withFileTypes: true }));
  return total;
}

/**
 * Bytes available to the current user on the volume holding `target`,
 * or null when the volume can't be queried.
 */
export function getFreeSpace(target: string): number | null {
  try {
    const stats = fs.statfsSync(target);
    return stats.bavail * stats.bsize;
  } catch {
    return null;
  }
}

/**
 * Every directory named `artifactName` below `root`, depth-first. Matches are
 * still descended into, so nested copies are reported too.
 */
export function findDirectoriesNamed(root: string, artifactName: string): string[] {
  const found: string[] = [];

  function walk(dir: string) {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      return;
    }
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const fullPath = path.join(dir, entry.name);
      if (entry.name === artifactName) found.push(fullPath);
      walk(fullPath);
    }
  }

  walk(root);
  return found;
}
