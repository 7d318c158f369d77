import { findDirectoriesNamed } from "./scanner.js";

export interface DedupOptions {
  /** Defaults to true on win32 and darwin, whose filesystems usually fold case. */
  caseInsensitive?: boolean;
}

function isSeparator(ch: string | undefined): boolean {
  return ch === "/" || ch === "\\";
}

function trimTrailingSeparators(p: string): string {
  let end = p.length;
  while (end > 1 && isSeparator(p[end - 1])) end--;
  return p.slice(0, end);
}

/**
 * True when `child` lies strictly below `ancestor` (or is the same path).
 * A shared prefix alone isn't enough: "/a/node_modules2" is not under "/a/node_modules".
 */
export function isWithin(child: string, ancestor: string, caseInsensitive = false): boolean {
  let c = trimTrailingSeparators(child);
  let a = trimTrailingSeparators(ancestor);
  if (caseInsensitive) {
    c = c.toLowerCase();
    a = a.toLowerCase();
  }
  if (c === a) return true;
  if (!c.startsWith(a)) return false;
  return isSeparator(a[a.length - 1]) || isSeparator(c[a.length]);
}

/**
 * Collapses nested paths of the same kind to their topmost ancestors.
 * Shorter paths are visited first, so an ancestor is always kept before any of
 * its descendants is considered, whatever the input order.
 */
export function dedupNested<T extends { path: string }>(items: readonly T[], options: DedupOptions = {}): T[] {
  const caseInsensitive = options.caseInsensitive ?? (process.platform === "win32" || process.platform === "darwin");
  const sorted = items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => a.item.path.length - b.item.path.length || a.index - b.index);

  const kept: T[] = [];
  for (const { item } of sorted) {
    if (!kept.some((k) => isWithin(item.path, k.path, caseInsensitive))) {
      kept.push(item);
    }
  }
  return kept;
}

export function findNestedArtifacts(root: string, artifactName: string, options: DedupOptions = {}): string[] {
  const all = findDirectoriesNamed(root, artifactName).map((p) => ({ path: p }));
  return dedupNested(all, options).map((a) => a.path);
}
