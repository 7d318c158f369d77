import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { dedupNested } from "./dedup.js";
import { ConfigurationError } from "./errors.js";
import type { ScanRoot } from "./scanner.js";

export function defaultScanRoots(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home = os.homedir()
): ScanRoot[] {
  switch (platform) {
    case "win32": {
      const roots: ScanRoot[] = [];
      if (env.APPDATA) roots.push({ path: env.APPDATA, label: "Roaming" });
      if (env.LOCALAPPDATA) roots.push({ path: env.LOCALAPPDATA, label: "Local" });
      if (env.ProgramData) roots.push({ path: env.ProgramData, label: "ProgramData" });
      return roots;
    }
    case "darwin":
      return [
        { path: path.join(home, "Library", "Application Support"), label: "Application Support" },
        { path: path.join(home, "Library", "Caches"), label: "Caches" },
      ];
    default:
      return [
        { path: env.XDG_CONFIG_HOME || path.join(home, ".config"), label: "config" },
        { path: env.XDG_DATA_HOME || path.join(home, ".local", "share"), label: "data" },
        { path: env.XDG_CACHE_HOME || path.join(home, ".cache"), label: "cache" },
      ];
  }
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Keeps the roots that exist as directories, dropping duplicates and any root
 * nested inside another one (its folders are already children of a child of
 * the outer root). Fails before any scanning starts when nothing usable is left.
 */
export function resolveScanRoots(requested: readonly (string | ScanRoot)[]): ScanRoot[] {
  const seen = new Set<string>();
  const roots: ScanRoot[] = [];

  for (const entry of requested) {
    const root = typeof entry === "string" ? { path: entry, label: path.basename(entry) || entry } : entry;
    const resolved = path.resolve(root.path);
    if (seen.has(resolved) || !isDirectory(resolved)) continue;
    seen.add(resolved);
    roots.push({ path: resolved, label: root.label });
  }

  const topmost = new Set(dedupNested(roots));
  const kept = roots.filter((r) => topmost.has(r));

  if (kept.length === 0) {
    const tried = requested.map((r) => (typeof r === "string" ? r : r.path)).join(", ") || "(none)";
    throw new ConfigurationError(`No valid scan roots. Tried: ${tried}`);
  }
  return kept;
}
