import * as fs from "fs";
import { fileURLToPath } from "url";

const BASELINE_FILE = fileURLToPath(new URL("../../data/baseline-whitelist.json", import.meta.url));

export type Whitelist = ReadonlySet<string>;

let baselineCache: readonly string[] | null = null;

export function loadBaselineWhitelist(file = BASELINE_FILE): readonly string[] {
  if (file === BASELINE_FILE && baselineCache) return baselineCache;
  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`Baseline whitelist is not a JSON array: ${file}`);
  }
  const names = parsed.filter((n): n is string => typeof n === "string");
  if (file === BASELINE_FILE) baselineCache = names;
  return names;
}

export function createWhitelist(additions: readonly string[] = [], baseline = loadBaselineWhitelist()): Whitelist {
  const set = new Set<string>();
  for (const name of [...baseline, ...additions]) {
    const folded = name.trim().toLowerCase();
    if (folded) set.add(folded);
  }
  return set;
}

export function isWhitelisted(whitelist: Whitelist, name: string): boolean {
  return whitelist.has(name.trim().toLowerCase());
}
