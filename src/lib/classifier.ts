import { describeError } from "./errors.js";
import { findOwner } from "./matcher.js";
import { measureDirSize, type DirectoryEntry } from "./scanner.js";
import { isWhitelisted, type Whitelist } from "./whitelist.js";

export type Classification =
  | { kind: "protected" }
  | { kind: "scan-error"; reason: string }
  | { kind: "too-small" }
  | { kind: "matched"; owner: string }
  | { kind: "orphan" };

export type ClassificationKind = Classification["kind"];

export const CLASSIFICATION_KINDS: readonly ClassificationKind[] = [
  "protected",
  "scan-error",
  "too-small",
  "matched",
  "orphan",
];

export interface Candidate {
  readonly path: string;
  readonly name: string;
  /** Measured size; 0 when protected (never measured) or on scan error. */
  readonly sizeBytes: number;
  readonly locationTag: string;
  readonly classification: Classification;
  selected: boolean;
}

export type SizeMeasurer = (dirPath: string) => number;

export interface ClassifyOptions {
  whitelist: Whitelist;
  minSizeBytes: number;
  installedNames: readonly string[];
  measure?: SizeMeasurer;
}

export interface ClassifiedEntry {
  classification: Classification;
  sizeBytes: number;
}

/**
 * Decides a folder's fate. Order matters: whitelist, then measurement,
 * then size threshold, then ownership.
 */
export function classify(
  name: string,
  dirPath: string,
  options: ClassifyOptions
): ClassifiedEntry {
  if (isWhitelisted(options.whitelist, name)) {
    return { classification: { kind: "protected" }, sizeBytes: 0 };
  }

  const measure = options.measure ?? measureDirSize;
  let sizeBytes: number;
  try {
    sizeBytes = measure(dirPath);
  } catch (e) {
    return { classification: { kind: "scan-error", reason: describeError(e) }, sizeBytes: 0 };
  }

  if (sizeBytes < options.minSizeBytes) {
    return { classification: { kind: "too-small" }, sizeBytes };
  }

  const owner = findOwner(name, options.installedNames);
  if (owner !== undefined) {
    return { classification: { kind: "matched", owner }, sizeBytes };
  }

  return { classification: { kind: "orphan" }, sizeBytes };
}

export function classifyEntry(entry: DirectoryEntry, options: ClassifyOptions): Candidate {
  const { classification, sizeBytes } = classify(entry.name, entry.path, options);
  return {
    path: entry.path,
    name: entry.name,
    sizeBytes,
    locationTag: entry.locationTag,
    classification,
    selected: classification.kind === "orphan",
  };
}

export function classifyAll(entries: readonly DirectoryEntry[], options: ClassifyOptions): Candidate[] {
  return entries.map((entry) => classifyEntry(entry, options));
}

export function orphansOf(candidates: readonly Candidate[]): Candidate[] {
  return candidates.filter((c) => c.classification.kind === "orphan");
}

export interface ClassificationSummary {
  total: number;
  counts: Record<ClassificationKind, number>;
  sizes: Record<ClassificationKind, number>;
}

export function summarizeClassifications(candidates: readonly Candidate[]): ClassificationSummary {
  const counts: Record<ClassificationKind, number> = {
    "protected": 0,
    "scan-error": 0,
    "too-small": 0,
    "matched": 0,
    "orphan": 0,
  };
  const sizes: Record<ClassificationKind, number> = { ...counts };

  for (const c of candidates) {
    counts[c.classification.kind]++;
    sizes[c.classification.kind] += c.sizeBytes;
  }

  return { total: candidates.length, counts, sizes };
}

export function describeClassification(classification: Classification): string {
  switch (classification.kind) {
    case "protected": return "protected";
    case "scan-error": return `scan error (${classification.reason})`;
    case "too-small": return "too small";
    case "matched": return `owned by ${classification.owner}`;
    case "orphan": return "orphan";
  }
}
