/**
 * Scan pipeline shared by the CLI and the MCP server:
 * roots -> child folders -> classification.
 */

import * as path from "path";
import { classifyAll, type Candidate, type SizeMeasurer } from "./classifier.js";
import { minSizeBytes, type SweepConfig } from "./config.js";
import { describeError } from "./errors.js";
import { findNestedArtifacts } from "./dedup.js";
import { collectInstalledNames } from "./installed.js";
import { defaultScanRoots, resolveScanRoots } from "./roots.js";
import { listChildDirectories, measureDirSize, type ScanRoot } from "./scanner.js";
import { createWhitelist } from "./whitelist.js";

export interface OrphanScan {
  roots: ScanRoot[];
  installedNames: string[];
  candidates: Candidate[];
}

export interface OrphanScanOptions {
  /** Skips local detection and name files when given. */
  installedNames?: string[];
  measure?: SizeMeasurer;
}

export function scanForOrphans(config: SweepConfig, options: OrphanScanOptions = {}): OrphanScan {
  const roots = resolveScanRoots(config.roots.length > 0 ? config.roots : defaultScanRoots());
  const installedNames = options.installedNames ?? collectInstalledNames({
    files: config.installedNameFiles,
    detect: config.detectInstalled,
  });

  const candidates = classifyAll(listChildDirectories(roots), {
    whitelist: createWhitelist(config.whitelist),
    minSizeBytes: minSizeBytes(config),
    installedNames,
    measure: options.measure,
  });

  return { roots, installedNames, candidates };
}

/**
 * Topmost `artifactName` folders under `root` as orphan candidates. Only the
 * size threshold applies; the folder name says what they are.
 */
export function scanForArtifacts(
  root: string,
  artifactName: string,
  config: SweepConfig,
  measure: SizeMeasurer = measureDirSize
): Candidate[] {
  const [resolved] = resolveScanRoots([root]);
  const threshold = minSizeBytes(config);

  return findNestedArtifacts(resolved.path, artifactName).map((artifactPath): Candidate => {
    const base = {
      path: artifactPath,
      name: path.relative(resolved.path, artifactPath) || artifactName,
      locationTag: artifactName,
    };
    let sizeBytes: number;
    try {
      sizeBytes = measure(artifactPath);
    } catch (e) {
      return { ...base, sizeBytes: 0, classification: { kind: "scan-error", reason: describeError(e) }, selected: false };
    }
    if (sizeBytes < threshold) {
      return { ...base, sizeBytes, classification: { kind: "too-small" }, selected: false };
    }
    return { ...base, sizeBytes, classification: { kind: "orphan" }, selected: true };
  });
}
