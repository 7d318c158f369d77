import * as fs from "fs";
import * as path from "path";
import {
  CLASSIFICATION_KINDS,
  describeClassification,
  summarizeClassifications,
  type Candidate,
  type ClassificationKind,
} from "./classifier.js";
import type { DeletionResult } from "./deletion.js";
import { selectedCount, selectedSize, type SessionNotice, type SessionState } from "./session.js";

export function formatBytes(bytes: number): string {
  const sign = bytes < 0 ? "-" : "";
  const abs = Math.abs(bytes);
  if (abs < 1024) return `${sign}${abs} B`;
  if (abs < 1024 * 1024) return `${sign}${(abs / 1024).toFixed(1)} KB`;
  if (abs < 1024 * 1024 * 1024) return `${sign}${(abs / (1024 * 1024)).toFixed(1)} MB`;
  return `${sign}${(abs / (1024 * 1024 * 1024)).toFixed(1)} GB`;
}

const KIND_LABELS: Record<ClassificationKind, string> = {
  "protected": "Protected",
  "scan-error": "Scan errors",
  "too-small": "Too small",
  "matched": "Matched",
  "orphan": "Orphans",
};

function shorten(p: string, max = 60): string {
  return p.length > max ? "..." + p.slice(-(max - 3)) : p;
}

export function formatScanReport(candidates: readonly Candidate[], options: { verbose?: boolean } = {}): string {
  const summary = summarizeClassifications(candidates);
  let output = "";

  output += `Scanned ${summary.total} folder(s)\n\n`;
  output += "Classification        Count        Size\n";
  output += "─────────────────────────────────────────\n";
  for (const kind of CLASSIFICATION_KINDS) {
    const label = KIND_LABELS[kind].padEnd(20);
    const count = String(summary.counts[kind]).padStart(7);
    const size = kind === "protected" ? "-".padStart(12) : formatBytes(summary.sizes[kind]).padStart(12);
    output += `${label}${count}${size}\n`;
  }

  const orphans = candidates
    .filter((c) => c.classification.kind === "orphan")
    .sort((a, b) => b.sizeBytes - a.sizeBytes);

  if (orphans.length > 0) {
    output += "\nOrphans:\n";
    for (const o of orphans) {
      output += `  ${formatBytes(o.sizeBytes).padStart(10)}  [${o.locationTag}] ${shorten(o.path)}\n`;
    }
  }

  if (options.verbose) {
    const others = candidates.filter((c) => c.classification.kind !== "orphan");
    if (others.length > 0) {
      output += "\nKept:\n";
      for (const c of others) {
        output += `  ${c.name}: ${describeClassification(c.classification)}\n`;
      }
    }
  }

  return output;
}

export function formatNotice(notice: SessionNotice): string {
  switch (notice.type) {
    case "invalid-index":
      return notice.max === 0 ? "No items to toggle." : `Invalid number ${notice.index}; pick 1-${notice.max}.`;
    case "nothing-selected":
      return "Nothing selected, nothing to do.";
    case "awaiting-confirmation":
      return "About to delete the selected folders.";
    case "cancelled":
      return "Cancelled. Selection unchanged.";
    case "not-allowed":
      return `"${notice.command}" is not available while ${notice.phase}.`;
    case "unknown-input":
      return `Unknown command "${notice.input}". Use <n>, a, n, s, d or q.`;
  }
}

export function formatSessionView(state: SessionState, notice?: SessionNotice): string {
  let output = "";

  state.items.forEach((item, i) => {
    const mark = item.selected ? "[x]" : "[ ]";
    const num = String(i + 1).padStart(3);
    output += `${num} ${mark} ${formatBytes(item.candidate.sizeBytes).padStart(10)}  ${shorten(item.candidate.path)}\n`;
  });

  output += `\nSelected: ${selectedCount(state)}/${state.items.length} (${formatBytes(selectedSize(state))})\n`;
  if (state.phase === "reviewing") {
    output += "Commands: <n> toggle, a all, n none, s show, d delete, q quit\n";
  }
  if (notice) output += `${formatNotice(notice)}\n`;

  return output;
}

export function formatDeletionReport(result: DeletionResult): string {
  let output = "";

  output += result.dryRun ? "\n[DRY RUN] Would delete:\n\n" : "\nDeletion Results:\n\n";

  for (const outcome of result.outcomes) {
    const size = formatBytes(outcome.candidate.sizeBytes).padStart(10);
    if (outcome.succeeded) {
      output += `  ✓ ${size}  ${shorten(outcome.candidate.path)}\n`;
    } else {
      const category = outcome.failure?.category ?? "other";
      output += `  ✗ ${size}  ${shorten(outcome.candidate.path)} (${category}: ${outcome.failure?.message ?? "unknown error"})\n`;
    }
  }

  output += `\nDeleted: ${result.deletedCount}, Failed: ${result.failedCount}\n`;
  output += `Freed (calculated): ${formatBytes(result.deletedSize)}\n`;
  if (!result.dryRun) {
    const observed = result.observedFreedBytes === null ? "unavailable" : formatBytes(result.observedFreedBytes);
    output += `Freed (observed):   ${observed}\n`;
  }

  if (result.failedCount > 0) {
    const { locked, other } = result.failuresByCategory;
    const denied = result.failuresByCategory["access-denied"];
    output += `\nFailures: ${locked} locked, ${denied} access denied, ${other} other\n`;
    if (locked + denied > 0) {
      output += "  Locked or protected folders are usually still in use; close the owning app and rerun.\n";
    }
    if (other > 0) {
      output += "  Other failures may point to a filesystem problem; check the messages above.\n";
    }
  }

  return output;
}

export interface DeletionLogEntry {
  startedAt: string;
  finishedAt: string;
  dryRun: boolean;
  deletedCount: number;
  deletedSize: number;
  observedFreedBytes: number | null;
  failedCount: number;
  deleted: string[];
  failed: { path: string; category: string; message: string }[];
}

export function toDeletionLogEntry(result: DeletionResult): DeletionLogEntry {
  return {
    startedAt: result.startedAt.toISOString(),
    finishedAt: result.finishedAt.toISOString(),
    dryRun: result.dryRun,
    deletedCount: result.deletedCount,
    deletedSize: result.deletedSize,
    observedFreedBytes: result.observedFreedBytes,
    failedCount: result.failedCount,
    deleted: result.outcomes.filter((o) => o.succeeded).map((o) => o.candidate.path),
    failed: result.outcomes
      .filter((o) => !o.succeeded)
      .map((o) => ({
        path: o.candidate.path,
        category: o.failure?.category ?? "other",
        message: o.failure?.message ?? "",
      })),
  };
}

/**
 * Appends one JSON line per run to `deletions.jsonl` under `logDir`.
 */
export function writeDeletionLog(result: DeletionResult, logDir: string): string {
  if (!fs.existsSync(logDir)) fs.mkdirSync(logDir, { recursive: true });
  const logPath = path.join(logDir, "deletions.jsonl");
  fs.appendFileSync(logPath, JSON.stringify(toDeletionLogEntry(result)) + "\n", "utf-8");
  return logPath;
}
