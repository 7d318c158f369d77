import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { Candidate } from "./classifier.js";
import { dedupNested } from "./dedup.js";
import { categorizeDeletionError, type DeletionFailure, type DeletionFailureCategory } from "./errors.js";
import { getFreeSpace } from "./scanner.js";

export const DEFAULT_CONCURRENCY = 4;
export const MAX_CONCURRENCY = 16;

export interface DeletionOutcome {
  candidate: Candidate;
  succeeded: boolean;
  failure?: DeletionFailure;
}

export interface DeletionResult {
  outcomes: DeletionOutcome[];
  deletedCount: number;
  /** Sum of pre-measured sizes of the candidates actually removed. */
  deletedSize: number;
  failedCount: number;
  failedNames: string[];
  failuresByCategory: Record<DeletionFailureCategory, number>;
  /** Free-space delta on the reference volume; null when it couldn't be sampled. */
  observedFreedBytes: number | null;
  dryRun: boolean;
  startedAt: Date;
  finishedAt: Date;
}

export interface DeletionOptions {
  concurrency?: number;
  dryRun?: boolean;
  /** Volume sampled before and after; defaults to the first candidate's parent directory. */
  referencePath?: string;
  remove?: (dirPath: string) => Promise<void>;
  freeSpace?: (target: string) => number | null;
  onOutcome?: (outcome: DeletionOutcome) => void;
}

// No `force`: a path that is already gone fails with ENOENT instead of counting as freed.
function defaultRemove(dirPath: string): Promise<void> {
  return fs.promises.rm(dirPath, { recursive: true });
}

export function clampConcurrency(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return DEFAULT_CONCURRENCY;
  return Math.min(MAX_CONCURRENCY, Math.max(1, Math.floor(value)));
}

/**
 * A fixed number of workers pull candidates off a shared queue and hand each
 * outcome to a single collector. Workers share nothing else.
 */
async function runPool(
  candidates: readonly Candidate[],
  workers: number,
  work: (candidate: Candidate) => Promise<DeletionOutcome>,
  collect: (outcome: DeletionOutcome) => void
): Promise<void> {
  const queue = [...candidates];

  async function worker(): Promise<void> {
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      collect(await work(next));
    }
  }

  await Promise.all(Array.from({ length: Math.min(workers, queue.length) }, () => worker()));
}

/**
 * Removes each orphan independently; anything not classified as an orphan is
 * ignored, and an orphan lying inside another selected orphan goes with its
 * ancestor rather than being removed and counted on its own. One failure never
 * stops the batch and nothing is retried.
 */
export async function executeDeletion(
  selection: readonly Candidate[],
  options: DeletionOptions = {}
): Promise<DeletionResult> {
  const orphans = selection.filter((c) => c.classification.kind === "orphan");
  const topmost = new Set(dedupNested(orphans));
  const candidates = orphans.filter((c) => topmost.has(c));
  const dryRun = options.dryRun ?? false;
  const remove = options.remove ?? defaultRemove;
  const freeSpace = options.freeSpace ?? getFreeSpace;
  const referencePath = options.referencePath ?? (candidates.length > 0 ? path.dirname(candidates[0].path) : os.homedir());
  const startedAt = new Date();

  const outcomes: DeletionOutcome[] = [];
  const collect = (outcome: DeletionOutcome) => {
    outcomes.push(outcome);
    options.onOutcome?.(outcome);
  };

  let observedFreedBytes: number | null = null;

  if (dryRun) {
    for (const candidate of candidates) collect({ candidate, succeeded: true });
  } else {
    const before = candidates.length > 0 ? freeSpace(referencePath) : null;

    await runPool(candidates, clampConcurrency(options.concurrency), async (candidate) => {
      try {
        await remove(candidate.path);
        return { candidate, succeeded: true };
      } catch (e) {
        return { candidate, succeeded: false, failure: categorizeDeletionError(e) };
      }
    }, collect);

    if (before !== null) {
      const after = freeSpace(referencePath);
      observedFreedBytes = after === null ? null : after - before;
    }
  }

  // Outcomes arrive in completion order; report them in input order.
  const order = new Map(candidates.map((c, i) => [c, i] as const));
  outcomes.sort((a, b) => (order.get(a.candidate) ?? 0) - (order.get(b.candidate) ?? 0));

  const failuresByCategory: Record<DeletionFailureCategory, number> = { "locked": 0, "access-denied": 0, "other": 0 };
  let deletedCount = 0;
  let deletedSize = 0;
  const failedNames: string[] = [];

  for (const outcome of outcomes) {
    if (outcome.succeeded) {
      deletedCount++;
      deletedSize += outcome.candidate.sizeBytes;
    } else {
      failedNames.push(outcome.candidate.name);
      if (outcome.failure) failuresByCategory[outcome.failure.category]++;
    }
  }

  return {
    outcomes,
    deletedCount,
    deletedSize,
    failedCount: failedNames.length,
    failedNames,
    failuresByCategory,
    observedFreedBytes,
    dryRun,
    startedAt,
    finishedAt: new Date(),
  };
}
