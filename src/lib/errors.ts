/**
 * Error taxonomy for the sweep pipeline.
 *
 * Only ConfigurationError is ever thrown to callers. Scan and deletion faults
 * are recorded as data (a `scan-error` classification or a failed
 * DeletionOutcome) and never abort a run.
 */

export type DeletionFailureCategory = "locked" | "access-denied" | "other";

export interface DeletionFailure {
  category: DeletionFailureCategory;
  code?: string;
  message: string;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

const LOCKED_CODES = new Set(["EBUSY", "ETXTBSY"]);
const ACCESS_CODES = new Set(["EACCES", "EPERM"]);

export function categorizeDeletionError(err: unknown): DeletionFailure {
  const code = errorCode(err);
  let category: DeletionFailureCategory = "other";
  if (code && LOCKED_CODES.has(code)) category = "locked";
  else if (code && ACCESS_CODES.has(code)) category = "access-denied";
  return { category, code, message: describeError(err) };
}
