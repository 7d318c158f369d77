import { ConfigurationError } from "./errors.js";

export interface CliArgs {
  command: string;
  target?: string;
  config?: string;
  minSizeMB?: number;
  whitelist: string[];
  roots: string[];
  installedFiles: string[];
  detect: boolean;
  artifactName: string;
  concurrency?: number;
  auto: boolean;
  dryRun: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

function parseNumber(flag: string, value: string | undefined): number {
  const n = value === undefined ? NaN : Number(value);
  if (!Number.isFinite(n)) {
    throw new ConfigurationError(`${flag} expects a number, got ${value ?? "nothing"}`);
  }
  return n;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value === "" || value.startsWith("-")) {
    throw new ConfigurationError(`${flag} expects a value, got ${value || "nothing"}`);
  }
  return value;
}

/**
 * Any unrecognised option or stray argument is a ConfigurationError, so a
 * mistyped `--dry-run` stops the run before anything is scanned or deleted.
 */
export function parseArgs(args: readonly string[]): CliArgs {
  const result: CliArgs = {
    command: "",
    whitelist: [],
    roots: [],
    installedFiles: [],
    detect: true,
    artifactName: "node_modules",
    auto: false,
    dryRun: false,
    verbose: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      continue;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      continue;
    }

    if (arg === "--min-size") {
      result.minSizeMB = parseNumber(arg, args[++i]);
      continue;
    }

    if (arg === "--whitelist") {
      const value = requireValue(arg, args[++i]);
      result.whitelist.push(...value.split(",").map((s) => s.trim()).filter(Boolean));
      continue;
    }

    if (arg === "--root") {
      result.roots.push(requireValue(arg, args[++i]));
      continue;
    }

    if (arg === "--installed-file") {
      result.installedFiles.push(requireValue(arg, args[++i]));
      continue;
    }

    if (arg === "--no-detect") {
      result.detect = false;
      continue;
    }

    if (arg === "--name") {
      result.artifactName = requireValue(arg, args[++i]);
      continue;
    }

    if (arg === "--concurrency") {
      result.concurrency = parseNumber(arg, args[++i]);
      continue;
    }

    if (arg === "--config") {
      result.config = requireValue(arg, args[++i]);
      continue;
    }

    if (arg === "-y" || arg === "--auto") {
      result.auto = true;
      continue;
    }

    if (arg === "-d" || arg === "--dry-run") {
      result.dryRun = true;
      continue;
    }

    if (arg === "--verbose") {
      result.verbose = true;
      continue;
    }

    if (arg.startsWith("-")) {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    }

    if (!result.command) {
      result.command = arg;
      continue;
    }

    if (result.command === "artifacts" && result.target === undefined) {
      result.target = arg;
      continue;
    }

    throw new ConfigurationError(`Unexpected argument: ${arg}`);
  }

  return result;
}
