import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { DEFAULT_CONCURRENCY, MAX_CONCURRENCY } from "./deletion.js";
import { ConfigurationError, describeError } from "./errors.js";

export const SWEEP_DIR = path.join(os.homedir(), ".orphan-sweep");
export const CONFIG_FILE = path.join(SWEEP_DIR, "config.json");
export const LOGS_DIR = path.join(SWEEP_DIR, "logs");

export interface SweepConfig {
  minSizeMB: number;
  whitelist: string[];
  /** Empty means the platform defaults. */
  roots: string[];
  concurrency: number;
  installedNameFiles: string[];
  detectInstalled: boolean;
}

export const DEFAULT_CONFIG: SweepConfig = {
  minSizeMB: 1,
  whitelist: [],
  roots: [],
  concurrency: DEFAULT_CONCURRENCY,
  installedNameFiles: [],
  detectInstalled: true,
};

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given. */
  file?: string;
  overrides?: Partial<SweepConfig>;
}

function expectStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new ConfigurationError(`"${field}" must be an array of strings`);
  }
  return value;
}

function expectNumber(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigurationError(`"${field}" must be a number`);
  }
  return value;
}

/**
 * Validates a parsed config file field by field. Unknown keys are ignored.
 */
export function parseConfigFile(raw: unknown): Partial<SweepConfig> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError("Config file must contain a JSON object");
  }
  const data = raw as Record<string, unknown>;
  const config: Partial<SweepConfig> = {};

  if (data.minSizeMB !== undefined) config.minSizeMB = expectNumber(data.minSizeMB, "minSizeMB");
  if (data.whitelist !== undefined) config.whitelist = expectStringArray(data.whitelist, "whitelist");
  if (data.roots !== undefined) config.roots = expectStringArray(data.roots, "roots");
  if (data.concurrency !== undefined) config.concurrency = expectNumber(data.concurrency, "concurrency");
  if (data.installedNameFiles !== undefined) {
    config.installedNameFiles = expectStringArray(data.installedNameFiles, "installedNameFiles");
  }
  if (data.detectInstalled !== undefined) {
    if (typeof data.detectInstalled !== "boolean") {
      throw new ConfigurationError('"detectInstalled" must be a boolean');
    }
    config.detectInstalled = data.detectInstalled;
  }

  return config;
}

export function validateConfig(config: SweepConfig): SweepConfig {
  if (config.minSizeMB < 0) {
    throw new ConfigurationError(`Minimum size must not be negative (got ${config.minSizeMB})`);
  }
  if (!Number.isInteger(config.concurrency) || config.concurrency < 1 || config.concurrency > MAX_CONCURRENCY) {
    throw new ConfigurationError(`Concurrency must be an integer between 1 and ${MAX_CONCURRENCY} (got ${config.concurrency})`);
  }
  return config;
}

function readConfigFile(file: string): Partial<SweepConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (e) {
    throw new ConfigurationError(`Cannot read config file ${file}: ${describeError(e)}`);
  }
  return parseConfigFile(raw);
}

/**
 * Defaults, then the config file, then explicit overrides. List options from
 * the file and the overrides are concatenated rather than replaced.
 */
export function loadConfig(options: LoadConfigOptions = {}): SweepConfig {
  let fromFile: Partial<SweepConfig> = {};
  if (options.file) {
    fromFile = readConfigFile(options.file);
  } else if (fs.existsSync(CONFIG_FILE)) {
    fromFile = readConfigFile(CONFIG_FILE);
  }

  const overrides = options.overrides ?? {};
  const merged: SweepConfig = {
    minSizeMB: overrides.minSizeMB ?? fromFile.minSizeMB ?? DEFAULT_CONFIG.minSizeMB,
    whitelist: [...(fromFile.whitelist ?? []), ...(overrides.whitelist ?? [])],
    roots: overrides.roots && overrides.roots.length > 0 ? overrides.roots : fromFile.roots ?? DEFAULT_CONFIG.roots,
    concurrency: overrides.concurrency ?? fromFile.concurrency ?? DEFAULT_CONFIG.concurrency,
    installedNameFiles: [...(fromFile.installedNameFiles ?? []), ...(overrides.installedNameFiles ?? [])],
    detectInstalled: overrides.detectInstalled ?? fromFile.detectInstalled ?? DEFAULT_CONFIG.detectInstalled,
  };

  return validateConfig(merged);
}

export function minSizeBytes(config: SweepConfig): number {
  return Math.round(config.minSizeMB * 1024 * 1024);
}
