import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { ConfigurationError, describeError } from "./errors.js";

export interface InstalledNamesOptions {
  /** Text files with one application name per line; `#` starts a comment. */
  files?: string[];
  /** Look for locally installed applications too. Default: true */
  detect?: boolean;
  platform?: NodeJS.Platform;
  home?: string;
  env?: NodeJS.ProcessEnv;
}

export function parseNameList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

function readDirNames(dir: string, filter: (entry: fs.Dirent) => boolean): string[] {
  try {
    return fs.readdirSync(dir, { withFileTypes: true })
      .filter(filter)
      .map((e) => e.name)
      .sort((a, b) => a.localeCompare(b));
  } catch {
    return [];
  }
}

function desktopEntryName(file: string): string | null {
  try {
    const content = fs.readFileSync(file, "utf-8");
    const match = /^Name=(.+)$/m.exec(content);
    return match ? match[1].trim() : null;
  } catch {
    return null;
  }
}

export function detectInstalledApplications(
  platform: NodeJS.Platform = process.platform,
  home = os.homedir(),
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const names: string[] = [];

  if (platform === "darwin") {
    for (const dir of ["/Applications", path.join(home, "Applications")]) {
      names.push(...readDirNames(dir, (e) => e.name.endsWith(".app")).map((n) => n.slice(0, -4)));
    }
  } else if (platform === "win32") {
    for (const dir of [env.ProgramFiles, env["ProgramFiles(x86)"]]) {
      if (dir) names.push(...readDirNames(dir, (e) => e.isDirectory()));
    }
  } else {
    for (const dir of ["/usr/share/applications", path.join(home, ".local", "share", "applications")]) {
      for (const file of readDirNames(dir, (e) => e.name.endsWith(".desktop"))) {
        names.push(desktopEntryName(path.join(dir, file)) ?? file.slice(0, -".desktop".length));
      }
    }
  }

  return names;
}

/**
 * Case-insensitive dedup that keeps the first spelling and the input order.
 */
export function dedupNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const name of names) {
    const trimmed = name.trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    result.push(trimmed);
  }
  return result;
}

export function collectInstalledNames(options: InstalledNamesOptions = {}): string[] {
  const names: string[] = [];

  for (const file of options.files ?? []) {
    let content: string;
    try {
      content = fs.readFileSync(file, "utf-8");
    } catch (e) {
      throw new ConfigurationError(`Cannot read installed names from ${file}: ${describeError(e)}`);
    }
    names.push(...parseNameList(content));
  }
  if (options.detect !== false) {
    names.push(...detectInstalledApplications(options.platform, options.home, options.env));
  }

  return dedupNames(names);
}
