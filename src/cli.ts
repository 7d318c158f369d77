#!/usr/bin/env node
/**
 * CLI for orphan-sweep
 * Finds application data folders no installed software claims and removes them.
 */

import { parseArgs, type CliArgs } from "./lib/args.js";
import { orphansOf, type Candidate } from "./lib/classifier.js";
import { LOGS_DIR, loadConfig, type SweepConfig } from "./lib/config.js";
import { executeDeletion, type DeletionOutcome } from "./lib/deletion.js";
import { ConfigurationError } from "./lib/errors.js";
import { formatBytes, formatDeletionReport, formatScanReport, formatSessionView, writeDeletionLog } from "./lib/report.js";
import { autoSelect, consoleSessionIO, runInteractiveSession } from "./lib/session.js";
import { scanForArtifacts, scanForOrphans } from "./lib/sweep.js";

const VERSION = "0.3.0";

function printHelp() {
  console.log(`
orphan-sweep v${VERSION}
Find and remove application data folders that no installed software claims.

USAGE:
  osweep <command> [options]

COMMANDS:
  scan                    Classify folders and list orphans (no changes)
  clean                   Classify, review the orphans, then delete the selection
  artifacts <root>        Find topmost nested artifact folders (default: node_modules) and clean them

OPTIONS:
  --min-size <MB>         Ignore folders smaller than this (default: 1)
  --whitelist <a,b,...>   Extra names that are never orphans (repeatable)
  --root <path>           Scan this root instead of the platform defaults (repeatable)
  --installed-file <path> Extra installed application names, one per line (repeatable)
  --no-detect             Don't look for locally installed applications
  --name <dir>            For artifacts: folder name to collect (default: node_modules)
  --concurrency <n>       Parallel deletions (default: 4, max 16)
  --config <path>         Config file (default: ~/.orphan-sweep/config.json)
  -y, --auto              Delete every orphan without review or confirmation
  -d, --dry-run           Show what would be deleted without deleting
  --verbose               Also list kept folders and why
  -h, --help              Show this help message
  -v, --version           Show version

EXAMPLES:
  osweep scan                             # What would be flagged?
  osweep clean --min-size 50              # Review orphans of 50 MB or more
  osweep clean --whitelist JetBrains,Zoom # Never touch these
  osweep clean --auto --dry-run           # Preview unattended cleanup
  osweep artifacts ~/code --dry-run       # Topmost node_modules under ~/code
`);
}

function buildConfig(args: CliArgs): SweepConfig {
  return loadConfig({
    file: args.config,
    overrides: {
      minSizeMB: args.minSizeMB,
      whitelist: args.whitelist,
      roots: args.roots,
      installedNameFiles: args.installedFiles,
      concurrency: args.concurrency,
      detectInstalled: args.detect ? undefined : false,
    },
  });
}

function printOutcome(outcome: DeletionOutcome) {
  if (outcome.succeeded) {
    console.log(`\x1b[32m✓\x1b[0m ${outcome.candidate.path}`);
  } else {
    console.log(`\x1b[31m✗\x1b[0m ${outcome.candidate.path} \x1b[2m(${outcome.failure?.category ?? "other"})\x1b[0m`);
  }
}

async function selectForDeletion(candidates: Candidate[], auto: boolean): Promise<Candidate[]> {
  const orphans = orphansOf(candidates);
  if (auto) return autoSelect(orphans);

  const io = consoleSessionIO((state, notice) => {
    console.log();
    console.log(formatSessionView(state, notice));
  });
  try {
    return await runInteractiveSession(orphans, io);
  } finally {
    io.close();
  }
}

async function deleteSelection(selection: Candidate[], config: SweepConfig, dryRun: boolean) {
  if (selection.length === 0) {
    console.log("Nothing deleted.");
    return;
  }

  if (!dryRun) console.log(`\nDeleting ${selection.length} folder(s)...\n`);
  const result = await executeDeletion(selection, {
    concurrency: config.concurrency,
    dryRun,
    onOutcome: dryRun ? undefined : printOutcome,
  });

  console.log(formatDeletionReport(result));
  if (!dryRun) {
    const logPath = writeDeletionLog(result, LOGS_DIR);
    console.log(`\x1b[2mLog: ${logPath}\x1b[0m`);
  }
}

async function cmdScan(args: CliArgs) {
  const config = buildConfig(args);
  const scan = scanForOrphans(config);

  console.log(`Roots: ${scan.roots.map((r) => r.path).join(", ")}`);
  console.log(`Known applications: ${scan.installedNames.length}\n`);
  console.log(formatScanReport(scan.candidates, { verbose: args.verbose }));

  const orphans = orphansOf(scan.candidates);
  if (orphans.length === 0) {
    console.log("\x1b[32m✓ No orphans found.\x1b[0m");
  } else {
    const total = orphans.reduce((sum, o) => sum + o.sizeBytes, 0);
    console.log(`\x1b[33mFound ${orphans.length} orphan(s), ${formatBytes(total)}.\x1b[0m`);
    console.log("Run 'osweep clean' to review and delete them.");
  }
}

async function cmdClean(args: CliArgs) {
  const config = buildConfig(args);
  const scan = scanForOrphans(config);
  console.log(formatScanReport(scan.candidates, { verbose: args.verbose }));

  if (orphansOf(scan.candidates).length === 0) {
    console.log("\x1b[32m✓ No orphans found.\x1b[0m");
    return;
  }

  const selection = await selectForDeletion(scan.candidates, args.auto);
  await deleteSelection(selection, config, args.dryRun);
}

async function cmdArtifacts(args: CliArgs) {
  if (!args.target) {
    throw new ConfigurationError("Please specify a root folder for artifacts.");
  }
  const config = buildConfig(args);
  const candidates = scanForArtifacts(args.target, args.artifactName, config);

  if (orphansOf(candidates).length === 0) {
    console.log(`\x1b[32m✓ No ${args.artifactName} folders above ${formatBytes(config.minSizeMB * 1024 * 1024)}.\x1b[0m`);
    return;
  }
  console.log(formatScanReport(candidates, { verbose: args.verbose }));

  const selection = await selectForDeletion(candidates, args.auto);
  await deleteSelection(selection, config, args.dryRun);
}

async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (args.version) {
    console.log(VERSION);
    process.exit(0);
  }

  if (args.help || !args.command) {
    printHelp();
    process.exit(0);
  }

  switch (args.command) {
    case "scan":
      await cmdScan(args);
      break;
    case "clean":
      await cmdClean(args);
      break;
    case "artifacts":
      await cmdArtifacts(args);
      break;
    default:
      console.error(`Unknown command: ${args.command}`);
      printHelp();
      process.exit(1);
  }
}

main().catch((err) => {
  if (err instanceof ConfigurationError) {
    console.error(`\x1b[31mConfiguration error:\x1b[0m ${err.message}`);
  } else {
    console.error("Error:", err instanceof Error ? err.message : err);
  }
  process.exit(1);
});
