#!/usr/bin/env node
/**
 * MCP Server: orphan-sweep
 * Exposes orphan classification and unattended cleanup as tools.
 * Interactive review is CLI-only; delete_orphans always acts on the full orphan set.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { orphansOf } from "./lib/classifier.js";
import { LOGS_DIR, loadConfig, type SweepConfig } from "./lib/config.js";
import { executeDeletion } from "./lib/deletion.js";
import { ConfigurationError } from "./lib/errors.js";
import { formatBytes, formatDeletionReport, formatScanReport, writeDeletionLog } from "./lib/report.js";
import { autoSelect } from "./lib/session.js";
import { scanForArtifacts, scanForOrphans } from "./lib/sweep.js";

const server = new Server(
  {
    name: "orphan-sweep",
    version: "0.3.0",
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

const scanProperties = {
  roots: {
    type: "array",
    items: { type: "string" },
    description: "Optional: Folders whose children are classified. Defaults to the platform's application data folders.",
  },
  min_size_mb: {
    type: "number",
    description: "Ignore folders smaller than this many MB. Default: 1",
  },
  whitelist: {
    type: "array",
    items: { type: "string" },
    description: "Extra folder names that must never be reported as orphans.",
  },
  installed_names: {
    type: "array",
    items: { type: "string" },
    description: "Optional: Known application names. Replaces local detection when given.",
  },
};

function optionalStrings(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((v): v is string => typeof v === "string");
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

function configFromArgs(args: Record<string, unknown>): SweepConfig {
  return loadConfig({
    overrides: {
      roots: optionalStrings(args.roots),
      minSizeMB: optionalNumber(args.min_size_mb),
      whitelist: optionalStrings(args.whitelist),
      concurrency: optionalNumber(args.concurrency),
    },
  });
}

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      {
        name: "scan_orphans",
        description:
          "Classify application data folders as protected, too small, owned by an installed application, or orphaned. Makes no changes.",
        inputSchema: {
          type: "object" as const,
          properties: {
            ...scanProperties,
            verbose: {
              type: "boolean",
              description: "Also list kept folders and why. Default: false",
            },
          },
        },
      },
      {
        name: "find_nested_artifacts",
        description:
          "Find the topmost folders with a given name (e.g. node_modules) under a root, collapsing nested copies into their ancestor.",
        inputSchema: {
          type: "object" as const,
          properties: {
            root: {
              type: "string",
              description: "Folder to search below",
            },
            name: {
              type: "string",
              description: "Folder name to collect. Default: node_modules",
            },
            min_size_mb: {
              type: "number",
              description: "Ignore folders smaller than this many MB. Default: 1",
            },
          },
          required: ["root"],
        },
      },
      {
        name: "delete_orphans",
        description:
          "Delete every orphan found by scan_orphans. Failures on one folder never stop the rest. Reports calculated and observed freed space.",
        inputSchema: {
          type: "object" as const,
          properties: {
            ...scanProperties,
            concurrency: {
              type: "number",
              description: "Parallel deletions, 1-16. Default: 4",
            },
            dry_run: {
              type: "boolean",
              description: "Show what would be deleted without deleting. Default: true",
            },
          },
        },
      },
    ],
  };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  const typedArgs: Record<string, unknown> = args ?? {};

  try {
    switch (name) {
      case "scan_orphans": {
        const config = configFromArgs(typedArgs);
        const scan = scanForOrphans(config, { installedNames: optionalStrings(typedArgs.installed_names) });

        let output = `🔍 **Orphan Scan**\n\n`;
        output += `Roots: ${scan.roots.map((r) => `\`${r.path}\``).join(", ")}\n`;
        output += `Known applications: ${scan.installedNames.length}\n\n`;
        output += "```\n" + formatScanReport(scan.candidates, { verbose: typedArgs.verbose === true }) + "```\n";

        const orphans = orphansOf(scan.candidates);
        if (orphans.length > 0) {
          const total = orphans.reduce((sum, o) => sum + o.sizeBytes, 0);
          output += `\n💡 ${orphans.length} orphan(s), ${formatBytes(total)}. Run \`delete_orphans\` to remove them.`;
        }

        return { content: [{ type: "text", text: output }] };
      }

      case "find_nested_artifacts": {
        const root = typeof typedArgs.root === "string" ? typedArgs.root : "";
        const artifactName = typeof typedArgs.name === "string" && typedArgs.name ? typedArgs.name : "node_modules";
        const config = configFromArgs({ min_size_mb: typedArgs.min_size_mb });
        const candidates = scanForArtifacts(root, artifactName, config);

        if (candidates.length === 0) {
          return { content: [{ type: "text", text: `✅ No ${artifactName} folders under ${root}.` }] };
        }

        let output = `📦 **${artifactName} folders under ${root}**\n\n`;
        output += "```\n" + formatScanReport(candidates) + "```\n";
        return { content: [{ type: "text", text: output }] };
      }

      case "delete_orphans": {
        const config = configFromArgs(typedArgs);
        const dryRun = typedArgs.dry_run !== false;
        const scan = scanForOrphans(config, { installedNames: optionalStrings(typedArgs.installed_names) });
        const selection = autoSelect(scan.candidates);

        if (selection.length === 0) {
          return { content: [{ type: "text", text: "✅ No orphans found. Nothing to delete." }] };
        }

        const result = await executeDeletion(selection, { concurrency: config.concurrency, dryRun });
        let output = `🧹 **${dryRun ? "Dry Run" : "Cleanup"}**\n\n`;
        output += "```\n" + formatDeletionReport(result) + "```\n";
        if (!dryRun) {
          output += `\nLog: \`${writeDeletionLog(result, LOGS_DIR)}\``;
        } else {
          output += `\n💡 Call again with \`dry_run: false\` to delete.`;
        }

        return { content: [{ type: "text", text: output }] };
      }

      default:
        return {
          content: [{ type: "text", text: `Unknown tool: ${name}` }],
          isError: true,
        };
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const prefix = error instanceof ConfigurationError ? "Configuration error" : "Error";
    return {
      content: [{ type: "text", text: `${prefix}: ${message}` }],
      isError: true,
    };
  }
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("orphan-sweep MCP server running on stdio");
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
