#!/usr/bin/env node

import { parseArgs } from "util";
import { versionCommand } from "./commands/version.js";
import { importCommand } from "./commands/import.js";
import { importAllCommand } from "./commands/importAll.js";
import { writeCommand } from "./commands/write.js";
import { readCommand } from "./commands/read.js";
import { pingCommand } from "./commands/ping.js";
import { inspectCommand } from "./commands/inspect.js";
import { flushCommand } from "./commands/flush.js";
import {
  parseGlobalOptions,
  parseImportOptions,
  parseImportAllOptions,
  parseWriteOptions,
  parseReadOptions,
  parseInspectOptions,
  parseFlushOptions,
} from "./argParsing.js";
import { TOOL_NAME } from "../config/constants.js";

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    strict: false,
    options: {
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
      config: { type: "string", short: "c" },
      "log-level": { type: "string" },
      "log-format": { type: "string" },
      "dry-run": { type: "boolean" },
      output: { type: "string", short: "o" },
      tag: { type: "string", short: "t" },
      versions: { type: "string" },
      keys: { type: "string", short: "k" },
      workers: { type: "string", short: "w" },
      "batch-size": { type: "string", short: "b" },
      project: { type: "string" },
      duration: { type: "string", short: "d" },
      start: { type: "string" },
      mode: { type: "string", short: "m" },
      reads: { type: "string", short: "n" },
      primary: { type: "string" },
      secondary: { type: "string" },
      "max-keys": { type: "string" },
      pattern: { type: "string", short: "p" },
      yes: { type: "boolean", short: "y" },
    },
  });

  if (values.help) {
    showHelp();
    process.exit(0);
  }

  if (values.version) {
    await versionCommand({});
    process.exit(0);
  }

  const global = parseGlobalOptions(values);
  const command = positionals[0];

  if (!command) {
    showHelp();
    process.exit(1);
  }

  switch (command) {
    case "import":
      await importCommand(parseImportOptions(global, values));
      break;

    case "import-all":
      await importAllCommand(parseImportAllOptions(global, values));
      break;

    case "write":
      await writeCommand(parseWriteOptions(global, values));
      break;

    case "read":
      await readCommand(parseReadOptions(global, values));
      break;

    case "ping":
      await pingCommand(global);
      break;

    case "inspect":
      await inspectCommand(parseInspectOptions(global, values));
      break;

    case "flush":
      await flushCommand(parseFlushOptions(global, values));
      break;

    case "version":
      await versionCommand(global);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error("");
      showHelp();
      process.exit(1);
  }
}

function showHelp(): void {
  console.log(`
${TOOL_NAME} - bulk loader and read benchmark for Redis-compatible stores

Usage:
  ${TOOL_NAME} [global-options] <command> [command-options]

Commands:
  import            Partitioned parallel import of one version
  import-all        Import several versions in sequence (--versions)
  write             Run a single continuous writer
  read              Read benchmark with primary/secondary version fallback
  ping              Connect to the store and ping it
  inspect           Count keys of a version (or pattern) and show sample TTLs
  flush             Delete every key in the store (requires --yes)
  version           Show version information

Global Options:
  -c, --config PATH      Path to configuration file
  --log-level LEVEL      Log level: debug, info, warn, error (default: info)
  --log-format FORMAT    Log format: json, pretty (default: pretty)
  --dry-run              Use an in-memory store instead of connecting
  -o, --output PATH      Write the report as JSON
  -h, --help             Show this help message
  -v, --version          Show version

 Import Options:
   -t, --tag VERSION     Version tag to write (default: v<day-of-month>)
   -k, --keys N          Keys to import (default: writer.maxKeys)
   -w, --workers N       Parallel writers (default: writer.numWriters)
   -b, --batch-size N    Keys per pipeline (default: writer.batchSize)

 Import-all Options:
   --versions LIST       Comma-separated version tags (required)
   --project N           Project the time to import N keys
   -k, -w, -b            As for import, applied to every version

 Write Options:
   -t, --tag VERSION     Version tag to write
   -k, --keys N          Stop after N keys are written
   -d, --duration SEC    Stop after SEC seconds
   --start ID            First id to write (default: 0)
   -b, --batch-size N    Keys per pipeline

 Read Options:
   -m, --mode MODE       sequential, pipeline, parallel-pipeline (default)
   -n, --reads N         Number of reads (default: 10000)
   -w, --workers N       Parallel readers (ignored by pipeline)
   -b, --batch-size N    Ids per pipeline
   --primary VERSION     Version tried first
   --secondary VERSION   Version tried on a primary miss
   --max-keys N          Ids are drawn from [0, N)

 Inspect Options:
   -t, --tag VERSION     Version to count (default: v<day-of-month>)
   -p, --pattern GLOB    Key pattern, overrides --tag

 Examples:
   ${TOOL_NAME} ping
   ${TOOL_NAME} import --tag v22 --keys 200000 --workers 8
   ${TOOL_NAME} import-all --versions v22,v23 --project 20000000
   ${TOOL_NAME} write --duration 60
   ${TOOL_NAME} read --mode sequential --reads 5000 --workers 4
   ${TOOL_NAME} read --primary v23 --secondary v22 -o read-report.json
   ${TOOL_NAME} --dry-run import --keys 1000
`);
}

main().catch((error) => {
  console.error(
    `Fatal error: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
