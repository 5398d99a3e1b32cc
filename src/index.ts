#!/usr/bin/env node

import { resolve } from "node:path";
import { resolveOutputDir } from "./config/paths";
import { ConversionResult, convertDump } from "./services/converter";
import { writeAllCsv } from "./services/csv-writer";
import { loadDump } from "./services/dump-loader";
import { buildEventRows, buildSignallingRows } from "./services/row-builder";
import { buildDumpSummary, countBy, formatDumpSummary } from "./services/summary-formatter";
import { WalkIssue } from "./types/records";

interface CliOptions {
  input?: string;
  outputRoot?: string;
  includeDetail?: boolean;
  dryRun?: boolean;
  quiet?: boolean;
}

interface ParsedCli {
  command: string | undefined;
  options: CliOptions;
}

async function main(): Promise<void> {
  const { command, options } = parseCli(process.argv.slice(2));

  switch (command) {
    case "convert":
      handleConvert(options);
      break;
    case "inspect":
      handleInspect(options);
      break;
    case "help":
    case undefined:
      printHelp();
      break;
    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      process.exitCode = 1;
  }
}

function handleConvert(options: CliOptions): void {
  const result = loadAndConvert(options);
  if (!result) {
    return;
  }

  logIssues(result.walk.issues, options.quiet ?? false);

  const { index, walk } = result;
  const outputDir = resolveOutputDir(result.dump.source, options.outputRoot);

  if (options.dryRun) {
    const signalling = buildSignallingRows(walk.messages, index, { includeDetail: options.includeDetail });
    const events = buildEventRows(walk.events, index);
    console.log(`Dry run: would write to ${outputDir}`);
    console.log(`  coordinates.csv: ${index.coveredSeconds()} row(s)`);
    console.log(`  signalling.csv: ${signalling.length} row(s)`);
    console.log(`  events.csv: ${events.length} row(s)`);
    return;
  }

  const outputs = writeAllCsv(outputDir, index, walk.messages, walk.events, {
    includeDetail: options.includeDetail
  });

  for (const output of [outputs.coordinates, outputs.signalling, outputs.events]) {
    console.log(`Wrote ${output.rows} row(s) to ${output.file}`);
  }
}

function handleInspect(options: CliOptions): void {
  const result = loadAndConvert(options);
  if (!result) {
    return;
  }

  logIssues(result.walk.issues, true);
  console.log(formatDumpSummary(buildDumpSummary(result)));
}

function loadAndConvert(options: CliOptions): ConversionResult | undefined {
  if (!options.input) {
    console.error("Missing required option: --input <file>");
    process.exitCode = 1;
    return undefined;
  }

  const inputPath = resolve(process.cwd(), options.input);
  const dump = loadDump(inputPath);
  console.log(`${dump.records.length} log records found`);

  return convertDump(dump);
}

function logIssues(issues: WalkIssue[], quiet: boolean): void {
  if (issues.length === 0) {
    return;
  }

  if (quiet) {
    const counts = countBy(issues, (issue) => issue.reason);
    const breakdown = Array.from(counts.entries())
      .map(([reason, count]) => `${reason}=${count}`)
      .join(", ");
    console.warn(`${issues.length} issue(s) while reading records: ${breakdown}`);
    return;
  }

  for (const issue of issues) {
    const action = issue.skipped ? "skipped" : "kept";
    console.warn(`[${issue.reason}] ${issue.kind} #${issue.recordIndex} ${action}: ${issue.detail}`);
  }
}

function parseCli(argv: string[]): ParsedCli {
  const [command, ...rest] = argv;
  const options: CliOptions = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case "--input":
        options.input = rest[++i];
        break;
      case "--output-root":
        options.outputRoot = rest[++i];
        break;
      case "--include-detail":
        options.includeDetail = true;
        break;
      case "--dry-run":
        options.dryRun = true;
        break;
      case "--quiet":
        options.quiet = true;
        break;
      default:
        console.warn(`Unknown option ignored: ${arg}`);
    }
  }

  return { command, options };
}

function printHelp(): void {
  console.log(`
Usage: nsg-convert <command> [options]

Commands:
  convert --input <file> [--output-root dir] [--include-detail] [--dry-run] [--quiet]
          Write coordinates.csv, signalling.csv and events.csv to <output-root>/<name>
          (output-root defaults to ./output)

  inspect --input <file>
          Print device, capture window, record counts and location coverage

  help    Show this help

Examples:
  npm run dev -- convert --input ./dumps/drive-test.json
  npm run dev -- convert --input ./dumps/drive-test.json --output-root ./csv --include-detail
  npm run dev -- inspect --input ./dumps/drive-test.json
`);
}

void main().catch((error) => {
  console.error("Command failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
