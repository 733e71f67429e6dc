#!/usr/bin/env node
/**
 * CLI entrypoint for the tracker normalizer.
 *
 * Usage:
 *   tracker-normalize [options] [file]
 *
 * Options:
 *   --url [url]                   Fetch the tracker dump instead of reading a file
 *   --output <path>               Write all records to one JSON file (default: records.json)
 *   --output-dir <dir>            Write one JSON file per record instead
 *   --format <canonical|osv>      Output format (default: canonical)
 *   --exclude-low-confidence      Drop ranges derived from incomplete data
 *   --ignore-file <path>          Path to ignore file (default: .trackerignore)
 *   --modified <timestamp>        OSV "modified" value (default: omitted)
 *   --help                        Show help message
 *
 * For development: use `npm run dev` (no build needed).
 */

import path from "node:path";
import { loadIgnoreList } from "./ignore";
import { convert } from "./loader";
import { toOsv } from "./osv";
import { withoutLowConfidence } from "./reconcile";
import { formatSkipped, generateReport, Report } from "./report";
import { JsonDirectorySink, JsonFileSink, RecordSink } from "./sinks";
import { DEFAULT_TRACKER_URL, fetchTrackerDocument, readTrackerFile } from "./sources/tracker";
import { RawTrackerDocument } from "./types";

type OutputFormat = "canonical" | "osv";

interface CliOptions {
  filePath: string;
  url?: string;
  output: string;
  outputDir?: string;
  format: OutputFormat;
  excludeLowConfidence: boolean;
  ignoreFile?: string;
  modified?: string;
}

function printHelp() {
  console.log(`
Usage: tracker-normalize [options] [file]

Options:
  --url [url]                   Fetch the tracker dump (default: DEBIAN_TRACKER_URL or ${DEFAULT_TRACKER_URL})
  --output <path>               Write all records to one JSON file (default: records.json)
  --output-dir <dir>            Write <dir>/<package>/<CVE>.json per record
  --format <canonical|osv>      Output format (default: canonical)
  --exclude-low-confidence      Drop ranges derived from incomplete or contradictory data
  --ignore-file <path>          Path to ignore file (default: .trackerignore)
  --modified <timestamp>        Set OSV "modified" (omitted by default for reproducible output)
  --help                        Show this help message

Examples:
  tracker-normalize tracker.json                   Convert a downloaded dump
  tracker-normalize --url                          Fetch and convert the live dump
  tracker-normalize --format osv --output-dir osv  One OSV file per record
`);
  process.exit(0);
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const options: CliOptions = {
    filePath: path.join(process.cwd(), "tracker.json"),
    output: path.join(process.cwd(), "records.json"),
    format: "canonical",
    excludeLowConfidence: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      printHelp();
    } else if (arg === "--url") {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("-")) {
        options.url = next;
        i++;
      } else {
        options.url = process.env.DEBIAN_TRACKER_URL || DEFAULT_TRACKER_URL;
      }
    } else if (arg === "--output") {
      options.output = requireValue(arg, args[++i]);
    } else if (arg === "--output-dir") {
      options.outputDir = requireValue(arg, args[++i]);
    } else if (arg === "--format") {
      const value = args[++i];
      if (value !== "canonical" && value !== "osv") {
        fail(`Invalid --format value: ${value}. Must be 'canonical' or 'osv'.`);
      }
      options.format = value;
    } else if (arg === "--exclude-low-confidence") {
      options.excludeLowConfidence = true;
    } else if (arg === "--ignore-file") {
      options.ignoreFile = requireValue(arg, args[++i]);
    } else if (arg === "--modified") {
      options.modified = requireValue(arg, args[++i]);
    } else if (!arg.startsWith("-")) {
      options.filePath = arg;
    } else {
      fail(`Unknown option: ${arg}`);
    }
  }

  return options;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("-")) {
    fail(`Missing value for ${flag}`);
  }
  return value;
}

async function readInput(options: CliOptions): Promise<RawTrackerDocument> {
  if (options.url) {
    console.log(`🌐 Fetching: ${options.url}`);
    return fetchTrackerDocument(options.url);
  }
  console.log(`📂 Reading: ${options.filePath}`);
  return readTrackerFile(options.filePath);
}

async function main() {
  const startTime = Date.now();
  const options = parseArgs();

  const doc = await readInput(options);
  const ignored = loadIgnoreList(options.url ? undefined : options.filePath, options.ignoreFile);

  // skipped entries are listed once, in the summary
  const result = convert(doc, { ignored, onSkip: () => undefined });

  const sink: RecordSink<unknown> = options.outputDir
    ? new JsonDirectorySink(options.outputDir)
    : new JsonFileSink(options.output);

  for (const converted of result.records) {
    const record = options.excludeLowConfidence ? withoutLowConfidence(converted) : converted;
    const value = options.format === "osv"
      ? toOsv(record, { modified: options.modified, includeLowConfidence: !options.excludeLowConfidence })
      : record;
    sink.write(record.id, record.package, value);
  }
  const written = sink.close();

  const durationMs = Date.now() - startTime;
  const report = generateReport(result, {
    source: options.url ?? options.filePath,
    format: options.format,
    timestamp: new Date().toISOString(),
    durationMs,
  });
  printSummary(report);

  const elapsed = (durationMs / 1000).toFixed(2);
  console.log(`\n💾 Wrote ${written} record(s) to ${options.outputDir ?? options.output}`);
  console.log(`⏱️  Completed in ${elapsed} seconds`);
}

/**
 * Print summary of the report to the console.
 */
function printSummary(report: Report) {
  const { summary, skipped } = report;
  const states = summary.rangesByState;

  console.log("\n" + "─".repeat(60));
  console.log(`Records: ${summary.totalRecords}  |  Packages: ${summary.totalPackages}  |  Ranges: ${summary.totalRanges}`);
  console.log(
    `Affected: ${states.affected}  |  Fixed: ${states.fixed}  |  ` +
    `Unaffected: ${states.unaffected}  |  Indeterminate: ${states.indeterminate}`,
  );
  console.log("─".repeat(60));

  if (summary.lowConfidenceRanges > 0) {
    console.log(`\n🟡 ${summary.lowConfidenceRanges} low-confidence range(s)`);
  }
  if (summary.ignoredEntries > 0) {
    console.log(`📋 ${summary.ignoredEntries} entr(y/ies) ignored`);
  }

  if (skipped.length === 0) {
    console.log("\n✅ No structural errors");
    return;
  }

  console.log(`\n⚠️ Skipped ${skipped.length} malformed entr(y/ies):\n`);
  for (const line of formatSkipped(skipped)) console.log(line);
}

main().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error("\n🚨 Conversion failed:", message);
  if (process.env.DEBUG && err instanceof Error) console.error(err.stack);
  process.exit(1);
});
