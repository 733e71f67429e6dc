/**
 * Generate a report to summarize one conversion pass.
 */

import { ConversionResult } from "./loader";
import { RangeState, SkippedEntry } from "./types";

export interface ReportMetadata {
  source: string;
  format: "canonical" | "osv";
  timestamp: string;
  durationMs: number;
}

export interface Report {
  metadata: ReportMetadata;
  summary: {
    totalRecords: number;
    totalPackages: number;
    totalRanges: number;
    rangesByState: Record<RangeState, number>;
    lowConfidenceRanges: number;
    skippedEntries: number;
    ignoredEntries: number;
  };
  skipped: SkippedEntry[];
}

export function generateReport(result: ConversionResult, metadata: ReportMetadata): Report {
  const rangesByState: Record<RangeState, number> = {
    affected: 0,
    fixed: 0,
    unaffected: 0,
    indeterminate: 0,
  };
  let totalRanges = 0;
  let lowConfidenceRanges = 0;

  for (const record of result.records) {
    for (const range of record.affected) {
      totalRanges++;
      rangesByState[range.state]++;
      if (range.lowConfidence) lowConfidenceRanges++;
    }
  }

  return {
    metadata,
    summary: {
      totalRecords: result.records.length,
      totalPackages: new Set(result.records.map((r) => r.package)).size,
      totalRanges,
      rangesByState,
      lowConfidenceRanges,
      skippedEntries: result.skipped.length,
      ignoredEntries: result.ignoredCount,
    },
    skipped: result.skipped,
  };
}

/**
 * Lines listing skipped entries for the console summary. The CLI converts
 * with a silent onSkip, so this is the only place they are printed.
 */
export function formatSkipped(skipped: readonly SkippedEntry[]): string[] {
  return skipped.flatMap((entry) => [
    `  ${entry.cve ? `${entry.package} ${entry.cve}` : entry.package}`,
    `    └─ ${entry.reason}`,
  ]);
}
