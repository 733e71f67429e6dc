/**
 * Walk a tracker document (package -> CVE -> release) and emit one canonical
 * record per package+CVE pair.
 *
 * load() is lazy and restartable: each iteration walks the same parsed
 * document again, and a consumer may stop pulling at any point. Packages and
 * CVEs are visited in byte order, so output never depends on key order.
 */

import { StructuralError } from "./errors";
import { readCveEntry } from "./parsers/document";
import { parseReleaseStatus } from "./parsers/release";
import { reconcile } from "./reconcile";
import { compareBytes, resolveRange } from "./resolve";
import { AffectedRange, RawCveEntry, RawTrackerDocument, SkippedEntry, VulnerabilityRecord } from "./types";

export interface LoadOptions {
  /** CVE ids or package names to leave out of the output. */
  ignored?: ReadonlySet<string>;
  onSkip?: (skipped: SkippedEntry) => void;
  onIgnore?: (pkg: string, cve: string) => void;
}

export interface ConversionResult {
  records: VulnerabilityRecord[];
  skipped: SkippedEntry[];
  ignoredCount: number;
}

function logSkipped(skipped: SkippedEntry): void {
  const where = skipped.cve ? `${skipped.package} ${skipped.cve}` : skipped.package;
  console.warn(`⚠️ Skipping ${where}: ${skipped.reason}`);
}

/**
 * Build the canonical record for one package+CVE pair.
 * Throws StructuralError when the entry has no usable releases map.
 */
export function convertEntry(pkg: string, cve: string, raw: RawCveEntry): VulnerabilityRecord {
  const entry = readCveEntry(pkg, cve, raw);

  const perRelease = new Map<string, AffectedRange>();
  for (const [release, releaseEntry] of entry.releases) {
    const status = parseReleaseStatus(releaseEntry);
    perRelease.set(release, resolveRange(release, releaseEntry, status));
  }

  return Object.freeze({
    id: cve,
    package: pkg,
    description: entry.description,
    scope: entry.scope,
    ...(entry.debianBug !== undefined ? { debianBug: entry.debianBug } : {}),
    affected: reconcile(perRelease),
  });
}

export function load(doc: RawTrackerDocument, options: LoadOptions = {}): Iterable<VulnerabilityRecord> {
  const { ignored, onSkip = logSkipped, onIgnore } = options;

  return {
    *[Symbol.iterator]() {
      for (const pkg of Object.keys(doc).sort(compareBytes)) {
        const cves = doc[pkg];
        if (cves === null) {
          if (ignored?.has(pkg)) continue;
          const err = new StructuralError([pkg], "package entry must be an object keyed by CVE id");
          onSkip({ package: pkg, cve: "", reason: err.message });
          continue;
        }
        for (const cve of Object.keys(cves).sort(compareBytes)) {
          if (ignored?.has(cve) || ignored?.has(pkg)) {
            onIgnore?.(pkg, cve);
            continue;
          }

          let record: VulnerabilityRecord;
          try {
            record = convertEntry(pkg, cve, cves[cve]);
          } catch (err) {
            if (!(err instanceof StructuralError)) throw err;
            onSkip({ package: pkg, cve, reason: err.message });
            continue;
          }
          yield record;
        }
      }
    },
  };
}

/**
 * Run a full conversion pass and collect what was produced and skipped.
 */
export function convert(doc: RawTrackerDocument, options: LoadOptions = {}): ConversionResult {
  const skipped: SkippedEntry[] = [];
  let ignoredCount = 0;
  const { onSkip = logSkipped, onIgnore } = options;

  const records = [
    ...load(doc, {
      ignored: options.ignored,
      onSkip: (entry) => {
        skipped.push(entry);
        onSkip(entry);
      },
      onIgnore: (pkg, cve) => {
        ignoredCount++;
        onIgnore?.(pkg, cve);
      },
    }),
  ];

  return { records, skipped, ignoredCount };
}
