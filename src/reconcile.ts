/**
 * Reconcile the per-release ranges of one CVE+package into the canonical set.
 *
 * Strategy:
 * - One range per release (each release is its own ecosystem, never merged)
 * - Contradictions are flagged as low confidence, never dropped
 * - An open release stays confident; a stray fix version is only noted
 * - Output ordered by release name (byte order) so snapshots diff cleanly
 * - No timestamps or counters, so reconciling twice gives identical output
 */

import { compareBytes } from "./resolve";
import { AffectedRange, LowConfidenceReason, RangeNote, VulnerabilityRecord } from "./types";

const OPEN_WITH_FIXED_VERSION: RangeNote = "open-with-fixed-version";

export function reconcile(perRelease: ReadonlyMap<string, AffectedRange>): readonly AffectedRange[] {
  const releases = [...perRelease.keys()].sort(compareBytes);
  const ranges: AffectedRange[] = [];

  for (const release of releases) {
    const range = perRelease.get(release);
    if (!range) continue;

    const contradiction = findContradiction(range);
    const flagged = contradiction && !range.lowConfidence
      ? { ...range, lowConfidence: true, lowConfidenceReason: contradiction }
      : range;
    const checked = range.state === "affected" && range.fixedVersion !== undefined
      ? { ...flagged, note: OPEN_WITH_FIXED_VERSION }
      : flagged;

    ranges.push(freezeRange({ ...checked, ecosystem: release }));
  }

  return Object.freeze(ranges);
}

/**
 * Detect signals within one release that disagree with each other.
 */
function findContradiction(range: AffectedRange): LowConfidenceReason | undefined {
  if (range.state === "fixed") {
    // Resolved, yet every suite still ships a version below the fix
    const checked = range.repositories.filter((r) => r.affected !== null);
    if (checked.length > 0 && checked.every((r) => r.affected === true)) {
      return "shipped-below-fixed-version";
    }
  }

  return undefined;
}

function freezeRange(range: AffectedRange): AffectedRange {
  return Object.freeze({
    ...range,
    repositories: Object.freeze(range.repositories.map((r) => Object.freeze({ ...r }))),
  });
}

/**
 * Copy of a record with its low-confidence ranges removed.
 */
export function withoutLowConfidence(record: VulnerabilityRecord): VulnerabilityRecord {
  return Object.freeze({
    ...record,
    affected: Object.freeze(record.affected.filter((range) => !range.lowConfidence)),
  });
}
