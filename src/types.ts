/**
 * Shared types for the tracker normalizer.
 *
 * Raw* types mirror the Debian security tracker JSON dump
 * (package -> CVE -> release). Everything downstream of the loader works on
 * the canonical types at the bottom of this file.
 */

export interface RawReleaseEntry {
  status?: string;
  repositories?: Record<string, string>;
  urgency?: string;
  fixed_version?: string;
}

export interface RawCveEntry {
  description?: string;
  scope?: string;
  debianbug?: number;
  releases?: Record<string, RawReleaseEntry>;
}

// null marks a package whose value was not a CVE map; the loader skips it
export type RawTrackerDocument = Record<string, Record<string, RawCveEntry> | null>;

/** Marker for an open end of an affected range. */
export const UNBOUNDED = "unbounded";

/** fixed_version value meaning "fixed before tracking began". */
export const NEVER_AFFECTED = "0";

export type IndeterminateReason =
  | "unrecognized-status"
  | "missing-status"
  | "malformed-fixed-version"
  | "resolved-without-fixed-version";

export type ReleaseStatus =
  | { kind: "open"; fixedVersion?: string }
  | { kind: "resolved"; fixedVersion?: string }
  | { kind: "indeterminate"; status: string; reason: IndeterminateReason; detail?: string };

export type LowConfidenceReason =
  | IndeterminateReason
  | "shipped-below-fixed-version";

/** Inconsistencies that leave the range usable. */
export type RangeNote = "open-with-fixed-version";

export type RangeState = "affected" | "fixed" | "unaffected" | "indeterminate";

export interface ShippedVersion {
  suite: string;
  version: string;
  // null when the shipped version itself cannot be parsed
  affected: boolean | null;
}

export interface AffectedRange {
  readonly ecosystem: string;
  readonly lower: string;
  readonly upper: string;
  readonly fixedVersion?: string;
  readonly state: RangeState;
  readonly lowConfidence: boolean;
  readonly lowConfidenceReason?: LowConfidenceReason;
  readonly note?: RangeNote;
  readonly status: string;
  readonly urgency: string;
  readonly repositories: readonly ShippedVersion[];
}

export interface VulnerabilityRecord {
  readonly id: string;
  readonly package: string;
  readonly description: string;
  readonly scope: string;
  readonly debianBug?: number;
  readonly affected: readonly AffectedRange[];
}

export interface SkippedEntry {
  package: string;
  // "" when the whole package entry was unusable
  cve: string;
  reason: string;
}
