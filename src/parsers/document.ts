/**
 * Shape checks for the raw tracker dump.
 *
 * The dump is checked once here; everything downstream reads typed data.
 * Unknown keys are dropped at every level so upstream schema growth does
 * not break conversion.
 */

import { StructuralError } from "../errors";
import { RawCveEntry, RawReleaseEntry, RawTrackerDocument } from "../types";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Type a parsed JSON dump. Only a top level that is not an object fails the
 * whole document; problems further down are left for the loader to report
 * per entry.
 *
 * Maps are built with Object.fromEntries so keys such as "__proto__" stay
 * own properties.
 */
export function readTrackerDocument(json: unknown): RawTrackerDocument {
  if (!isRecord(json)) {
    throw new StructuralError([], "tracker document must be a JSON object keyed by package name");
  }

  return Object.fromEntries(
    Object.entries(json).map(
      ([pkg, cves]): [string, Record<string, RawCveEntry> | null] => [pkg, isRecord(cves) ? toPackageEntry(cves) : null],
    ),
  );
}

function toPackageEntry(cves: Record<string, unknown>): Record<string, RawCveEntry> {
  return Object.fromEntries(
    Object.entries(cves).map(([cve, entry]): [string, RawCveEntry] => [cve, toCveEntry(entry)]),
  );
}

function toCveEntry(value: unknown): RawCveEntry {
  if (!isRecord(value)) return {};

  const entry: RawCveEntry = {
    description: typeof value.description === "string" ? value.description : undefined,
    scope: typeof value.scope === "string" ? value.scope : undefined,
    debianbug: typeof value.debianbug === "number" ? value.debianbug : undefined,
  };

  if (isRecord(value.releases)) {
    entry.releases = Object.fromEntries(
      Object.entries(value.releases).map(([release, raw]): [string, RawReleaseEntry] => [release, toReleaseEntry(raw)]),
    );
  }

  return entry;
}

// A release that is not an object reads as one without a status
function toReleaseEntry(value: unknown): RawReleaseEntry {
  if (!isRecord(value)) return {};

  const repositories: Record<string, string> = isRecord(value.repositories)
    ? Object.fromEntries(
      Object.entries(value.repositories).filter(
        (pair): pair is [string, string] => typeof pair[1] === "string",
      ),
    )
    : {};

  return {
    status: typeof value.status === "string" ? value.status : undefined,
    repositories,
    urgency: typeof value.urgency === "string" ? value.urgency : undefined,
    // non-string values become "" so the status parser reports them malformed
    fixed_version: value.fixed_version === undefined || value.fixed_version === null
      ? undefined
      : typeof value.fixed_version === "string" ? value.fixed_version : "",
  };
}

export interface TrackerEntry {
  description: string;
  scope: string;
  debianBug?: number;
  releases: Map<string, RawReleaseEntry>;
}

/**
 * Validate one CVE entry. Throws StructuralError when it has no releases map.
 */
export function readCveEntry(pkg: string, cve: string, entry: RawCveEntry): TrackerEntry {
  const rawReleases: unknown = entry.releases;
  if (!isRecord(rawReleases)) {
    throw new StructuralError([pkg, cve], 'missing "releases" map');
  }

  const releases = new Map<string, RawReleaseEntry>();
  for (const [release, value] of Object.entries(rawReleases)) {
    releases.set(release, toReleaseEntry(value));
  }

  return {
    description: entry.description ?? "",
    scope: entry.scope ?? "",
    debianBug: entry.debianbug,
    releases,
  };
}
