/**
 * Turn a parsed release status into the affected version interval for that
 * release.
 *
 * Ranges are half-open: [lower, upper). UNBOUNDED stands in for either open
 * end. The "0" fixed version yields the empty range [0, 0), kept in the
 * output so "checked, safe" stays distinguishable from "never checked".
 */

import { MalformedVersionError } from "./errors";
import {
  AffectedRange,
  NEVER_AFFECTED,
  RawReleaseEntry,
  ReleaseStatus,
  ShippedVersion,
  UNBOUNDED,
} from "./types";
import { compareVersions, parseVersion } from "./versions/debian";

type RangeShape = Omit<AffectedRange, "ecosystem" | "status" | "urgency" | "repositories">;

function shapeFor(status: ReleaseStatus): RangeShape {
  switch (status.kind) {
    case "open":
      // a fix version on an open entry is kept; the reconciler notes it
      return {
        lower: UNBOUNDED,
        upper: UNBOUNDED,
        ...(status.fixedVersion !== undefined ? { fixedVersion: status.fixedVersion } : {}),
        state: "affected",
        lowConfidence: false,
      };
    case "resolved":
      if (status.fixedVersion === undefined) {
        return {
          lower: UNBOUNDED,
          upper: UNBOUNDED,
          state: "indeterminate",
          lowConfidence: true,
          lowConfidenceReason: "resolved-without-fixed-version",
        };
      }
      if (status.fixedVersion === NEVER_AFFECTED) {
        return {
          lower: NEVER_AFFECTED,
          upper: NEVER_AFFECTED,
          fixedVersion: NEVER_AFFECTED,
          state: "unaffected",
          lowConfidence: false,
        };
      }
      return {
        lower: UNBOUNDED,
        upper: status.fixedVersion,
        fixedVersion: status.fixedVersion,
        state: "fixed",
        lowConfidence: false,
      };
    case "indeterminate":
      return {
        lower: UNBOUNDED,
        upper: UNBOUNDED,
        state: "indeterminate",
        lowConfidence: true,
        lowConfidenceReason: status.reason,
      };
  }
}

/**
 * Resolve the affected range of one release and annotate every shipped
 * repository version with whether it falls inside that range.
 */
export function resolveRange(
  release: string,
  entry: RawReleaseEntry,
  status: ReleaseStatus,
): AffectedRange {
  const shape = shapeFor(status);
  const draft = {
    ecosystem: release,
    ...shape,
    status: status.kind === "indeterminate" ? status.status : status.kind,
    urgency: typeof entry.urgency === "string" ? entry.urgency : "",
  };

  return { ...draft, repositories: annotateRepositories(draft, entry.repositories) };
}

/**
 * Whether a version lies inside the range. Throws MalformedVersionError when
 * the version cannot be parsed.
 */
export function isVersionAffected(
  range: Pick<AffectedRange, "lower" | "upper" | "state">,
  version: string,
): boolean {
  parseVersion(version);

  if (range.state === "unaffected") return false;
  if (range.lower !== UNBOUNDED && compareVersions(version, range.lower) < 0) return false;
  if (range.upper !== UNBOUNDED && compareVersions(version, range.upper) >= 0) return false;
  return true;
}

function annotateRepositories(
  range: Pick<AffectedRange, "lower" | "upper" | "state">,
  repositories: Record<string, string> | undefined,
): ShippedVersion[] {
  if (!repositories || typeof repositories !== "object") return [];

  return Object.keys(repositories)
    .sort(compareBytes)
    .map((suite) => {
      const version = repositories[suite];
      if (typeof version !== "string") {
        return { suite, version: String(version), affected: null };
      }
      try {
        return { suite, version, affected: isVersionAffected(range, version) };
      } catch (err) {
        if (err instanceof MalformedVersionError) {
          return { suite, version, affected: null };
        }
        throw err;
      }
    });
}

/**
 * Locale-independent byte order of two strings.
 */
export function compareBytes(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}
