/**
 * Parse one raw per-release tracker entry into a ReleaseStatus.
 *
 * Never throws: anything the tracker reports that we cannot interpret
 * becomes "indeterminate" with the raw status string kept for diagnostics.
 */

import { MalformedVersionError } from "../errors";
import { RawReleaseEntry, ReleaseStatus } from "../types";
import { parseVersion } from "../versions/debian";

export function parseReleaseStatus(raw: RawReleaseEntry): ReleaseStatus {
  const status = raw.status;

  if (typeof status !== "string") {
    return { kind: "indeterminate", status: "", reason: "missing-status" };
  }

  // "undetermined" and anything unknown land in the default branch
  switch (status) {
    case "open":
    case "resolved": {
      const fixed = raw.fixed_version;
      if (fixed === undefined) {
        return status === "open" ? { kind: "open" } : { kind: "resolved" };
      }
      const problem = checkFixedVersion(fixed);
      if (problem) {
        return { kind: "indeterminate", status, reason: "malformed-fixed-version", detail: problem };
      }
      return status === "open"
        ? { kind: "open", fixedVersion: fixed }
        : { kind: "resolved", fixedVersion: fixed };
    }
    default:
      return { kind: "indeterminate", status, reason: "unrecognized-status" };
  }
}

function checkFixedVersion(fixed: unknown): string | undefined {
  if (typeof fixed !== "string") {
    return `fixed_version is not a string (${typeof fixed})`;
  }
  try {
    parseVersion(fixed);
    return undefined;
  } catch (err) {
    if (err instanceof MalformedVersionError) return err.message;
    throw err;
  }
}
