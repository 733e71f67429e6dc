/**
 * Export canonical records in the OSV schema.
 *
 * Each release becomes one `affected` entry in the "Debian:<version>"
 * ecosystem with a single ECOSYSTEM range. Unaffected releases (fixed
 * version "0") have no OSV form and are left out. Low-confidence ranges are
 * left out unless asked for, and are marked in database_specific when kept.
 *
 * Refs:
 * - https://ossf.github.io/osv-schema/
 * - https://ossf.github.io/osv-schema/#affectedranges-field
 */

import releaseVersions from "../data/debian-releases.json";
import { AffectedRange, NEVER_AFFECTED, VulnerabilityRecord } from "./types";
import { compareVersions } from "./versions/debian";

export const OSV_SCHEMA_VERSION = "1.6.0";
export const OSV_ID_PREFIX = "DEBIAN-";

const RELEASE_VERSIONS: Record<string, string> = releaseVersions;

export interface OsvEvent {
  introduced?: string;
  fixed?: string;
}

export interface OsvAffected {
  package: { ecosystem: string; name: string; purl: string };
  ranges: Array<{ type: "ECOSYSTEM"; events: OsvEvent[] }>;
  ecosystem_specific: { urgency: string; note?: string };
  database_specific?: { low_confidence: true; reason?: string; status: string };
}

export interface OsvVulnerability {
  schema_version: string;
  id: string;
  modified?: string;
  aliases: string[];
  details: string;
  affected: OsvAffected[];
  references: Array<{ type: string; url: string }>;
  database_specific?: { scope: string };
}

export interface OsvOptions {
  /** ISO timestamp for `modified`; omitted when not given. */
  modified?: string;
  includeLowConfidence?: boolean;
}

/**
 * Map a release codename to its OSV ecosystem, eg. "bookworm" -> "Debian:12".
 */
export function toOsvEcosystem(release: string): string {
  return `Debian:${RELEASE_VERSIONS[release] ?? release}`;
}

function eventValue(event: OsvEvent): string {
  return event.introduced ?? event.fixed ?? "";
}

/**
 * Sort events by version, with the magic "0" always first.
 */
export function sortEvents(events: readonly OsvEvent[]): OsvEvent[] {
  const zero = events.filter((e) => eventValue(e) === NEVER_AFFECTED);
  const rest = events
    .filter((e) => eventValue(e) !== NEVER_AFFECTED)
    .sort((a, b) => compareVersions(eventValue(a), eventValue(b)));
  return [...zero, ...rest];
}

function toAffected(name: string, range: AffectedRange): OsvAffected {
  const events: OsvEvent[] = [{ introduced: NEVER_AFFECTED }];
  if (range.state === "fixed" && range.fixedVersion) {
    events.push({ fixed: range.fixedVersion });
  }

  const affected: OsvAffected = {
    package: {
      ecosystem: toOsvEcosystem(range.ecosystem),
      name,
      purl: `pkg:deb/debian/${encodeURIComponent(name)}?arch=source`,
    },
    ranges: [{ type: "ECOSYSTEM", events: sortEvents(events) }],
    ecosystem_specific: { urgency: range.urgency, ...(range.note ? { note: range.note } : {}) },
  };

  if (range.lowConfidence) {
    affected.database_specific = {
      low_confidence: true,
      reason: range.lowConfidenceReason,
      status: range.status,
    };
  }

  return affected;
}

export function toOsv(record: VulnerabilityRecord, options: OsvOptions = {}): OsvVulnerability {
  const affected = record.affected
    .filter((range) => range.state !== "unaffected")
    .filter((range) => options.includeLowConfidence || !range.lowConfidence)
    .map((range) => toAffected(record.package, range));

  const references = [
    { type: "ADVISORY", url: `https://security-tracker.debian.org/tracker/${record.id}` },
  ];
  if (record.debianBug !== undefined) {
    references.push({ type: "REPORT", url: `https://bugs.debian.org/${record.debianBug}` });
  }

  return {
    schema_version: OSV_SCHEMA_VERSION,
    id: `${OSV_ID_PREFIX}${record.id}`,
    ...(options.modified ? { modified: options.modified } : {}),
    aliases: [record.id],
    details: record.description,
    affected,
    references,
    ...(record.scope ? { database_specific: { scope: record.scope } } : {}),
  };
}
