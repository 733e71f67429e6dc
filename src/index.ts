/**
 * Library entrypoint: Debian tracker normalization.
 */

export * from "./types";
export { MalformedVersionError, StructuralError } from "./errors";
export { compareVersions, isValidVersion, parseVersion, sortVersions } from "./versions/debian";
export type { DebianVersion, Ordering } from "./versions/debian";
export { parseReleaseStatus, readTrackerDocument } from "./parsers";
export { isVersionAffected, resolveRange } from "./resolve";
export { reconcile, withoutLowConfidence } from "./reconcile";
export { convert, convertEntry, load } from "./loader";
export type { ConversionResult, LoadOptions } from "./loader";
export { toOsv, toOsvEcosystem } from "./osv";
export type { OsvVulnerability, OsvOptions } from "./osv";
export { fetchTrackerDocument, readTrackerFile } from "./sources/tracker";
export { JsonDirectorySink, JsonFileSink } from "./sinks";
export type { RecordSink } from "./sinks";
