/**
 * Parsers for tracker input.
 *
 * - document: shape checks for the package -> CVE -> release dump
 * - release: per-release status classification
 */

export { readTrackerDocument, readCveEntry, isRecord } from "./document";
export type { TrackerEntry } from "./document";
export { parseReleaseStatus } from "./release";
export { readJsonFile, readTextFile } from "./utils";
