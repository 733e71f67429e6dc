/**
 * Sources for the Debian security tracker JSON dump.
 *
 * The dump is a single JSON object (package -> CVE -> release), around
 * 60 MB uncompressed. It can be read from disk or fetched over HTTP.
 *
 * Ref: https://security-tracker.debian.org/tracker/data/json
 */

import fetch from "node-fetch";
import { readTrackerDocument } from "../parsers/document";
import { readJsonFile } from "../parsers/utils";
import { RawTrackerDocument } from "../types";

export const DEFAULT_TRACKER_URL = "https://security-tracker.debian.org/tracker/data/json";

interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchFn = (url: string) => Promise<FetchResponse>;

/**
 * Fetch the tracker dump and check its outer shape.
 */
export async function fetchTrackerDocument(
  url: string = DEFAULT_TRACKER_URL,
  fetchFn: FetchFn = fetch,
): Promise<RawTrackerDocument> {
  const response = await fetchFn(url);

  if (!response.ok) {
    throw new Error(`Tracker fetch failed: ${response.status} ${response.statusText}`);
  }

  return readTrackerDocument(await response.json());
}

/**
 * Read a previously downloaded tracker dump from disk.
 */
export function readTrackerFile(filePath: string): RawTrackerDocument {
  return readTrackerDocument(readJsonFile(filePath));
}
