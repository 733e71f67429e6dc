/**
 * Common file helpers for the parsers.
 */

import fs from "node:fs";

/**
 * Read and parse a JSON file. The result is untyped until checked.
 */
export function readJsonFile(filePath: string): unknown {
  const content = fs.readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON in ${filePath}: ${message}`);
  }
}

/**
 * Read a text file.
 */
export function readTextFile(filePath: string): string {
  return fs.readFileSync(filePath, "utf-8");
}
