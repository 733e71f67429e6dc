/**
 * Support for .trackerignore files to leave specific entries out of the output.
 *
 * Format: One CVE id or source package name per line.
 *
 * Lines starting with # are considered comments and will be ignored.
 * Blank lines or any text following # on the same line will be ignored.
 *
 * Example .trackerignore:
 *   CVE-2021-23337
 *   # Kernel entries are converted separately
 *   linux
 *   TEMP-0000000-1B2C3D # Placeholder id, no CVE yet
 */

import fs from "node:fs";
import path from "node:path";
import { readTextFile } from "./parsers/utils";

export const IGNORE_FILENAME = ".trackerignore";

/**
 * Load ignored ids from a .trackerignore file.
 * Priority: explicit path (--ignore-file) > input file dir > cwd
 */
export function loadIgnoreList(inputPath?: string, explicitPath?: string): Set<string> {
  if (explicitPath) {
    if (!fs.existsSync(explicitPath)) {
      throw new Error(`Ignore file not found: ${explicitPath}`);
    }
    return parseIgnoreFile(explicitPath);
  }

  const candidates = [
    ...(inputPath ? [path.join(path.dirname(inputPath), IGNORE_FILENAME)] : []),
    path.join(process.cwd(), IGNORE_FILENAME),
  ];

  const ignorePath = candidates.find((candidate) => fs.existsSync(candidate));
  if (!ignorePath) {
    return new Set<string>();
  }

  return parseIgnoreFile(ignorePath);
}

export function parseIgnoreList(content: string): Set<string> {
  const ignored = new Set<string>();

  for (const line of content.split("\n")) {
    const withoutComment = line.split("#")[0].trim();

    if (!withoutComment) continue;

    ignored.add(withoutComment);
  }

  return ignored;
}

function parseIgnoreFile(ignorePath: string): Set<string> {
  const ignored = parseIgnoreList(readTextFile(ignorePath));

  if (ignored.size > 0) {
    console.log(`📋 Loaded ${ignored.size} ignored id(s) from ${path.basename(ignorePath)}`);
  }

  return ignored;
}
