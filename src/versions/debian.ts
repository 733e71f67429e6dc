/**
 * Debian package version ordering, as implemented by dpkg.
 *
 * Format: [epoch:]upstream[-revision]
 * - epoch: unsigned integer, defaults to 0
 * - revision: everything after the last hyphen, defaults to ""
 *
 * Upstream and revision are compared with the same fragment algorithm:
 * alternating non-digit and digit runs. In non-digit runs "~" sorts before
 * everything (even the end of the string), letters sort before other
 * characters. Digit runs compare numerically with no size limit.
 *
 * Ref: https://www.debian.org/doc/debian-policy/ch-controlfields.html#version
 */

import { MalformedVersionError } from "../errors";

export type Ordering = -1 | 0 | 1;

export interface DebianVersion {
  epoch: string;
  upstream: string;
  revision: string;
}

const ALLOWED_CHARS = /^[A-Za-z0-9.+~:-]+$/;

/**
 * Split a version string into its epoch, upstream and revision parts.
 * Throws MalformedVersionError for empty strings or disallowed characters.
 */
export function parseVersion(version: string): DebianVersion {
  if (version.length === 0) {
    throw new MalformedVersionError(version, "empty version");
  }
  if (!ALLOWED_CHARS.test(version)) {
    throw new MalformedVersionError(version, "characters outside [A-Za-z0-9.+~:-]");
  }

  let epoch = "0";
  let rest = version;
  const colon = version.indexOf(":");
  if (colon > 0 && /^\d+$/.test(version.slice(0, colon))) {
    epoch = version.slice(0, colon);
    rest = version.slice(colon + 1);
  }

  const hyphen = rest.lastIndexOf("-");
  if (hyphen === -1) {
    return { epoch, upstream: rest, revision: "" };
  }
  return { epoch, upstream: rest.slice(0, hyphen), revision: rest.slice(hyphen + 1) };
}

export function isValidVersion(version: string): boolean {
  try {
    parseVersion(version);
    return true;
  } catch {
    return false;
  }
}

/**
 * Total order over Debian versions: -1 if a < b, 0 if equal, 1 if a > b.
 */
export function compareVersions(a: string, b: string): Ordering {
  const va = parseVersion(a);
  const vb = parseVersion(b);

  return (
    compareNumeric(va.epoch, vb.epoch) ||
    compareFragment(va.upstream, vb.upstream) ||
    compareFragment(va.revision, vb.revision)
  );
}

/**
 * Ascending copy of the given versions.
 */
export function sortVersions(versions: readonly string[]): string[] {
  return [...versions].sort(compareVersions);
}

function isDigit(code: number): boolean {
  return code >= 48 && code <= 57;
}

function isLetter(code: number): boolean {
  return (code >= 65 && code <= 90) || (code >= 97 && code <= 122);
}

// Weight of one character in a non-digit run; end of run weighs 0.
function charWeight(s: string, i: number): number {
  if (i >= s.length) return 0;
  const code = s.charCodeAt(i);
  if (code === 126) return -1; // "~"
  if (isLetter(code)) return code;
  return code + 256;
}

function sign(n: number): Ordering {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

function compareLexical(a: string, b: string): Ordering {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = charWeight(a, i) - charWeight(b, i);
    if (diff !== 0) return sign(diff);
  }
  return 0;
}

function compareNumeric(a: string, b: string): Ordering {
  const x = a.replace(/^0+/, "");
  const y = b.replace(/^0+/, "");
  if (x.length !== y.length) return sign(x.length - y.length);
  return x < y ? -1 : x > y ? 1 : 0;
}

function compareFragment(a: string, b: string): Ordering {
  let i = 0;
  let j = 0;

  while (i < a.length || j < b.length) {
    const textStartA = i;
    const textStartB = j;
    while (i < a.length && !isDigit(a.charCodeAt(i))) i++;
    while (j < b.length && !isDigit(b.charCodeAt(j))) j++;

    const lexical = compareLexical(a.slice(textStartA, i), b.slice(textStartB, j));
    if (lexical !== 0) return lexical;

    const numStartA = i;
    const numStartB = j;
    while (i < a.length && isDigit(a.charCodeAt(i))) i++;
    while (j < b.length && isDigit(b.charCodeAt(j))) j++;

    const numeric = compareNumeric(a.slice(numStartA, i), b.slice(numStartB, j));
    if (numeric !== 0) return numeric;
  }

  return 0;
}
