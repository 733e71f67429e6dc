/**
 * Error types raised while normalizing tracker data.
 *
 * MalformedVersionError is field-level: callers degrade the release that
 * carried the bad version. StructuralError is entry-level: the loader skips
 * the offending CVE entry and keeps going.
 */

export class MalformedVersionError extends Error {
  readonly version: string;

  constructor(version: string, reason: string) {
    super(`Malformed version "${version}": ${reason}`);
    this.name = "MalformedVersionError";
    this.version = version;
  }
}

export class StructuralError extends Error {
  readonly path: string[];

  constructor(path: string[], message: string) {
    super(path.length ? `${path.join(" > ")}: ${message}` : message);
    this.name = "StructuralError";
    this.path = path;
  }
}
