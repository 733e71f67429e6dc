/**
 * Persistence sinks for converted records.
 *
 * Records arrive one at a time; a sink decides how they land on disk.
 * JSON is written with two-space indentation and a trailing newline.
 */

import fs from "node:fs";
import path from "node:path";

export interface RecordSink<T> {
  write(id: string, group: string, value: T): void;
  /** Flush anything buffered. Returns the number of records written. */
  close(): number;
}

/**
 * Collect every record into one JSON array file.
 */
export class JsonFileSink<T> implements RecordSink<T> {
  private readonly values: T[] = [];

  constructor(private readonly filePath: string) {}

  write(_id: string, _group: string, value: T): void {
    this.values.push(value);
  }

  close(): number {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(this.values, null, 2) + "\n");
    return this.values.length;
  }
}

/**
 * Write each record to <dir>/<group>/<id>.json as it arrives.
 */
export class JsonDirectorySink<T> implements RecordSink<T> {
  private count = 0;

  constructor(private readonly dir: string) {}

  write(id: string, group: string, value: T): void {
    const groupDir = path.join(this.dir, safeFileName(group));
    fs.mkdirSync(groupDir, { recursive: true });
    fs.writeFileSync(
      path.join(groupDir, `${safeFileName(id)}.json`),
      JSON.stringify(value, null, 2) + "\n",
    );
    this.count++;
  }

  close(): number {
    return this.count;
  }
}

// Package names and ids are plain ASCII in practice; anything else is replaced
export function safeFileName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9._+-]/g, "_");
  return cleaned === "." || cleaned === ".." || cleaned === "" ? `_${cleaned}` : cleaned;
}
