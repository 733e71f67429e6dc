/**
 * Unit tests for the tracker document loader.
 *
 * Uses a small tracker dump fixture covering open, fixed, sentinel,
 * incomplete and structurally broken entries.
 *
 * Usage: npm run test
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import path from "node:path";
import { convert, load } from "../src/loader";
import { readTrackerDocument } from "../src/parsers/document";
import { isVersionAffected } from "../src/resolve";
import { readTrackerFile } from "../src/sources/tracker";
import { compareVersions } from "../src/versions/debian";
import { StructuralError } from "../src/errors";
import { RawCveEntry, RawTrackerDocument, SkippedEntry, VulnerabilityRecord } from "../src/types";
import * as lib from "../src";

const FIXTURES = path.join(process.cwd(), "tests/fixtures");

function sampleDoc(): RawTrackerDocument {
  return readTrackerFile(path.join(FIXTURES, "tracker/sample.json"));
}

function quiet(doc: RawTrackerDocument) {
  const skipped: SkippedEntry[] = [];
  const result = convert(doc, { onSkip: (entry) => skipped.push(entry) });
  return { ...result, logged: skipped };
}

function findRecord(records: VulnerabilityRecord[], pkg: string, cve: string): VulnerabilityRecord {
  const record = records.find((r) => r.package === pkg && r.id === cve);
  assert.ok(record, `missing ${pkg} ${cve}`);
  return record;
}

function rangeFor(record: VulnerabilityRecord, release: string) {
  const range = record.affected.find((r) => r.ecosystem === release);
  assert.ok(range, `missing ${release} range`);
  return range;
}

// Same content, keys inserted in reverse order at every level
function reversed(doc: RawTrackerDocument): RawTrackerDocument {
  const out: RawTrackerDocument = {};
  for (const pkg of Object.keys(doc).reverse()) {
    const cves = doc[pkg];
    if (cves === null) {
      out[pkg] = null;
      continue;
    }
    const entries: Record<string, RawCveEntry> = {};
    for (const cve of Object.keys(cves).reverse()) {
      const entry = cves[cve];
      const releases = entry.releases;
      entries[cve] = releases
        ? {
          ...entry,
          releases: Object.fromEntries(Object.entries(releases).reverse()),
        }
        : entry;
    }
    out[pkg] = entries;
  }
  return out;
}

describe("convert", () => {
  test("emits one record per package+CVE in byte order", () => {
    const { records } = quiet(sampleDoc());

    assert.deepStrictEqual(
      records.map((r) => `${r.package} ${r.id}`),
      [
        "apparmor CVE-2017-6507",
        "busybox CVE-2011-5325",
        "busybox CVE-2018-1000500",
        "examplepkg CVE-2099-0002",
      ],
    );
  });

  test("skips entries without releases and reports them", () => {
    const { skipped, logged } = quiet(sampleDoc());

    const expected = [{
      package: "examplepkg",
      cve: "CVE-2099-0001",
      reason: 'examplepkg > CVE-2099-0001: missing "releases" map',
    }];
    assert.deepStrictEqual(skipped, expected);
    assert.deepStrictEqual(logged, expected);
  });

  test("open release reports the shipped version as affected", () => {
    const { records } = quiet(sampleDoc());
    const range = rangeFor(findRecord(records, "busybox", "CVE-2018-1000500"), "bookworm");

    assert.strictEqual(range.state, "affected");
    assert.strictEqual(range.lower, "unbounded");
    assert.strictEqual(range.upper, "unbounded");
    assert.strictEqual(isVersionAffected(range, "1:1.35.0-4"), true);
    assert.deepStrictEqual(range.repositories, [
      { suite: "bookworm", version: "1:1.35.0-4", affected: true },
    ]);
  });

  test("resolved release reports the shipped version as fixed", () => {
    const { records } = quiet(sampleDoc());
    const record = findRecord(records, "apparmor", "CVE-2017-6507");
    const range = rangeFor(record, "bookworm");

    assert.strictEqual(range.state, "fixed");
    assert.strictEqual(range.upper, "2.11.0-3");
    assert.strictEqual(range.fixedVersion, "2.11.0-3");
    assert.strictEqual(compareVersions("3.0.8-3", "2.11.0-3"), 1);
    assert.strictEqual(isVersionAffected(range, "3.0.8-3"), false);
    assert.deepStrictEqual(range.repositories, [
      { suite: "bookworm", version: "3.0.8-3", affected: false },
    ]);
    assert.strictEqual(record.debianBug, 858768);
    assert.strictEqual(record.scope, "local");
  });

  test("sentinel and incomplete releases stay visible", () => {
    const { records } = quiet(sampleDoc());
    const record = findRecord(records, "busybox", "CVE-2011-5325");

    const bookworm = rangeFor(record, "bookworm");
    assert.strictEqual(bookworm.state, "unaffected");
    assert.strictEqual(bookworm.fixedVersion, "0");
    assert.strictEqual(bookworm.lowConfidence, false);

    const bullseye = rangeFor(record, "bullseye");
    assert.strictEqual(bullseye.state, "indeterminate");
    assert.strictEqual(bullseye.lowConfidence, true);
    assert.strictEqual(bullseye.lowConfidenceReason, "resolved-without-fixed-version");

    assert.strictEqual("debianBug" in record, false);
  });

  test("undetermined status is indeterminate with urgency carried through", () => {
    const { records } = quiet(sampleDoc());
    const range = rangeFor(findRecord(records, "examplepkg", "CVE-2099-0002"), "trixie");

    assert.strictEqual(range.state, "indeterminate");
    assert.strictEqual(range.status, "undetermined");
    assert.strictEqual(range.lowConfidenceReason, "unrecognized-status");
    assert.strictEqual(range.urgency, "not yet assigned");
  });

  test("unknown keys are dropped", () => {
    const { records } = quiet(sampleDoc());
    const range = rangeFor(findRecord(records, "busybox", "CVE-2018-1000500"), "bookworm");

    assert.strictEqual("nodsa" in range, false);
  });

  test("output does not depend on key order", () => {
    const doc = sampleDoc();
    const a = quiet(doc).records;
    const b = quiet(reversed(doc)).records;

    assert.strictEqual(JSON.stringify(a), JSON.stringify(b));
  });

  test("converting twice is byte-identical", () => {
    const doc = sampleDoc();
    assert.strictEqual(JSON.stringify(quiet(doc).records), JSON.stringify(quiet(doc).records));
  });

  test("records survive a JSON round trip, sentinels included", () => {
    const { records } = quiet(sampleDoc());
    const copy: unknown = JSON.parse(JSON.stringify(records));

    assert.deepStrictEqual(copy, records);
    const sentinel = rangeFor(findRecord(records, "busybox", "CVE-2011-5325"), "bookworm");
    assert.deepStrictEqual(JSON.parse(JSON.stringify(sentinel)).upper, "0");
    const open = rangeFor(findRecord(records, "busybox", "CVE-2018-1000500"), "bookworm");
    assert.deepStrictEqual(JSON.parse(JSON.stringify(open)).lower, "unbounded");
  });

  test("records are frozen", () => {
    const { records } = quiet(sampleDoc());
    assert.ok(Object.isFrozen(records[0]));
    assert.ok(Object.isFrozen(records[0].affected));
  });

  test("a malformed fixed version only degrades its own release", () => {
    const baseline = quiet(sampleDoc()).records;

    const doc = sampleDoc();
    const releases = doc.apparmor?.["CVE-2017-6507"].releases;
    assert.ok(releases);
    releases.bookworm = { ...releases.bookworm, fixed_version: "abc!@#" };

    const { records, skipped } = quiet(doc);
    const record = findRecord(records, "apparmor", "CVE-2017-6507");

    const bookworm = rangeFor(record, "bookworm");
    assert.strictEqual(bookworm.state, "indeterminate");
    assert.strictEqual(bookworm.lowConfidenceReason, "malformed-fixed-version");
    assert.strictEqual(bookworm.status, "resolved");
    assert.strictEqual(rangeFor(record, "bullseye").state, "fixed");
    assert.strictEqual(rangeFor(record, "sid").state, "fixed");

    assert.strictEqual(records.length, baseline.length);
    assert.strictEqual(skipped.length, 1);
    assert.strictEqual(
      JSON.stringify(records.filter((r) => r.package !== "apparmor")),
      JSON.stringify(baseline.filter((r) => r.package !== "apparmor")),
    );
  });

  test("ignored CVE ids and packages are left out and counted", () => {
    const { records, skipped, ignoredCount } = convert(sampleDoc(), {
      ignored: new Set(["CVE-2011-5325", "examplepkg"]),
      onSkip: () => assert.fail("nothing should be skipped"),
    });

    assert.deepStrictEqual(records.map((r) => r.id), ["CVE-2017-6507", "CVE-2018-1000500"]);
    assert.strictEqual(ignoredCount, 3);
    assert.strictEqual(skipped.length, 0);
  });

  test("accepts a typed document without the JSON boundary", () => {
    const { records } = quiet({
      openssl: {
        "CVE-2099-0100": {
          description: "Example",
          scope: "remote",
          releases: {
            bookworm: { status: "resolved", fixed_version: "3.0.11-1~deb12u2", repositories: {}, urgency: "medium" },
          },
        },
      },
    });

    assert.strictEqual(records.length, 1);
    assert.strictEqual(records[0].affected[0].upper, "3.0.11-1~deb12u2");
  });
});

describe("load", () => {
  test("is restartable", () => {
    const sequence = load(sampleDoc(), { onSkip: () => undefined });

    assert.strictEqual([...sequence].length, 4);
    assert.strictEqual([...sequence].length, 4);
  });

  test("stops when the consumer stops pulling", () => {
    const skipped: SkippedEntry[] = [];
    const sequence = load(sampleDoc(), { onSkip: (entry) => skipped.push(entry) });

    let first: VulnerabilityRecord | undefined;
    for (const record of sequence) {
      first = record;
      break;
    }

    assert.strictEqual(first?.id, "CVE-2017-6507");
    // examplepkg comes last, so its broken entry was never reached
    assert.strictEqual(skipped.length, 0);
  });
});

describe("library entrypoint", () => {
  test("exposes the conversion pipeline", () => {
    assert.strictEqual(lib.convert, convert);
    assert.strictEqual(lib.load, load);
    assert.strictEqual(lib.UNBOUNDED, "unbounded");
    assert.strictEqual(lib.NEVER_AFFECTED, "0");
  });
});

describe("readTrackerDocument", () => {
  test("rejects a non-object document", () => {
    assert.throws(() => readTrackerDocument([]), StructuralError);
    assert.throws(() => readTrackerDocument(null), /JSON object keyed by package name/);
  });

  test("a package whose value is not an object is skipped, the rest converts", () => {
    const doc = readTrackerDocument({
      bad: 5,
      busybox: { "CVE-2099-0101": { releases: { bookworm: { status: "open" } } } },
    });
    const { records, skipped } = quiet(doc);

    assert.deepStrictEqual(records.map((r) => `${r.package} ${r.id}`), ["busybox CVE-2099-0101"]);
    assert.deepStrictEqual(skipped, [{
      package: "bad",
      cve: "",
      reason: "bad: package entry must be an object keyed by CVE id",
    }]);
  });

  test("an ignored package whose value is not an object is not reported", () => {
    const doc = readTrackerDocument({ bad: [] });
    const { records, skipped } = convert(doc, {
      ignored: new Set(["bad"]),
      onSkip: () => assert.fail("nothing should be skipped"),
    });

    assert.strictEqual(records.length, 0);
    assert.strictEqual(skipped.length, 0);
  });

  test("keeps packages and releases named __proto__", () => {
    const doc = readTrackerDocument(JSON.parse(
      '{"__proto__": {"CVE-2099-0600": {"releases": {"bookworm": {"status": "open"}}}},' +
      ' "busybox": {"CVE-2099-0601": {"releases": {' +
      '"__proto__": {"status": "open"}, "bookworm": {"status": "open", "repositories": {"__proto__": "1.0-1"}}}}}}',
    ));
    const { records, skipped } = quiet(doc);

    assert.deepStrictEqual(Object.keys(doc), ["__proto__", "busybox"]);
    assert.deepStrictEqual(records.map((r) => `${r.package} ${r.id}`), [
      "__proto__ CVE-2099-0600",
      "busybox CVE-2099-0601",
    ]);
    assert.deepStrictEqual(records[1].affected.map((r) => r.ecosystem), ["__proto__", "bookworm"]);
    assert.deepStrictEqual(rangeFor(records[1], "bookworm").repositories, [
      { suite: "__proto__", version: "1.0-1", affected: true },
    ]);
    assert.strictEqual(skipped.length, 0);
  });

  test("a CVE entry that is not an object is skipped later, not fatal", () => {
    const doc = readTrackerDocument({
      busybox: {
        "CVE-2099-0200": "oops",
        "CVE-2099-0201": { releases: { bookworm: { status: "open" } } },
      },
    });
    const { records, skipped } = quiet(doc);

    assert.deepStrictEqual(records.map((r) => r.id), ["CVE-2099-0201"]);
    assert.deepStrictEqual(skipped.map((s) => s.cve), ["CVE-2099-0200"]);
  });

  test("a release that is not an object reads as missing status", () => {
    const doc = readTrackerDocument({
      busybox: { "CVE-2099-0300": { releases: { bookworm: 42 } } },
    });
    const { records } = quiet(doc);

    assert.strictEqual(records[0].affected[0].lowConfidenceReason, "missing-status");
  });

  test("a non-string fixed version reads as malformed", () => {
    const doc = readTrackerDocument({
      busybox: { "CVE-2099-0400": { releases: { bookworm: { status: "resolved", fixed_version: 12 } } } },
    });
    const { records } = quiet(doc);

    assert.strictEqual(records[0].affected[0].lowConfidenceReason, "malformed-fixed-version");
  });
});
