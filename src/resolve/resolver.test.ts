/**
 * Entity resolver tests.
 *
 * Run: node --import tsx src/resolve/resolver.test.ts
 */

import { strict as assert } from "node:assert";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { EntityResolver, LinkCacheEntrySchema, type LinkCacheEntry } from "./resolver.js";
import { findAccession, normalizeAccession } from "./accession.js";
import { createSilentLogger } from "../logging/index.js";
import { CacheStore } from "../storage/cache-store.js";
import { FakeSource, makeRawRecord } from "../testing/fixtures.js";

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

// Caches are never flushed here; the paths only need to not exist.
const root = join(tmpdir(), `resolver-${process.pid}-${Date.now()}`);
const logger = createSilentLogger();

interface Harness {
  source: FakeSource;
  resolver: EntityResolver;
  links: CacheStore<LinkCacheEntry>;
}

function setup(): Harness {
  const source = new FakeSource();
  const links = new CacheStore({
    namespace: "links",
    path: join(root, "links.json"),
    schema: LinkCacheEntrySchema,
    logger,
  }).load();
  return { source, links, resolver: new EntityResolver({ source, links, logger }) };
}

section("Accession normalization");

await test("normalize uppercases, trims and validates", () => {
  assert.equal(normalizeAccession("  prjna42 "), "PRJNA42");
  assert.equal(normalizeAccession("PRJNA"), null);
  assert.equal(normalizeAccession("PRJXX12"), null);
  assert.equal(normalizeAccession("xPRJNA12"), null);
});

await test("search is word-bounded", () => {
  assert.equal(findAccession("see PRJEB7, soil"), "PRJEB7");
  assert.equal(findAccession("ABCPRJNA12"), null);
  assert.equal(findAccession(""), null);
});

section("Tier 1: embedded");

await test("accession in a structured field skips tiers 2 and 3", async () => {
  const h = setup();
  const result = await h.resolver.resolve(
    makeRawRecord("1", { fields: { BioProject: "PRJNA100", LibraryStrategy: "WGS" } })
  );
  assert.deepEqual(result, { status: "resolved", projectId: "PRJNA100", method: "embedded", cacheHit: false });
  assert.equal(h.source.count("fetchLinked"), 0);
  assert.equal(h.source.count("fetchFullText"), 0);
  assert.equal(h.source.totalCalls, 0);
});

await test("title is scanned after the fields", async () => {
  const h = setup();
  const result = await h.resolver.resolve(makeRawRecord("2", { title: "Harbour study prjeb7" }));
  assert.equal(result.status === "resolved" ? result.projectId : "", "PRJEB7");
  assert.equal(h.source.totalCalls, 0);
});

await test("embedded reference wins over fields", async () => {
  const h = setup();
  const result = await h.resolver.resolve(
    makeRawRecord("3", { embeddedAccession: "PRJDB9", fields: { BioProject: "PRJNA100" } })
  );
  assert.equal(result.status === "resolved" ? result.projectId : "", "PRJDB9");
});

section("Tier 2: linked");

await test("linked summary resolves and is cached by secondary id", async () => {
  const h = setup();
  h.source.linked.set("10", ["900"]);
  h.source.linked.set("11", ["900"]);
  h.source.summaries.set("900", "Umbrella project PRJNA555 registered 2023");

  const first = await h.resolver.resolve(makeRawRecord("10", { fields: { BioProject: "PRJNA" } }));
  assert.deepEqual(first, { status: "resolved", projectId: "PRJNA555", method: "linked", cacheHit: false });
  assert.deepEqual(h.links.lookup("900"), { kind: "hit", value: { accession: "PRJNA555" } });

  const second = await h.resolver.resolve(makeRawRecord("11"));
  assert.deepEqual(second, { status: "resolved", projectId: "PRJNA555", method: "linked", cacheHit: true });
  assert.equal(h.source.count("fetchSummaryText"), 1);
  assert.equal(h.source.count("fetchFullText"), 0);
});

await test("a summary without an accession is tombstoned", async () => {
  const h = setup();
  h.source.linked.set("12", ["901"]);
  h.source.summaries.set("901", "no identifiers here");
  await h.resolver.resolve(makeRawRecord("12"));
  assert.deepEqual(h.links.lookup("901"), { kind: "tombstone" });

  await h.resolver.resolve(makeRawRecord("13", { title: "other" }));
  h.source.linked.set("14", ["901"]);
  await h.resolver.resolve(makeRawRecord("14"));
  assert.equal(h.source.count("fetchSummaryText"), 1);
});

section("Tier 3: full text");

await test("full document is scanned when tier 2 finds nothing", async () => {
  const h = setup();
  h.source.linked.set("20", ["902"]);
  h.source.summaries.set("902", "nothing");
  h.source.fullTexts.set("20", "<EXPERIMENT_PACKAGE>... PRJDB3 ...</EXPERIMENT_PACKAGE>");
  const result = await h.resolver.resolve(makeRawRecord("20"));
  assert.deepEqual(result, { status: "resolved", projectId: "PRJDB3", method: "fulltext", cacheHit: false });
});

await test("a failing link lookup falls through to tier 3", async () => {
  const h = setup();
  h.source.failing.add("link:21");
  h.source.fullTexts.set("21", "PRJNA77");
  const result = await h.resolver.resolve(makeRawRecord("21"));
  assert.equal(result.method, "fulltext");
});

section("Unresolved and failed outcomes");

await test("nothing found is a value with a reason, not an error", async () => {
  const h = setup();
  const result = await h.resolver.resolve(makeRawRecord("30"));
  assert.deepEqual(result, {
    status: "unresolved",
    method: "none",
    cacheHit: false,
    reason: "no accession in fields or title; linked: no linked ids; fulltext: no accession in document",
  });
});

await test("failures in every tier end failed, not unresolved", async () => {
  const h = setup();
  h.source.failing.add("link:31");
  h.source.failing.add("full:31");
  const result = await h.resolver.resolve(makeRawRecord("31"));
  assert.deepEqual(result, {
    status: "failed",
    method: "none",
    cacheHit: false,
    reason: "no accession in fields or title; linked: link lookup failed; fulltext: detail fetch failed",
  });
});

await test("a failed full-text fetch alone is enough to fail", async () => {
  const h = setup();
  h.source.failing.add("full:32");
  const result = await h.resolver.resolve(makeRawRecord("32"));
  assert.equal(result.status, "failed");
});

await test("a failed summary lookup with nothing found elsewhere fails", async () => {
  const h = setup();
  h.source.linked.set("33", ["904"]);
  h.source.failing.add("904");
  const result = await h.resolver.resolve(makeRawRecord("33"));
  assert.deepEqual(result, {
    status: "failed",
    method: "none",
    cacheHit: false,
    reason: "no accession in fields or title; linked: 1 of 1 summary lookup(s) failed; fulltext: no accession in document",
  });
  assert.equal(h.links.lookup("904").kind, "miss");
});

await test("a resolved record resolves again through its tiers", async () => {
  const h = setup();
  h.source.linked.set("40", ["903"]);
  h.source.summaries.set("903", "PRJNA40");
  await h.resolver.resolve(makeRawRecord("40"));
  const again = await h.resolver.resolve(makeRawRecord("40"));
  assert.deepEqual(again, { status: "resolved", projectId: "PRJNA40", method: "linked", cacheHit: true });
  assert.equal(h.source.count("fetchLinked"), 2);
  assert.equal(h.source.count("fetchSummaryText"), 1);
});

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
