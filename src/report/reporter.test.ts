/**
 * Run reporter tests.
 *
 * Run: node --import tsx src/report/reporter.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { emptyCounters, RunReporter, type RunReporterOptions } from "./reporter.js";
import { createSilentLogger } from "../logging/index.js";

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
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

const root = mkdtempSync(join(tmpdir(), "reporter-"));
let counter = 0;

const T0 = "2024-03-01T00:00:00.000Z";

function freshReporter(withTrail: boolean): { reporter: RunReporter; options: RunReporterOptions } {
  counter++;
  const options: RunReporterOptions = {
    runId: "run-1",
    mode: "daily",
    logger: createSilentLogger(),
    trailPath: withTrail ? join(root, `trail_${counter}.ndjson`) : null,
    reportPath: join(root, `report_${counter}.json`),
    now: () => new Date(T0),
  };
  return { reporter: new RunReporter(options), options };
}

section("BatchTally");

test("decisions update the matching counter", () => {
  const { reporter } = freshReporter(false);
  const tally = reporter.beginBatch("recent-1d");
  tally.decide({ raw_id: "1", decision: "kept", accession: "PRJNA1", method: "embedded" });
  tally.decide({ raw_id: "2", decision: "duplicate-in-batch", reason: "dup" });
  tally.decide({ raw_id: "3", decision: "fetch_error", reason: "HTTP 404" });

  assert.equal(tally.counters.new, 1);
  assert.deepEqual(tally.counters.dropped, {
    unresolved: 0,
    "duplicate-persisted": 0,
    "duplicate-in-batch": 1,
    fetch_error: 1,
  });
  assert.equal(tally.decisions.length, 3);
});

section("RunReporter");

test("finished batches append their decisions to the trail", () => {
  const { reporter, options } = freshReporter(true);
  const first = reporter.beginBatch("a");
  first.decide({ raw_id: "1", decision: "kept", accession: "PRJNA1", method: "linked" });
  const report = reporter.finishBatch(first);
  const second = reporter.beginBatch("b");
  second.decide({ raw_id: "2", decision: "unresolved", reason: "no accession" });
  reporter.finishBatch(second);

  assert.equal(report.decision_trail, options.trailPath);
  assert.equal(report.run_id, "run-1");
  assert.equal(
    readFileSync(options.trailPath ?? "", "utf-8"),
    '{"raw_id":"1","decision":"kept","accession":"PRJNA1","method":"linked"}\n' +
      '{"raw_id":"2","decision":"unresolved","reason":"no accession"}\n'
  );
});

test("without a trail path nothing is written per batch", () => {
  const { reporter, options } = freshReporter(false);
  const report = reporter.finishBatch(reporter.beginBatch("a"));
  assert.equal("decision_trail" in report, false);
  assert.equal(existsSync(options.reportPath), false);
});

test("totals add every batch", () => {
  const { reporter } = freshReporter(false);
  for (const tag of ["a", "b"]) {
    const tally = reporter.beginBatch(tag);
    tally.counters.input = 3;
    tally.counters.skipped = 1;
    tally.counters.resolved = 2;
    tally.counters.emitted = 1;
    tally.decide({ raw_id: `${tag}1`, decision: "kept" });
    tally.decide({ raw_id: `${tag}2`, decision: "duplicate-persisted" });
    reporter.finishBatch(tally);
  }
  const expected = emptyCounters();
  expected.input = 6;
  expected.skipped = 2;
  expected.resolved = 4;
  expected.new = 2;
  expected.emitted = 2;
  expected.dropped["duplicate-persisted"] = 2;
  assert.deepEqual(reporter.totals(), expected);
});

test("the summary is written for successful runs", () => {
  const { reporter, options } = freshReporter(false);
  reporter.finishBatch(reporter.beginBatch("a"));
  const summary = reporter.writeSummary();

  assert.equal(summary.status, "ok");
  assert.equal("error" in summary, false);
  assert.deepEqual(JSON.parse(readFileSync(options.reportPath, "utf-8")), {
    run_id: "run-1",
    mode: "daily",
    status: "ok",
    started_utc: T0,
    finished_utc: T0,
    totals: emptyCounters(),
    batches: [{ tag: "a", generated_utc: T0, run_id: "run-1", counters: emptyCounters() }],
  });
});

test("a failed run records the error message", () => {
  const { reporter } = freshReporter(false);
  const summary = reporter.writeSummary(new Error("disk full"));
  assert.equal(summary.status, "failed");
  assert.equal(summary.error, "disk full");
  assert.deepEqual(summary.batches, []);
});

rmSync(root, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
