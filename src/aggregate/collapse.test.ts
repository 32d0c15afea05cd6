/**
 * Collapsing aggregator tests.
 *
 * Run: node --import tsx src/aggregate/collapse.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { collapseBatch, type BatchCandidate } from "./collapse.js";
import { DedupLedger } from "../storage/ledger.js";
import { makeRawRecord } from "../testing/fixtures.js";
import type { TerminalResolution } from "../types/index.js";

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

const root = mkdtempSync(join(tmpdir(), "collapse-"));
let counter = 0;

function freshLedger(persistedProjects: string[] = []): DedupLedger {
  counter++;
  const paths = {
    rawIds: join(root, `raw_${counter}.txt`),
    projectIds: join(root, `projects_${counter}.txt`),
  };
  if (persistedProjects.length > 0) {
    writeFileSync(paths.projectIds, persistedProjects.map((id) => `${id}\n`).join(""));
  }
  return new DedupLedger(paths).load();
}

function resolved(projectId: string): TerminalResolution {
  return { status: "resolved", projectId, method: "embedded", cacheHit: false };
}

function candidate(id: string, resolution: TerminalResolution): BatchCandidate {
  return { record: makeRawRecord(id), resolution };
}

section("collapseBatch");

test("first record of a project is kept, later ones dropped", () => {
  const ledger = freshLedger();
  const result = collapseBatch(
    [
      candidate("1", resolved("PRJNA1")),
      candidate("2", resolved("PRJNA2")),
      candidate("3", resolved("PRJNA1")),
    ],
    ledger
  );

  assert.deepEqual(
    result.kept.map((k) => [k.record.id, k.projectId]),
    [
      ["1", "PRJNA1"],
      ["2", "PRJNA2"],
    ]
  );
  assert.deepEqual(result.decisions[2], {
    decision: "duplicate-in-batch",
    rawId: "3",
    projectId: "PRJNA1",
    reason: "project already kept earlier in this batch",
  });
});

test("projects already in the corpus are dropped as persisted duplicates", () => {
  const ledger = freshLedger(["PRJNA9"]);
  const result = collapseBatch([candidate("10", resolved("PRJNA9"))], ledger);
  assert.equal(result.kept.length, 0);
  assert.deepEqual(result.decisions, [
    {
      decision: "duplicate-persisted",
      rawId: "10",
      projectId: "PRJNA9",
      reason: "project already in corpus",
    },
  ]);
});

test("unresolved records carry their reason", () => {
  const ledger = freshLedger();
  const result = collapseBatch(
    [
      candidate("20", {
        status: "unresolved",
        method: "none",
        cacheHit: false,
        reason: "no project accession found",
      }),
    ],
    ledger
  );
  assert.deepEqual(result.decisions, [
    { decision: "unresolved", rawId: "20", reason: "no project accession found" },
  ]);
  assert.equal(ledger.projectIds.size, 0);
});

test("kept decisions report the resolution method", () => {
  const ledger = freshLedger();
  const result = collapseBatch(
    [candidate("30", { status: "resolved", projectId: "PRJEB5", method: "linked", cacheHit: true })],
    ledger
  );
  assert.deepEqual(result.decisions, [
    { decision: "kept", rawId: "30", projectId: "PRJEB5", method: "linked" },
  ]);
  assert.equal(result.kept[0]?.cacheHit, true);
});

test("every raw id and kept project is marked, nothing written yet", () => {
  const ledger = freshLedger();
  collapseBatch(
    [
      candidate("40", resolved("PRJNA40")),
      candidate("41", resolved("PRJNA40")),
      candidate("42", { status: "unresolved", method: "none", cacheHit: false, reason: "x" }),
    ],
    ledger
  );
  assert.deepEqual(["40", "41", "42"].map((id) => ledger.rawIds.has(id)), [true, true, true]);
  assert.equal(ledger.projectIds.has("PRJNA40"), true);
  assert.equal(ledger.projectIds.pendingCount, 1);
  assert.equal(ledger.rawIds.pendingCount, 3);
  assert.equal(existsSync(join(root, `raw_${counter}.txt`)), false);

  ledger.flush();
  assert.equal(readFileSync(join(root, `raw_${counter}.txt`), "utf-8"), "40\n41\n42\n");
});

rmSync(root, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
