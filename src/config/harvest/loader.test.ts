/**
 * Harvest Config Loader Tests
 *
 * Run with: node --import tsx src/config/harvest/loader.test.ts
 *
 * These tests verify:
 *   1. The defaults validate and come back frozen
 *   2. Invalid configurations fail with structured issues
 *   3. Overrides merge field by field onto a base
 */

import { strict as assert } from "node:assert";

import {
  HarvestConfigError,
  loadHarvestConfig,
  resolveHarvestConfig,
} from "./loader.js";
import { DEFAULT_HARVEST_CONFIG } from "./defaults.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HARNESS
// ═══════════════════════════════════════════════════════════════════════════

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

function expectConfigError(input: unknown): HarvestConfigError {
  try {
    loadHarvestConfig(input);
  } catch (err) {
    if (err instanceof HarvestConfigError) return err;
    throw err;
  }
  throw new Error("expected HarvestConfigError");
}

// ═══════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════

section("loadHarvestConfig");

test("defaults are valid", () => {
  const config = loadHarvestConfig(DEFAULT_HARVEST_CONFIG);
  assert.deepEqual(config, DEFAULT_HARVEST_CONFIG);
});

test("loaded configuration is deeply frozen", () => {
  const config = loadHarvestConfig(DEFAULT_HARVEST_CONFIG);
  assert.equal(Object.isFrozen(config), true);
  assert.equal(Object.isFrozen(config.retry), true);
  assert.equal(Object.isFrozen(config.flags), true);
});

test("input object is not frozen in place", () => {
  const input = structuredClone(DEFAULT_HARVEST_CONFIG);
  loadHarvestConfig(input);
  assert.equal(Object.isFrozen(input), false);
});

test("invalid fields are reported by path", () => {
  const err = expectConfigError({
    ...DEFAULT_HARVEST_CONFIG,
    limit: 0,
    retry: { ...DEFAULT_HARVEST_CONFIG.retry, maxAttempts: 0 },
  });
  assert.deepEqual(
    err.issues.map((issue) => issue.path.join(".")),
    ["limit", "retry.maxAttempts"]
  );
  assert.equal(err.issues[0]?.code, "too_small");
});

test("unknown keys are rejected", () => {
  const err = expectConfigError({ ...DEFAULT_HARVEST_CONFIG, extra: true });
  assert.equal(err.issues[0]?.code, "unrecognized_keys");
});

test("format lists one line per issue", () => {
  const err = expectConfigError({ ...DEFAULT_HARVEST_CONFIG, query: "" });
  const lines = err.format().split("\n");
  assert.equal(lines[0], "Harvest configuration validation failed:");
  assert.equal(lines.length, 2);
  assert.ok(lines[1]?.startsWith("  - query: "));
});

test("issues without a path are shown as root", () => {
  const err = expectConfigError("not an object");
  assert.ok(err.format().includes("  - (root): "));
});

section("resolveHarvestConfig");

test("no overrides gives the defaults", () => {
  assert.deepEqual(resolveHarvestConfig({}), DEFAULT_HARVEST_CONFIG);
});

test("scalar and nested overrides merge field by field", () => {
  const config = resolveHarvestConfig({
    limit: 50,
    retry: { maxAttempts: 2 },
    flags: { enrichSample: true, debug: undefined },
    storage: { dataDir: "/tmp/harvest" },
  });
  assert.equal(config.limit, 50);
  assert.equal(config.query, DEFAULT_HARVEST_CONFIG.query);
  assert.deepEqual(config.retry, { ...DEFAULT_HARVEST_CONFIG.retry, maxAttempts: 2 });
  assert.deepEqual(config.flags, { enrichSample: true, enrichProject: false, debug: false });
  assert.deepEqual(config.storage, { dataDir: "/tmp/harvest", docsDir: "docs" });
});

test("overrides are validated", () => {
  assert.throws(() => resolveHarvestConfig({ pacingMs: -1 }), HarvestConfigError);
});

test("a custom base is respected", () => {
  const base = { ...DEFAULT_HARVEST_CONFIG, limit: 7 };
  assert.equal(resolveHarvestConfig({}, base).limit, 7);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
