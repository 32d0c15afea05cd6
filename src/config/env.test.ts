/**
 * Environment helper tests.
 *
 * Run: node --import tsx src/config/env.test.ts
 */

import { strict as assert } from "node:assert";

import { ConfigError, optionalEnvBool, optionalEnvInt } from "./env.js";

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

const KEY = "SEQCAT_TEST_VALUE";

function withEnv(value: string | undefined, fn: () => void): void {
  if (value === undefined) {
    delete process.env[KEY];
  } else {
    process.env[KEY] = value;
  }
  try {
    fn();
  } finally {
    delete process.env[KEY];
  }
}

section("optionalEnvInt");

test("unset or blank falls back to the default", () => {
  withEnv(undefined, () => assert.equal(optionalEnvInt(KEY, 30), 30));
  withEnv("   ", () => assert.equal(optionalEnvInt(KEY, 30), 30));
});

test("a positive integer is parsed", () => {
  withEnv(" 250 ", () => assert.equal(optionalEnvInt(KEY, 30), 250));
});

test("zero and negative values are rejected", () => {
  withEnv("-5", () =>
    assert.throws(() => optionalEnvInt(KEY, 30), {
      name: "ConfigError",
      message: "Environment variable SEQCAT_TEST_VALUE must be a positive integer, got: -5",
    })
  );
  withEnv("0", () => assert.throws(() => optionalEnvInt(KEY, 30), ConfigError));
});

test("non-integer text is rejected", () => {
  withEnv("12ms", () => assert.throws(() => optionalEnvInt(KEY, 30), ConfigError));
  withEnv("1.5", () => assert.throws(() => optionalEnvInt(KEY, 30), ConfigError));
});

section("optionalEnvBool");

test("recognized spellings", () => {
  withEnv("YES", () => assert.equal(optionalEnvBool(KEY, false), true));
  withEnv("0", () => assert.equal(optionalEnvBool(KEY, true), false));
  withEnv(undefined, () => assert.equal(optionalEnvBool(KEY, true), true));
});

test("anything else is rejected", () => {
  withEnv("maybe", () => assert.throws(() => optionalEnvBool(KEY, false), ConfigError));
});

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
