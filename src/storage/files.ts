/**
 * Local file primitives for durable state.
 *
 * Every failure here is a local I/O failure and surfaces as StorageError,
 * which aborts the run: continuing after a failed flush could break the
 * append-only and atomic-replace guarantees of the ledger, log and caches.
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  mkdirSync,
  openSync,
  readFileSync,
  readSync,
  readdirSync,
  renameSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { dirname } from "node:path";

export class StorageError extends Error {
  public readonly path: string;
  public readonly operation: string;

  constructor(operation: string, path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Storage ${operation} failed for ${path}: ${detail}`, { cause });
    this.name = "StorageError";
    this.path = path;
    this.operation = operation;
  }
}

function guard<T>(operation: string, path: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new StorageError(operation, path, err);
  }
}

export function ensureParentDir(path: string): void {
  guard("mkdir", path, () => mkdirSync(dirname(path), { recursive: true }));
}

/**
 * Size of a file in bytes, 0 when it does not exist.
 */
export function fileSize(path: string): number {
  if (!existsSync(path)) {
    return 0;
  }
  return guard("stat", path, () => statSync(path).size);
}

/**
 * Read a UTF-8 file, or null when it does not exist.
 */
export function readTextFile(path: string): string | null {
  if (!existsSync(path)) {
    return null;
  }
  return guard("read", path, () => readFileSync(path, "utf-8"));
}

/**
 * Write text through a sibling temp file and rename it into place, so
 * readers only ever see the old or the new content.
 */
export function writeTextAtomic(path: string, text: string): void {
  ensureParentDir(path);
  const tmp = `${path}.tmp`;
  guard("write", tmp, () => writeFileSync(tmp, text, "utf-8"));
  guard("rename", path, () => renameSync(tmp, path));
}

export function writeJsonAtomic(path: string, value: unknown): void {
  writeTextAtomic(path, JSON.stringify(value, null, 2) + "\n");
}

/**
 * Append lines to a file, creating it as needed. A previous crash may have
 * left a partial last line; it is terminated first so the new lines start
 * on their own.
 */
export function appendLines(path: string, lines: readonly string[]): void {
  if (lines.length === 0) {
    return;
  }
  ensureParentDir(path);
  const prefix = endsWithNewline(path) ? "" : "\n";
  guard("append", path, () => appendFileSync(path, prefix + lines.join("\n") + "\n", "utf-8"));
}

function endsWithNewline(path: string): boolean {
  const size = fileSize(path);
  if (size === 0) {
    return true;
  }
  return guard("read", path, () => {
    const fd = openSync(path, "r");
    try {
      const buf = Buffer.alloc(1);
      readSync(fd, buf, 0, 1, size - 1);
      return buf[0] === 0x0a;
    } finally {
      closeSync(fd);
    }
  });
}

/**
 * Non-empty trimmed lines of a file; empty when the file does not exist.
 */
export function readLines(path: string): string[] {
  const text = readTextFile(path);
  if (text === null) {
    return [];
  }
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Names of entries in a directory; empty when it does not exist.
 */
export function listDir(path: string): string[] {
  if (!existsSync(path)) {
    return [];
  }
  return guard("list", path, () => readdirSync(path));
}

export function removeFile(path: string): void {
  guard("remove", path, () => unlinkSync(path));
}
