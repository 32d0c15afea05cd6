/**
 * Size-bounded chunked export.
 *
 * Records are serialized one at a time into JSON array parts, one record
 * per line:
 *
 *   [
 *   {...},
 *   {...}
 *   ]
 *
 * Before a record is added, the part's size with that record and the
 * closing bracket is checked against the budget; a non-empty part that
 * would overflow is closed first. A record larger than the budget on its
 * own still gets a part to itself, whole.
 */

import { join } from "node:path";
import { listDir, removeFile, writeTextAtomic } from "../storage/files.js";

const OPEN = "[\n";
const SEPARATOR = ",\n";
const CLOSE = "\n]\n";

const OPEN_BYTES = Buffer.byteLength(OPEN);
const SEPARATOR_BYTES = Buffer.byteLength(SEPARATOR);
const CLOSE_BYTES = Buffer.byteLength(CLOSE);

export interface ChunkOptions {
  dir: string;
  /** Part files are named `<baseName>_partNNN.json` */
  baseName: string;
  maxBytes: number;
}

export interface PartInfo {
  /** File name relative to `dir` */
  readonly path: string;
  readonly records: number;
  readonly bytes: number;
}

export function partFileName(baseName: string, index: number): string {
  return `${baseName}_part${String(index).padStart(3, "0")}.json`;
}

export function serializePart(lines: readonly string[]): string {
  return lines.length === 0 ? "[]\n" : OPEN + lines.join(SEPARATOR) + CLOSE;
}

/**
 * Write records as numbered parts under `dir`. Parts left over from an
 * earlier, larger export are removed.
 */
export function writeChunked(records: Iterable<unknown>, options: ChunkOptions): PartInfo[] {
  const out: PartInfo[] = [];
  let current: string[] = [];
  let size = OPEN_BYTES;

  const closePart = (): void => {
    const text = serializePart(current);
    const path = partFileName(options.baseName, out.length);
    writeTextAtomic(join(options.dir, path), text);
    out.push({ path, records: current.length, bytes: Buffer.byteLength(text, "utf-8") });
    current = [];
    size = OPEN_BYTES;
  };

  for (const record of records) {
    const line = JSON.stringify(record);
    const bytes = Buffer.byteLength(line, "utf-8");
    if (current.length > 0 && size + SEPARATOR_BYTES + bytes + CLOSE_BYTES > options.maxBytes) {
      closePart();
    }
    size += (current.length > 0 ? SEPARATOR_BYTES : 0) + bytes;
    current.push(line);
  }
  if (current.length > 0) {
    closePart();
  }

  removeStaleParts(options.dir, options.baseName, out.length);
  return out;
}

function removeStaleParts(dir: string, baseName: string, keep: number): void {
  const head = `${baseName}_part`;
  for (const name of listDir(dir)) {
    if (!name.startsWith(head) || !name.endsWith(".json")) {
      continue;
    }
    const index = name.slice(head.length, -".json".length);
    if (/^\d{3}$/.test(index) && Number(index) >= keep) {
      removeFile(join(dir, name));
    }
  }
}
