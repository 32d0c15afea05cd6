/**
 * Append-only corpus: one newline-delimited JSON file per period
 * (`catalog_<period>.jsonl`). Once a file reaches the byte budget, appends
 * continue in `catalog_<period>_partNNN.jsonl`. Lines are never rewritten.
 */

import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { appendLines, fileSize, readTextFile } from "./files.js";
import type { EnrichedRecord } from "../types/index.js";

/**
 * Minimal shape every stored line must have. Other fields pass through
 * untouched so older lines stay readable.
 */
export const StoredRecordSchema = z
  .object({
    rawId: z.string().min(1),
    projectId: z.string().min(1),
  })
  .passthrough();

export type StoredRecord = z.infer<typeof StoredRecordSchema>;

export interface DurableLogOptions {
  dir: string;
  /** Per-file byte ceiling; checked before each line */
  maxBytes: number;
  prefix?: string;
}

export interface LogReadStats {
  lines: number;
  malformed: number;
}

const PART_RE = /^(.+?)(?:_part(\d{3}))?\.jsonl$/;

export class DurableLog {
  readonly dir: string;
  readonly maxBytes: number;
  readonly prefix: string;

  constructor(options: DurableLogOptions) {
    this.dir = options.dir;
    this.maxBytes = options.maxBytes;
    this.prefix = options.prefix ?? "catalog";
  }

  basePath(period: string): string {
    return join(this.dir, `${this.prefix}_${period}.jsonl`);
  }

  partPath(period: string, index: number): string {
    return join(this.dir, `${this.prefix}_${period}_part${String(index).padStart(3, "0")}.jsonl`);
  }

  /**
   * Files of a period in read order: base file, then parts by index.
   */
  files(period: string): string[] {
    const out: string[] = [];
    if (existsSync(this.basePath(period))) {
      out.push(this.basePath(period));
    }
    for (let i = 0; existsSync(this.partPath(period, i)); i++) {
      out.push(this.partPath(period, i));
    }
    return out;
  }

  /**
   * Periods present on disk, ascending.
   */
  periods(): string[] {
    if (!existsSync(this.dir)) {
      return [];
    }
    const head = `${this.prefix}_`;
    const found = new Set<string>();
    for (const name of readdirSync(this.dir)) {
      if (!name.startsWith(head)) {
        continue;
      }
      const match = PART_RE.exec(name.slice(head.length));
      if (match?.[1]) {
        found.add(match[1]);
      }
    }
    return [...found].sort();
  }

  /**
   * Append records to a period. Returns the number of lines written.
   */
  append(period: string, records: readonly EnrichedRecord[]): number {
    if (records.length === 0) {
      return 0;
    }

    // Index -1 is the base file; parts start at 0.
    let index = this.lastIndex(period);
    let path = this.pathAt(period, index);
    let size = fileSize(path);
    let buffered: string[] = [];

    const flushBuffered = (): void => {
      appendLines(path, buffered);
      buffered = [];
    };

    for (const record of records) {
      const line = JSON.stringify(record);
      const bytes = Buffer.byteLength(line, "utf-8") + 1;
      if (size > 0 && size + bytes > this.maxBytes) {
        flushBuffered();
        index++;
        path = this.pathAt(period, index);
        size = fileSize(path);
      }
      buffered.push(line);
      size += bytes;
    }
    flushBuffered();
    return records.length;
  }

  /**
   * Iterate every stored record, periods ascending. Lines that fail to
   * parse (a torn final write) are skipped and counted in `stats`.
   */
  *records(stats?: LogReadStats): Generator<StoredRecord> {
    for (const period of this.periods()) {
      yield* this.periodRecords(period, stats);
    }
  }

  *periodRecords(period: string, stats?: LogReadStats): Generator<StoredRecord> {
    for (const path of this.files(period)) {
      const text = readTextFile(path) ?? "";
      for (const raw of text.split("\n")) {
        const line = raw.trim();
        if (line === "") {
          continue;
        }
        if (stats) stats.lines++;
        const record = parseLine(line);
        if (record) {
          yield record;
        } else if (stats) {
          stats.malformed++;
        }
      }
    }
  }

  /**
   * Project ids of every stored record, for ledger reconciliation.
   */
  *projectIds(): Generator<string> {
    for (const record of this.records()) {
      yield record.projectId;
    }
  }

  private lastIndex(period: string): number {
    let index = -1;
    while (existsSync(this.partPath(period, index + 1))) {
      index++;
    }
    return index;
  }

  private pathAt(period: string, index: number): string {
    return index < 0 ? this.basePath(period) : this.partPath(period, index);
  }
}

function parseLine(line: string): StoredRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  const result = StoredRecordSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
