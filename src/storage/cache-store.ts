/**
 * Disk-backed key → value cache with explicit tombstones.
 *
 * One JSON object per namespace, rewritten in full (atomically) on flush.
 * A tombstone is stored as `{}` and means "looked up, not found"; it is
 * distinct from a missing key ("never looked up"), so failed lookups are
 * not repeated on every run.
 */

import type { z } from "zod";
import { readTextFile, writeJsonAtomic } from "./files.js";
import type { Logger } from "../logging/index.js";

export type CacheLookup<T> =
  | { readonly kind: "miss" }
  | { readonly kind: "tombstone" }
  | { readonly kind: "hit"; readonly value: T };

type Slot<T> = { readonly kind: "tombstone" } | { readonly kind: "value"; readonly value: T };

function isTombstone(raw: unknown): boolean {
  return (
    typeof raw === "object" &&
    raw !== null &&
    !Array.isArray(raw) &&
    Object.keys(raw).length === 0
  );
}

export interface CacheStoreOptions<T> {
  /** Namespace name, used in log context */
  namespace: string;
  /** JSON file backing this namespace */
  path: string;
  /** Shape of a stored value; entries that do not match are dropped on load */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  logger: Logger;
}

export class CacheStore<T> {
  readonly namespace: string;
  readonly path: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly logger: Logger;
  private readonly slots = new Map<string, Slot<T>>();
  private dirty = 0;

  constructor(options: CacheStoreOptions<T>) {
    this.namespace = options.namespace;
    this.path = options.path;
    this.schema = options.schema;
    this.logger = options.logger;
  }

  /**
   * Replace in-memory state with the file's content. A missing file is an
   * empty cache. An unreadable file is reported and treated as empty; the
   * next flush replaces it.
   */
  load(): this {
    this.slots.clear();
    this.dirty = 0;

    const text = readTextFile(this.path);
    if (text === null) {
      return this;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      this.logger.warn("Cache file is not valid JSON; starting empty", {
        namespace: this.namespace,
        path: this.path,
        error: err,
      });
      return this;
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      this.logger.warn("Cache file is not a JSON object; starting empty", {
        namespace: this.namespace,
        path: this.path,
      });
      return this;
    }

    let rejected = 0;
    for (const [key, raw] of Object.entries(parsed)) {
      if (isTombstone(raw)) {
        this.slots.set(key, { kind: "tombstone" });
        continue;
      }
      const result = this.schema.safeParse(raw);
      if (result.success) {
        this.slots.set(key, { kind: "value", value: result.data });
      } else {
        rejected++;
      }
    }

    if (rejected > 0) {
      this.logger.warn("Dropped cache entries with unexpected shape", {
        namespace: this.namespace,
        rejected,
      });
    }
    this.logger.debug("Cache loaded", { namespace: this.namespace, entries: this.slots.size });
    return this;
  }

  lookup(key: string): CacheLookup<T> {
    const slot = this.slots.get(key);
    if (!slot) {
      return { kind: "miss" };
    }
    return slot.kind === "tombstone" ? slot : { kind: "hit", value: slot.value };
  }

  set(key: string, value: T): void {
    this.slots.set(key, { kind: "value", value });
    this.dirty++;
  }

  /**
   * Record that `key` was looked up and nothing was found.
   */
  markNotFound(key: string): void {
    this.slots.set(key, { kind: "tombstone" });
    this.dirty++;
  }

  get size(): number {
    return this.slots.size;
  }

  /** Writes since the last load or flush */
  get pendingWrites(): number {
    return this.dirty;
  }

  /**
   * Found values, tombstones excluded.
   */
  values(): Record<string, T> {
    const out: Record<string, T> = {};
    for (const [key, slot] of this.slots) {
      if (slot.kind === "value") {
        out[key] = slot.value;
      }
    }
    return out;
  }

  /**
   * Atomically rewrite the namespace file when anything changed.
   * Returns true when a write happened.
   */
  flush(): boolean {
    if (this.dirty === 0) {
      return false;
    }
    const out: Record<string, unknown> = {};
    for (const [key, slot] of this.slots) {
      out[key] = slot.kind === "tombstone" ? {} : slot.value;
    }
    writeJsonAtomic(this.path, out);
    this.logger.debug("Cache flushed", {
      namespace: this.namespace,
      entries: this.slots.size,
      writes: this.dirty,
    });
    this.dirty = 0;
    return true;
  }
}
