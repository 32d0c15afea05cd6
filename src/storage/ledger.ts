/**
 * Dedup ledger: append-only id sets that make re-runs idempotent.
 *
 * Two namespaces are kept:
 *   - raw ids already brought to a terminal decision (kept, duplicate,
 *     unresolved); checked before any fetch so re-runs make no external calls
 *   - canonical project ids already present in the corpus
 *
 * Each set is loaded fully into memory at start. Additions are held as
 * pending until `flush()` appends them to the backing file; an id, once
 * added, is never removed.
 */

import { appendLines, readLines } from "./files.js";

export class IdSet {
  readonly path: string;
  private readonly ids = new Set<string>();
  private pending: string[] = [];

  constructor(path: string) {
    this.path = path;
  }

  load(): this {
    this.ids.clear();
    this.pending = [];
    for (const id of readLines(this.path)) {
      this.ids.add(id);
    }
    return this;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  /**
   * Add an id. Returns false when it was already present.
   */
  add(id: string): boolean {
    if (id === "" || this.ids.has(id)) {
      return false;
    }
    this.ids.add(id);
    this.pending.push(id);
    return true;
  }

  get size(): number {
    return this.ids.size;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Append pending ids to the backing file. Returns how many were written.
   */
  flush(): number {
    const batch = this.pending;
    if (batch.length === 0) {
      return 0;
    }
    appendLines(this.path, batch);
    this.pending = [];
    return batch.length;
  }
}

export interface LedgerPaths {
  rawIds: string;
  projectIds: string;
}

export interface LedgerFlushResult {
  rawIds: number;
  projectIds: number;
}

export class DedupLedger {
  readonly rawIds: IdSet;
  readonly projectIds: IdSet;

  constructor(paths: LedgerPaths) {
    this.rawIds = new IdSet(paths.rawIds);
    this.projectIds = new IdSet(paths.projectIds);
  }

  load(): this {
    this.rawIds.load();
    this.projectIds.load();
    return this;
  }

  /**
   * Re-add project ids that reached the durable log but not the ledger
   * file (a crash between the two appends). Returns the ids recovered.
   */
  reconcile(projectIdsInLog: Iterable<string>): string[] {
    const recovered: string[] = [];
    for (const id of projectIdsInLog) {
      if (this.projectIds.add(id)) {
        recovered.push(id);
      }
    }
    return recovered;
  }

  /**
   * Project ids go first: a crash between the two appends then leaves raw
   * ids unmarked, and re-fetching them only yields persisted duplicates.
   */
  flush(): LedgerFlushResult {
    const projectIds = this.projectIds.flush();
    const rawIds = this.rawIds.flush();
    return { rawIds, projectIds };
  }
}
