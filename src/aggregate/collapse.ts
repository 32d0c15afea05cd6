/**
 * Collapsing aggregator: at most one surviving record per canonical
 * project id, within a batch and across every earlier run.
 *
 * Batch iteration order is the tie-break: the first record seen for a
 * project wins. Kept ids are marked in the in-memory ledger immediately,
 * so later records of the same batch see them.
 */

import type { DropReason } from "../config/harvest/index.js";
import type { DedupLedger } from "../storage/ledger.js";
import type {
  CanonicalProjectId,
  RawRecord,
  ResolvedMethod,
  TerminalResolution,
} from "../types/index.js";

export interface BatchCandidate {
  readonly record: RawRecord;
  readonly resolution: TerminalResolution;
}

export interface KeptRecord {
  readonly record: RawRecord;
  readonly projectId: CanonicalProjectId;
  readonly method: ResolvedMethod;
  readonly cacheHit: boolean;
}

export type CollapseDecision =
  | {
      readonly decision: "kept";
      readonly rawId: string;
      readonly projectId: CanonicalProjectId;
      readonly method: ResolvedMethod;
    }
  | {
      readonly decision: Exclude<DropReason, "fetch_error">;
      readonly rawId: string;
      readonly projectId?: CanonicalProjectId;
      readonly reason: string;
    };

export interface CollapseResult {
  readonly kept: KeptRecord[];
  readonly decisions: CollapseDecision[];
}

/**
 * Every candidate reaches a terminal decision here, so its raw id is
 * marked as seen. Nothing is written to disk; the ledger's pending ids
 * are flushed when the batch commits.
 */
export function collapseBatch(
  candidates: readonly BatchCandidate[],
  ledger: DedupLedger
): CollapseResult {
  const kept: KeptRecord[] = [];
  const decisions: CollapseDecision[] = [];
  const keptInBatch = new Set<CanonicalProjectId>();

  for (const { record, resolution } of candidates) {
    ledger.rawIds.add(record.id);

    if (resolution.status === "unresolved") {
      decisions.push({ decision: "unresolved", rawId: record.id, reason: resolution.reason });
      continue;
    }

    const { projectId } = resolution;
    if (keptInBatch.has(projectId)) {
      decisions.push({
        decision: "duplicate-in-batch",
        rawId: record.id,
        projectId,
        reason: "project already kept earlier in this batch",
      });
      continue;
    }
    if (ledger.projectIds.has(projectId)) {
      decisions.push({
        decision: "duplicate-persisted",
        rawId: record.id,
        projectId,
        reason: "project already in corpus",
      });
      continue;
    }

    keptInBatch.add(projectId);
    ledger.projectIds.add(projectId);
    kept.push({ record, projectId, method: resolution.method, cacheHit: resolution.cacheHit });
    decisions.push({ decision: "kept", rawId: record.id, projectId, method: resolution.method });
  }

  return { kept, decisions };
}
