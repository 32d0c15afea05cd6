/**
 * Run reporter: per-batch counters, the optional NDJSON decision trail,
 * and the run summary written at the end of every run, failed or not.
 */

import { DropReason, type HarvestMode } from "../config/harvest/index.js";
import type { Logger } from "../logging/index.js";
import { appendLines, writeJsonAtomic } from "../storage/files.js";

export type Decision = "kept" | DropReason;

/** One line of the decision trail. */
export interface DecisionLine {
  raw_id: string;
  decision: Decision;
  reason?: string;
  accession?: string;
  method?: string;
}

export interface BatchCounters {
  /** Ids returned by the search */
  input: number;
  /** Ids skipped before fetch because the ledger already had them */
  skipped: number;
  resolved: number;
  /** Records kept (new projects) */
  new: number;
  dropped: Record<DropReason, number>;
  /** Lines appended to the durable log */
  emitted: number;
}

export interface BatchReport {
  tag: string;
  generated_utc: string;
  run_id: string;
  counters: BatchCounters;
  decision_trail?: string;
}

export type RunStatus = "ok" | "failed";

export interface RunSummary {
  run_id: string;
  mode: HarvestMode;
  status: RunStatus;
  started_utc: string;
  finished_utc: string;
  totals: BatchCounters;
  batches: BatchReport[];
  error?: string;
}

export function emptyCounters(): BatchCounters {
  return {
    input: 0,
    skipped: 0,
    resolved: 0,
    new: 0,
    dropped: {
      unresolved: 0,
      "duplicate-persisted": 0,
      "duplicate-in-batch": 0,
      fetch_error: 0,
    },
    emitted: 0,
  };
}

function addCounters(into: BatchCounters, from: BatchCounters): void {
  into.input += from.input;
  into.skipped += from.skipped;
  into.resolved += from.resolved;
  into.new += from.new;
  into.emitted += from.emitted;
  for (const reason of DropReason.options) {
    into.dropped[reason] += from.dropped[reason];
  }
}

/**
 * Counters and decisions of one batch. Decisions are buffered and only
 * reach the trail file when the batch is finished.
 */
export class BatchTally {
  readonly tag: string;
  readonly counters: BatchCounters = emptyCounters();
  readonly decisions: DecisionLine[] = [];

  constructor(tag: string) {
    this.tag = tag;
  }

  decide(line: DecisionLine): void {
    this.decisions.push(line);
    if (line.decision === "kept") {
      this.counters.new++;
    } else {
      this.counters.dropped[line.decision]++;
    }
  }
}

export interface RunReporterOptions {
  runId: string;
  mode: HarvestMode;
  logger: Logger;
  /** Decision trail file; null disables the trail */
  trailPath: string | null;
  reportPath: string;
  now?: () => Date;
}

export class RunReporter {
  private readonly options: RunReporterOptions;
  private readonly now: () => Date;
  private readonly startedUtc: string;
  private readonly batches: BatchReport[] = [];

  constructor(options: RunReporterOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
    this.startedUtc = this.now().toISOString();
  }

  beginBatch(tag: string): BatchTally {
    return new BatchTally(tag);
  }

  finishBatch(tally: BatchTally): BatchReport {
    const { trailPath } = this.options;
    if (trailPath) {
      appendLines(
        trailPath,
        tally.decisions.map((line) => JSON.stringify(line))
      );
    }

    const report: BatchReport = {
      tag: tally.tag,
      generated_utc: this.now().toISOString(),
      run_id: this.options.runId,
      counters: tally.counters,
      ...(trailPath ? { decision_trail: trailPath } : {}),
    };
    this.batches.push(report);
    this.options.logger.info("Batch finished", { tag: tally.tag, ...tally.counters });
    return report;
  }

  get batchReports(): readonly BatchReport[] {
    return this.batches;
  }

  totals(): BatchCounters {
    const totals = emptyCounters();
    for (const batch of this.batches) {
      addCounters(totals, batch.counters);
    }
    return totals;
  }

  /**
   * Write the run summary and log the totals. Called once, whether the
   * run succeeded or not.
   */
  writeSummary(error?: unknown): RunSummary {
    const summary: RunSummary = {
      run_id: this.options.runId,
      mode: this.options.mode,
      status: error === undefined ? "ok" : "failed",
      started_utc: this.startedUtc,
      finished_utc: this.now().toISOString(),
      totals: this.totals(),
      batches: [...this.batches],
      ...(error === undefined
        ? {}
        : { error: error instanceof Error ? error.message : String(error) }),
    };
    writeJsonAtomic(this.options.reportPath, summary);

    this.options.logger.info("Run summary", {
      status: summary.status,
      batches: summary.batches.length,
      ...summary.totals,
    });
    return summary;
  }
}
