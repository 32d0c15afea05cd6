/**
 * Harvest modes. Each turns into a sequence of batches, committed one at
 * a time; exports are rebuilt once every batch has committed, and the run
 * summary is written whatever the outcome.
 */

import { rebuildExports, type RebuildSummary } from "../export/index.js";
import type { HarvestPaths } from "../storage/layout.js";
import { runBatch, type HarvestContext } from "./harvest.js";
import type { BatchCounters, RunSummary } from "../report/index.js";

export type HarvestPlan =
  | { readonly mode: "daily"; readonly days: number }
  | {
      readonly mode: "backfill-year";
      readonly year: number;
      /** Last day to harvest (YYYY-MM-DD); defaults to Dec 31 or today */
      readonly through?: string;
    }
  | {
      readonly mode: "crawl";
      readonly pageSize: number;
      /** Stop after this many search results */
      readonly maxRecords?: number;
      /** Stop once this many new records were kept */
      readonly stopAfterNew?: number;
      readonly sort?: string;
    };

export interface HarvestRunResult {
  readonly summary: RunSummary;
  readonly exports: RebuildSummary;
}

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Calendar days of `year`, in order, up to `through` inclusive.
 */
export function daysOfYear(year: number, through?: string): string[] {
  const days: string[] = [];
  const last = through ?? `${year}-12-31`;
  for (let t = Date.UTC(year, 0, 1); new Date(t).getUTCFullYear() === year; t += 86_400_000) {
    const day = isoDay(new Date(t));
    if (day > last) break;
    days.push(day);
  }
  return days;
}

async function runDaily(ctx: HarvestContext, days: number): Promise<void> {
  await runBatch(ctx, {
    tag: `recent-${days}d`,
    period: String(ctx.now().getUTCFullYear()),
    window: { kind: "recent", days },
  });
}

async function runBackfill(ctx: HarvestContext, year: number, through?: string): Promise<void> {
  const today = isoDay(ctx.now());
  const last = through ?? (String(year) === today.slice(0, 4) ? today : undefined);
  for (const day of daysOfYear(year, last)) {
    await runBatch(ctx, {
      tag: day,
      period: String(year),
      window: { kind: "day", date: day },
    });
  }
}

async function runCrawl(
  ctx: HarvestContext,
  plan: Extract<HarvestPlan, { mode: "crawl" }>
): Promise<void> {
  const period = String(ctx.now().getUTCFullYear());
  let start = 0;
  let kept = 0;

  for (;;) {
    const remaining = plan.maxRecords === undefined ? plan.pageSize : plan.maxRecords - start;
    const limit = Math.min(plan.pageSize, remaining);
    if (limit <= 0) break;

    const { report, total } = await runBatch(ctx, {
      tag: `page-${start}`,
      period,
      window: { kind: "page", start, ...(plan.sort ? { sort: plan.sort } : {}) },
      limit,
    });
    kept += report.counters.new;
    start += limit;

    if (report.counters.input === 0 || start >= total) break;
    if (plan.stopAfterNew !== undefined && kept >= plan.stopAfterNew) {
      ctx.logger.info("Crawl reached its new-record target", { kept });
      break;
    }
  }
}

export async function runPlan(ctx: HarvestContext, plan: HarvestPlan): Promise<void> {
  switch (plan.mode) {
    case "daily":
      return runDaily(ctx, plan.days);
    case "backfill-year":
      return runBackfill(ctx, plan.year, plan.through);
    case "crawl":
      return runCrawl(ctx, plan);
  }
}

/**
 * Run every batch of `plan`, rebuild exports, write the run summary.
 * On failure the summary is written with status "failed" and the error
 * is rethrown; batches committed before it stay committed.
 */
export async function runHarvest(
  ctx: HarvestContext,
  plan: HarvestPlan,
  paths: HarvestPaths
): Promise<HarvestRunResult> {
  let exports: RebuildSummary;
  try {
    await runPlan(ctx, plan);
    exports = rebuildExports({
      log: ctx.state.log,
      dbDir: paths.dbDir,
      latestPath: paths.latestPath,
      maxBytes: ctx.config.maxOutputBytes,
      latestMaxItems: ctx.config.latestMaxItems,
      mirrors: {
        projects: ctx.state.caches.projects.values(),
        samples: ctx.state.caches.samples.values(),
      },
      logger: ctx.logger,
      now: ctx.now,
    });
  } catch (err) {
    ctx.logger.error("Harvest failed", { error: err });
    ctx.reporter.writeSummary(err);
    throw err;
  }
  return { summary: ctx.reporter.writeSummary(), exports };
}

export function describeTotals(totals: BatchCounters): string {
  const dropped = Object.entries(totals.dropped)
    .map(([reason, count]) => `${reason}=${count}`)
    .join(" ");
  return (
    `input=${totals.input} skipped=${totals.skipped} resolved=${totals.resolved} ` +
    `new=${totals.new} emitted=${totals.emitted} dropped: ${dropped}`
  );
}
