/**
 * One harvest batch, end to end:
 *
 *   search → skip ids already in the ledger → fetch detail → resolve
 *     → collapse → enrich survivors → classify → (commit)
 *
 * `harvestBatch` only touches in-memory state: the ledger's pending ids
 * and the caches. Nothing reaches disk until `commitBatch`, so a process
 * killed in between leaves the durable log and ledger files as they were.
 */

import { collapseBatch, type BatchCandidate, type KeptRecord } from "../aggregate/index.js";
import { classifyAssay, inferGeo } from "../classify/index.js";
import type { HarvestConfig } from "../config/index.js";
import { CachedLookup, sampleCard } from "../enrich/index.js";
import type { Logger } from "../logging/index.js";
import type { BatchReport, BatchTally, RunReporter } from "../report/index.js";
import { EntityResolver } from "../resolve/resolver.js";
import { projectUrl, recordUrl } from "../source/eutils-client.js";
import type { SearchWindow, SourceClient } from "../source/types.js";
import { StorageError } from "../storage/files.js";
import type {
  EnrichedRecord,
  ProjectDetails,
  RawRecord,
  SampleDetails,
} from "../types/index.js";
import { commitBatch, type HarvestState } from "./state.js";

export interface HarvestContext {
  readonly config: Readonly<HarvestConfig>;
  readonly source: SourceClient;
  readonly state: HarvestState;
  readonly resolver: EntityResolver;
  readonly samples: CachedLookup<SampleDetails>;
  readonly projects: CachedLookup<ProjectDetails>;
  readonly reporter: RunReporter;
  readonly logger: Logger;
  readonly runId: string;
  readonly now: () => Date;
}

export interface BatchSpec {
  /** Label for reports and provenance (a day, a window, a page) */
  readonly tag: string;
  /** Durable log period the batch is appended to */
  readonly period: string;
  readonly window: SearchWindow;
  /** Search limit; defaults to the configured per-call limit */
  readonly limit?: number;
}

export interface PendingBatch {
  readonly spec: BatchSpec;
  /** Upstream total for the query and window */
  readonly total: number;
  readonly records: EnrichedRecord[];
  readonly tally: BatchTally;
}

export interface BatchOutcome {
  readonly report: BatchReport;
  readonly total: number;
}

export interface HarvestContextInit {
  config: Readonly<HarvestConfig>;
  source: SourceClient;
  state: HarvestState;
  reporter: RunReporter;
  logger: Logger;
  runId: string;
  now?: () => Date;
}

export function createHarvestContext(init: HarvestContextInit): HarvestContext {
  const { source, state, logger } = init;
  return {
    ...init,
    now: init.now ?? (() => new Date()),
    resolver: new EntityResolver({
      source,
      links: state.caches.links,
      logger: logger.child({ component: "resolver" }),
    }),
    samples: new CachedLookup({
      cache: state.caches.samples,
      fetch: (accession) => source.fetchSampleDetails(accession),
      logger,
    }),
    projects: new CachedLookup({
      cache: state.caches.projects,
      fetch: (accession) => source.fetchProjectDetails(accession),
      logger,
    }),
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Fetch, resolve, collapse and enrich one batch. A failed search or a
 * storage failure aborts; failures of a single record drop that record
 * with `fetch_error` and leave its raw id unmarked for the next run.
 */
export async function harvestBatch(ctx: HarvestContext, spec: BatchSpec): Promise<PendingBatch> {
  const { config, source, state, logger } = ctx;
  const tally = ctx.reporter.beginBatch(spec.tag);

  const page = await source.search(config.query, spec.window, spec.limit ?? config.limit);
  const ids = [...new Set(page.ids)];
  tally.counters.input = ids.length;
  logger.info("Search returned", { tag: spec.tag, ids: ids.length, total: page.total });

  const candidates: BatchCandidate[] = [];
  for (const id of ids) {
    if (state.ledger.rawIds.has(id)) {
      tally.counters.skipped++;
      continue;
    }

    let record: RawRecord;
    try {
      record = await source.fetchDetail(id);
    } catch (err) {
      if (err instanceof StorageError) throw err;
      logger.warn("Record fetch failed", { rawId: id, error: err });
      tally.decide({ raw_id: id, decision: "fetch_error", reason: errorMessage(err) });
      continue;
    }

    const resolution = await ctx.resolver.resolve(record);
    if (resolution.status === "failed") {
      tally.decide({ raw_id: id, decision: "fetch_error", reason: resolution.reason });
      continue;
    }
    if (resolution.status === "resolved") {
      tally.counters.resolved++;
    }
    candidates.push({ record, resolution });
  }

  const collapsed = collapseBatch(candidates, state.ledger);
  for (const decision of collapsed.decisions) {
    if (decision.decision === "kept") {
      tally.decide({
        raw_id: decision.rawId,
        decision: "kept",
        accession: decision.projectId,
        method: decision.method,
      });
    } else {
      tally.decide({
        raw_id: decision.rawId,
        decision: decision.decision,
        reason: decision.reason,
        ...(decision.projectId ? { accession: decision.projectId } : {}),
      });
    }
  }

  const records: EnrichedRecord[] = [];
  for (const kept of collapsed.kept) {
    records.push(await enrichRecord(ctx, kept, spec.tag));
  }

  return { spec, total: page.total, records, tally };
}

async function enrichRecord(
  ctx: HarvestContext,
  kept: KeptRecord,
  tag: string
): Promise<EnrichedRecord> {
  const { record, projectId } = kept;
  const { flags } = ctx.config;
  const sampleAccession = record.fields["BioSample"]?.trim() ?? "";

  const sample =
    flags.enrichSample && sampleAccession
      ? (await ctx.samples.get(sampleAccession)).value
      : null;
  const project = flags.enrichProject ? (await ctx.projects.get(projectId)).value : null;

  const attributes = sample?.attributes ?? {};
  return {
    rawId: record.id,
    title: record.title,
    fields: record.fields,
    runAccessions: record.runAccessions,
    projectId,
    resolution: { method: kept.method, cacheHit: kept.cacheHit },
    assay: classifyAssay({ fields: record.fields, title: record.title, attributes }),
    geo: inferGeo(
      attributes,
      [record.title, ...Object.values(record.fields)],
      sample?.accession ?? sampleAccession
    ),
    sample: sample ? sampleCard(sample) : null,
    project,
    links: { record: recordUrl(record.id), project: projectUrl(projectId) },
    provenance: {
      ingestedUtc: ctx.now().toISOString(),
      source: ctx.source.name,
      tag,
      runId: ctx.runId,
    },
  };
}

/**
 * Harvest, commit and report one batch.
 */
export async function runBatch(ctx: HarvestContext, spec: BatchSpec): Promise<BatchOutcome> {
  const pending = await harvestBatch(ctx, spec);
  const committed = commitBatch(ctx.state, spec.period, pending.records);
  pending.tally.counters.emitted = committed.emitted;
  ctx.logger.debug("Batch committed", {
    tag: spec.tag,
    period: spec.period,
    ledger: committed.ledger,
    caches: committed.cachesFlushed,
  });
  return { report: ctx.reporter.finishBatch(pending.tally), total: pending.total };
}
