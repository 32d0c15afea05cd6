/**
 * Durable harvest state, owned by one run: dedup ledger, durable log and
 * the three cache namespaces. `openHarvestState` loads everything and
 * reconciles the ledger with the log; `commitBatch` persists one batch.
 */

import { LinkCacheEntrySchema, type LinkCacheEntry } from "../resolve/resolver.js";
import { ProjectDetailsSchema, SampleDetailsSchema } from "../enrich/schemas.js";
import type { Logger } from "../logging/index.js";
import { CacheStore } from "../storage/cache-store.js";
import { DurableLog } from "../storage/durable-log.js";
import type { HarvestPaths } from "../storage/layout.js";
import { DedupLedger, type LedgerFlushResult } from "../storage/ledger.js";
import type { EnrichedRecord, ProjectDetails, SampleDetails } from "../types/index.js";

export interface HarvestCaches {
  readonly links: CacheStore<LinkCacheEntry>;
  readonly samples: CacheStore<SampleDetails>;
  readonly projects: CacheStore<ProjectDetails>;
}

export interface HarvestState {
  readonly ledger: DedupLedger;
  readonly log: DurableLog;
  readonly caches: HarvestCaches;
}

export interface CommitResult {
  /** Lines appended to the durable log */
  readonly emitted: number;
  readonly ledger: LedgerFlushResult;
  /** Cache namespaces that were rewritten */
  readonly cachesFlushed: string[];
}

export function openHarvestState(
  paths: HarvestPaths,
  maxBytes: number,
  logger: Logger
): HarvestState {
  const caches: HarvestCaches = {
    links: new CacheStore({
      namespace: "links",
      path: paths.cachePath("links"),
      schema: LinkCacheEntrySchema,
      logger,
    }).load(),
    samples: new CacheStore<SampleDetails>({
      namespace: "samples",
      path: paths.cachePath("samples"),
      schema: SampleDetailsSchema,
      logger,
    }).load(),
    projects: new CacheStore<ProjectDetails>({
      namespace: "projects",
      path: paths.cachePath("projects"),
      schema: ProjectDetailsSchema,
      logger,
    }).load(),
  };

  const log = new DurableLog({ dir: paths.logDir, maxBytes });
  const ledger = new DedupLedger({
    rawIds: paths.rawIdLedger,
    projectIds: paths.projectIdLedger,
  }).load();

  const recovered = ledger.reconcile(log.projectIds());
  if (recovered.length > 0) {
    ledger.flush();
    logger.warn("Recovered project ids missing from the ledger", { count: recovered.length });
  }

  logger.info("Harvest state loaded", {
    rawIds: ledger.rawIds.size,
    projectIds: ledger.projectIds.size,
    cached: {
      links: caches.links.size,
      samples: caches.samples.size,
      projects: caches.projects.size,
    },
  });

  return { ledger, log, caches };
}

/**
 * Persist one batch: log append, then ledger append, then cache rewrite.
 *
 * A crash before the log append loses the batch and nothing else. A crash
 * after it is repaired on the next load by ledger reconciliation.
 */
export function commitBatch(
  state: HarvestState,
  period: string,
  records: readonly EnrichedRecord[]
): CommitResult {
  const emitted = state.log.append(period, records);
  const ledger = state.ledger.flush();
  const cachesFlushed: string[] = [];
  for (const cache of [state.caches.links, state.caches.samples, state.caches.projects]) {
    if (cache.flush()) {
      cachesFlushed.push(cache.namespace);
    }
  }
  return { emitted, ledger, cachesFlushed };
}
