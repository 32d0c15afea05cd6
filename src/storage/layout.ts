/**
 * On-disk layout of harvest state and published artifacts.
 *
 *   <dataDir>/ledger/raw_ids.txt          raw ids with a terminal decision
 *   <dataDir>/ledger/project_ids.txt      project ids in the corpus
 *   <dataDir>/cache/<namespace>.json      links, samples, projects
 *   <dataDir>/log/catalog_<period>.jsonl  durable log
 *   <dataDir>/logs/harvest.log            process log
 *   <docsDir>/db/                         chunked export + manifest
 *   <docsDir>/latest.json                 latest view
 *   <docsDir>/debug/                      run reports, decision trails
 */

import { join } from "node:path";
import type { StorageLayout } from "../config/harvest/index.js";

export const CACHE_NAMESPACES = ["links", "samples", "projects"] as const;
export type CacheNamespace = (typeof CACHE_NAMESPACES)[number];

export interface HarvestPaths {
  readonly rawIdLedger: string;
  readonly projectIdLedger: string;
  readonly cacheDir: string;
  readonly logDir: string;
  readonly processLogDir: string;
  readonly dbDir: string;
  readonly latestPath: string;
  readonly debugDir: string;
  readonly reportPath: string;
  cachePath(namespace: CacheNamespace): string;
  trailPath(runId: string): string;
}

export function harvestPaths(layout: StorageLayout): HarvestPaths {
  const { dataDir, docsDir } = layout;
  const cacheDir = join(dataDir, "cache");
  const debugDir = join(docsDir, "debug");
  return {
    rawIdLedger: join(dataDir, "ledger", "raw_ids.txt"),
    projectIdLedger: join(dataDir, "ledger", "project_ids.txt"),
    cacheDir,
    logDir: join(dataDir, "log"),
    processLogDir: join(dataDir, "logs"),
    dbDir: join(docsDir, "db"),
    latestPath: join(docsDir, "latest.json"),
    debugDir,
    reportPath: join(debugDir, "latest_report.json"),
    cachePath: (namespace) => join(cacheDir, `${namespace}.json`),
    trailPath: (runId) => join(debugDir, `decisions_${runId}.ndjson`),
  };
}
