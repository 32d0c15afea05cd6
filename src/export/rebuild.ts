/**
 * Full export rebuild from the durable log.
 *
 * Outputs (under the docs directory):
 *   db/records_partNNN.json    every stored record, chunked
 *   db/records_manifest.json   part list with record counts; read this first
 *   db/records_index.json      part file names only
 *   db/projects.json           mirrored `projects` cache, when non-empty
 *   db/samples.json            mirrored `samples` cache, when non-empty
 *   latest.json                newest records, single file, byte-capped
 */

import { join } from "node:path";
import { z } from "zod";
import type { Logger } from "../logging/index.js";
import type { DurableLog, LogReadStats, StoredRecord } from "../storage/durable-log.js";
import { writeJsonAtomic, writeTextAtomic } from "../storage/files.js";
import { writeChunked, type PartInfo } from "./chunked.js";
import { buildLatest } from "./latest.js";

export const RECORDS_BASENAME = "records";

export interface LatestItem {
  raw_id: string;
  title: string;
  accession: string;
  assay_class: string;
  country: string;
  city: string;
  url: string;
}

export interface ExportManifest {
  generated_utc: string;
  total_records: number;
  parts: PartInfo[];
  periods: string[];
}

export interface RebuildOptions {
  log: DurableLog;
  dbDir: string;
  latestPath: string;
  maxBytes: number;
  latestMaxItems: number;
  /** Cache namespaces mirrored next to the records, by file stem */
  mirrors?: Readonly<Record<string, Readonly<Record<string, unknown>>>>;
  logger: Logger;
  now?: () => Date;
}

export interface RebuildSummary {
  totalRecords: number;
  parts: number;
  malformedLines: number;
  latestCount: number;
}

/** Lenient view of a stored line; older lines may lack any of these. */
const LatestSourceSchema = z.object({
  rawId: z.string(),
  projectId: z.string(),
  title: z.string().catch(""),
  assay: z.object({ assayClass: z.string().catch("") }).catch({ assayClass: "" }),
  geo: z
    .object({ country: z.string().catch(""), city: z.string().catch("") })
    .catch({ country: "", city: "" }),
  links: z.object({ record: z.string().catch("") }).catch({ record: "" }),
});

export function latestItem(record: StoredRecord): LatestItem {
  const view = LatestSourceSchema.parse(record);
  return {
    raw_id: view.rawId,
    title: view.title,
    accession: view.projectId,
    assay_class: view.assay.assayClass,
    country: view.geo.country,
    city: view.geo.city,
    url: view.links.record,
  };
}

export function rebuildExports(options: RebuildOptions): RebuildSummary {
  const now = options.now ?? (() => new Date());
  const generatedUtc = now().toISOString();
  const stats: LogReadStats = { lines: 0, malformed: 0 };

  // Newest records are the last ones read; keep a bounded tail.
  const tail: LatestItem[] = [];
  let total = 0;
  function* tracked(): Generator<StoredRecord> {
    for (const record of options.log.records(stats)) {
      total++;
      if (options.latestMaxItems > 0) {
        tail.push(latestItem(record));
        if (tail.length > options.latestMaxItems * 2) {
          tail.splice(0, tail.length - options.latestMaxItems);
        }
      }
      yield record;
    }
  }

  const parts = writeChunked(tracked(), {
    dir: options.dbDir,
    baseName: RECORDS_BASENAME,
    maxBytes: options.maxBytes,
  });

  const manifest: ExportManifest = {
    generated_utc: generatedUtc,
    total_records: total,
    parts,
    periods: options.log.periods(),
  };
  writeJsonAtomic(join(options.dbDir, `${RECORDS_BASENAME}_manifest.json`), manifest);
  writeJsonAtomic(join(options.dbDir, `${RECORDS_BASENAME}_index.json`), {
    generated_utc: generatedUtc,
    parts: parts.map((part) => part.path),
  });

  for (const [stem, values] of Object.entries(options.mirrors ?? {})) {
    if (Object.keys(values).length > 0) {
      writeJsonAtomic(join(options.dbDir, `${stem}.json`), values);
    }
  }

  const newestFirst = tail.slice(-options.latestMaxItems).reverse();
  const latest = buildLatest(newestFirst, options.maxBytes, generatedUtc);
  writeTextAtomic(options.latestPath, latest.text);

  if (stats.malformed > 0) {
    options.logger.warn("Skipped malformed log lines during export", {
      malformed: stats.malformed,
    });
  }
  options.logger.info("Exports rebuilt", {
    totalRecords: total,
    parts: parts.length,
    latest: latest.count,
  });

  return {
    totalRecords: total,
    parts: parts.length,
    malformedLines: stats.malformed,
    latestCount: latest.count,
  };
}
