/**
 * Default harvest configuration.
 *
 * The default query targets environmental shotgun metagenomics and
 * metatranscriptomics from built/urban settings. CLI flags override
 * individual fields.
 */

import type { HarvestConfig } from "./schema.js";

export const DEFAULT_QUERY = [
  "(",
  '(urban OR city OR cities OR metropolitan OR municipal OR "built environment" OR',
  "subway OR metro OR transit OR railway OR airport OR",
  "wastewater OR sewage OR stormwater OR street OR sidewalk OR pavement OR",
  'building OR buildings OR housing OR "surface swab" OR fomite OR air OR aerosol)',
  "AND",
  '("whole genome shotgun" OR "shotgun metagenom*" OR "shotgun sequencing" OR',
  'metagenom* OR metatranscriptom* OR "total RNA sequencing")',
  "AND",
  "(environment* OR wastewater OR sewage OR stormwater OR surface OR swab OR air OR aerosol)",
  ")",
].join(" ");

/** 50 MiB, the per-file ceiling of the static hosting target */
export const DEFAULT_MAX_OUTPUT_BYTES = 50 * 1024 * 1024;

export const DEFAULT_HARVEST_CONFIG: HarvestConfig = {
  query: DEFAULT_QUERY,
  limit: 500,
  maxOutputBytes: DEFAULT_MAX_OUTPUT_BYTES,
  latestMaxItems: 5000,
  pacingMs: 350,
  retry: {
    maxAttempts: 6,
    initialDelayMs: 600,
    backoffMultiplier: 2,
    maxDelayMs: 30_000,
    jitterMs: 250,
  },
  flags: {
    enrichSample: false,
    enrichProject: false,
    debug: false,
  },
  storage: {
    dataDir: "data",
    docsDir: "docs",
  },
};
