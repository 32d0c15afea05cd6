/**
 * Boundary between the pipeline and the remote catalog. The pipeline never
 * sees wire formats; implementations own transport, parsing and retries.
 */

import type { ProjectDetails, RawRecord, SampleDetails } from "../types/index.js";

export type SearchWindow =
  /** Records entered in the last `days` days, newest first */
  | { readonly kind: "recent"; readonly days: number }
  /** Records entered on one calendar day (YYYY-MM-DD) */
  | { readonly kind: "day"; readonly date: string }
  /** One page of the full result set, starting at offset `start` */
  | { readonly kind: "page"; readonly start: number; readonly sort?: string };

export interface SearchPage {
  readonly ids: readonly string[];
  /** Total matches upstream, across all pages */
  readonly total: number;
}

/** Entity kinds reachable through the link service */
export type LinkTarget = "bioproject" | "biosample";

/**
 * Calls the resolver needs for tiers 2 and 3.
 */
export interface LinkSource {
  /** Secondary numeric ids linked from a raw record */
  fetchLinked(rawId: string, target: LinkTarget): Promise<string[]>;
  /** Flattened summary text of a linked entity */
  fetchSummaryText(target: LinkTarget, secondaryId: string): Promise<string>;
  /** Full detail document of a raw record, as text */
  fetchFullText(rawId: string): Promise<string>;
}

/**
 * Calls used for optional enrichment. `null` means the upstream has no
 * document for the accession.
 */
export interface EnrichmentSource {
  fetchSampleDetails(accession: string): Promise<SampleDetails | null>;
  fetchProjectDetails(accession: string): Promise<ProjectDetails | null>;
}

export interface SourceClient extends LinkSource, EnrichmentSource {
  /** Source tag recorded in provenance */
  readonly name: string;
  search(query: string, window: SearchWindow, limit: number): Promise<SearchPage>;
  fetchDetail(rawId: string): Promise<RawRecord>;
}
