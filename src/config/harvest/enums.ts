/**
 * Closed vocabularies shared by the classifier, resolver, aggregator and
 * reporter. Stored records carry these literal values, so renaming one
 * breaks compatibility with every previously written log file.
 */

import { z } from "zod";

/**
 * Assay categories produced by the heuristic classifier.
 */
export const AssayClass = z.enum([
  "16S",
  "ITS",
  "Amplicon",
  "RNA-seq",
  "WGS",
  "Unknown",
]);
export type AssayClass = z.infer<typeof AssayClass>;

/**
 * Classifier confidence levels.
 */
export const Confidence = z.enum(["high", "medium", "low"]);
export type Confidence = z.infer<typeof Confidence>;

/**
 * Resolver tier that produced a canonical project id.
 *
 *   - embedded: accession found in the record's own fields or title
 *   - linked:   accession reached through the link service + summary lookup
 *   - fulltext: accession found in the full detail document
 *   - none:     unresolvable (a valid outcome, not an error)
 */
export const ResolutionMethod = z.enum(["embedded", "linked", "fulltext", "none"]);
export type ResolutionMethod = z.infer<typeof ResolutionMethod>;

/**
 * Reason codes attached to records that do not reach the corpus.
 */
export const DropReason = z.enum([
  "unresolved",
  "duplicate-persisted",
  "duplicate-in-batch",
  "fetch_error",
]);
export type DropReason = z.infer<typeof DropReason>;

/**
 * Harvest modes exposed by the CLI.
 */
export const HarvestMode = z.enum(["daily", "backfill-year", "crawl"]);
export type HarvestMode = z.infer<typeof HarvestMode>;
