/**
 * Record shapes flowing through the pipeline, from the raw unit fetched
 * upstream to the enriched unit persisted in the durable log.
 */

import type {
  AssayClass,
  Confidence,
  ResolutionMethod,
} from "../config/harvest/enums.js";

/**
 * One unit fetched from the catalog (a run set with its run-info fields).
 * Immutable once fetched.
 */
export interface RawRecord {
  /** Source-assigned id (numeric catalog uid) */
  readonly id: string;
  readonly title: string;
  /** Structured fields keyed by column name (LibraryStrategy, BioSample, ...) */
  readonly fields: Readonly<Record<string, string>>;
  /** Project-like reference embedded in the summary document, if any */
  readonly embeddedAccession?: string;
  /** Run accessions listed for this record */
  readonly runAccessions: readonly string[];
}

/**
 * Normalized, pattern-validated project accession: the deduplication key.
 */
export type CanonicalProjectId = string;

export type ResolvedMethod = Exclude<ResolutionMethod, "none">;

/**
 * Outcome of entity resolution. Unresolvable is a normal outcome and
 * carries the reason it was reached. `failed` means no tier found an
 * accession and at least one of them errored, so the answer is not final.
 */
export type ResolutionResult =
  | {
      readonly status: "resolved";
      readonly projectId: CanonicalProjectId;
      readonly method: ResolvedMethod;
      readonly cacheHit: boolean;
    }
  | {
      readonly status: "unresolved";
      readonly method: "none";
      readonly cacheHit: boolean;
      readonly reason: string;
    }
  | {
      readonly status: "failed";
      readonly method: "none";
      readonly cacheHit: boolean;
      readonly reason: string;
    };

/** Resolutions the aggregator can decide on */
export type TerminalResolution = Exclude<ResolutionResult, { readonly status: "failed" }>;

export interface ClassificationResult {
  readonly assayClass: AssayClass;
  readonly tags: readonly string[];
  readonly confidence: Confidence;
  /** Markers that triggered the decision, in the order they matched */
  readonly rationale: readonly string[];
}

/**
 * Best-effort location. Empty string means "not inferred"; lat/lon are
 * numeric strings exactly as matched.
 */
export interface GeoGuess {
  readonly country: string;
  readonly region: string;
  readonly city: string;
  readonly lat: string;
  readonly lon: string;
  /** Location text the guess was parsed from */
  readonly raw: string;
  readonly sampleAccession: string;
}

export interface SampleDetails {
  readonly accession: string;
  readonly title: string;
  readonly organism: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly url: string;
}

export interface ProjectDetails {
  readonly accession: CanonicalProjectId;
  readonly uid: string;
  readonly title: string;
  readonly description: string;
  readonly organism: string;
  readonly dataType: string;
  readonly submissionDate: string;
  readonly lastUpdate: string;
  readonly centerName: string;
  readonly url: string;
}

/**
 * UI-friendly subset of sample attributes.
 */
export interface SampleCard {
  readonly accession: string;
  readonly title: string;
  readonly organism: string;
  readonly collectionDate: string;
  readonly sampleName: string;
  readonly sampleType: string;
  readonly host: string;
  readonly envBiome: string;
  readonly envFeature: string;
  readonly envMaterial: string;
  readonly depthOrAltitude: string;
  readonly temperature: string;
  readonly ph: string;
  readonly attributes: Readonly<Record<string, string>>;
}

export interface Provenance {
  readonly ingestedUtc: string;
  readonly source: string;
  /** Batch tag (day, recent window, crawl page) */
  readonly tag: string;
  readonly runId: string;
}

/**
 * Unit persisted to the durable log and exported. Created once, never
 * mutated.
 */
export interface EnrichedRecord {
  readonly rawId: string;
  readonly title: string;
  readonly fields: Readonly<Record<string, string>>;
  readonly runAccessions: readonly string[];
  readonly projectId: CanonicalProjectId;
  readonly resolution: {
    readonly method: ResolvedMethod;
    readonly cacheHit: boolean;
  };
  readonly assay: ClassificationResult;
  readonly geo: GeoGuess;
  readonly sample: SampleCard | null;
  readonly project: ProjectDetails | null;
  readonly links: {
    readonly record: string;
    readonly project: string;
  };
  readonly provenance: Provenance;
}
