/**
 * Heuristic assay classifier. Pure and deterministic.
 *
 * Ordered rule cascade, first match wins; the order encodes specificity:
 *
 *   1. amplicon marker (strategy or text)     → Amplicon / 16S / ITS, high
 *   2. transcriptome strategy or RNA markers  → RNA-seq, high
 *   3. shotgun strategy or metagenome markers → WGS, high
 *   4. PCR / rRNA selection                   → Amplicon / 16S / ITS, medium
 *   5. otherwise                              → Unknown, low
 *
 * The rationale lists the markers behind the decision, `where:marker`.
 */

import type { ClassificationResult } from "../types/index.js";
import { normalizeText } from "./text.js";

export interface AssayInput {
  /** Structured run-info fields (LibraryStrategy, LibrarySource, LibrarySelection, ...) */
  readonly fields: Readonly<Record<string, string>>;
  readonly title: string;
  /** Auxiliary attributes (e.g. sample attributes) folded into the text blob */
  readonly attributes?: Readonly<Record<string, string>>;
}

const RNA_STRATEGIES = ["rna-seq", "transcriptome"];
const SHOTGUN_STRATEGIES = ["wgs", "metagenomic"];

/** ITS is matched case-sensitively on the raw text: lowercase "its" is an English word. */
const ITS_RE = /\bITS[12]?\b/;

interface Signals {
  strategy: string;
  selection: string;
  /** Normalized title + attributes + strategy/source/selection */
  blob: string;
  /** Same content, original case */
  rawBlob: string;
}

function collectSignals(input: AssayInput): Signals {
  const attrs = Object.entries(input.attributes ?? {})
    .map(([key, value]) => `${key}:${value}`)
    .join(" ");
  const strategy = input.fields["LibraryStrategy"] ?? "";
  const source = input.fields["LibrarySource"] ?? "";
  const selection = input.fields["LibrarySelection"] ?? "";
  const rawBlob = [input.title, attrs, strategy, source, selection].join(" | ");
  return {
    strategy: normalizeText(strategy),
    selection: normalizeText(selection),
    blob: normalizeText(rawBlob),
    rawBlob,
  };
}

/**
 * Marker gene specialization shared by rules 1 and 4.
 */
function markerGene(signals: Signals): { tag: "16S" | "ITS"; marker: string } | null {
  if (signals.blob.includes("16s")) {
    return { tag: "16S", marker: "text:16s" };
  }
  if (ITS_RE.test(signals.rawBlob)) {
    return { tag: "ITS", marker: "text:ITS" };
  }
  if (signals.blob.includes("internal transcribed spacer")) {
    return { tag: "ITS", marker: "text:internal transcribed spacer" };
  }
  return null;
}

function targeted(
  signals: Signals,
  firstMarker: string,
  firstTag: string,
  confidence: "high" | "medium"
): ClassificationResult {
  const gene = markerGene(signals);
  if (gene) {
    return {
      assayClass: gene.tag,
      tags: [firstTag, gene.tag],
      confidence,
      rationale: [firstMarker, gene.marker],
    };
  }
  return { assayClass: "Amplicon", tags: [firstTag], confidence, rationale: [firstMarker] };
}

export function classifyAssay(input: AssayInput): ClassificationResult {
  const signals = collectSignals(input);
  const { strategy, selection, blob } = signals;

  if (strategy.includes("amplicon")) {
    return targeted(signals, "strategy:amplicon", "amplicon", "high");
  }
  if (blob.includes("amplicon")) {
    return targeted(signals, "text:amplicon", "amplicon", "high");
  }

  const rnaMarker = RNA_STRATEGIES.includes(strategy)
    ? `strategy:${strategy}`
    : blob.includes("rna-seq")
      ? "text:rna-seq"
      : blob.includes("metatranscriptom")
        ? "text:metatranscriptom"
        : null;
  if (rnaMarker) {
    return { assayClass: "RNA-seq", tags: ["RNA"], confidence: "high", rationale: [rnaMarker] };
  }

  const shotgunMarker = SHOTGUN_STRATEGIES.includes(strategy)
    ? `strategy:${strategy}`
    : (["shotgun", "wgs", "metagenom"].find((m) => blob.includes(m)) ?? null);
  if (shotgunMarker) {
    return {
      assayClass: "WGS",
      tags: ["shotgun"],
      confidence: "high",
      rationale: [shotgunMarker.startsWith("strategy:") ? shotgunMarker : `text:${shotgunMarker}`],
    };
  }

  if (selection.includes("pcr")) {
    return targeted(signals, "selection:pcr", "targeted", "medium");
  }
  if (selection.includes("rrna")) {
    return targeted(signals, "selection:rrna", "targeted", "medium");
  }

  return { assayClass: "Unknown", tags: [], confidence: "low", rationale: [] };
}
