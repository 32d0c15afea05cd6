/**
 * Shared fixtures for tests: record builders and an in-process source
 * that records every call it receives.
 */

import { PermanentSourceError } from "../source/errors.js";
import type { LinkTarget, SearchPage, SearchWindow, SourceClient } from "../source/types.js";
import type {
  EnrichedRecord,
  ProjectDetails,
  RawRecord,
  SampleDetails,
} from "../types/index.js";

export function makeRawRecord(id: string, overrides: Partial<RawRecord> = {}): RawRecord {
  return {
    id,
    title: `Run set ${id}`,
    fields: {},
    runAccessions: [`SRR${id}`],
    ...overrides,
  };
}

export function makeEnrichedRecord(
  rawId: string,
  projectId: string,
  overrides: Partial<EnrichedRecord> = {}
): EnrichedRecord {
  return {
    rawId,
    title: `Run set ${rawId}`,
    fields: { LibraryStrategy: "WGS" },
    runAccessions: [`SRR${rawId}`],
    projectId,
    resolution: { method: "embedded", cacheHit: false },
    assay: { assayClass: "WGS", tags: ["shotgun"], confidence: "high", rationale: ["strategy:wgs"] },
    geo: { country: "", region: "", city: "", lat: "", lon: "", raw: "", sampleAccession: "" },
    sample: null,
    project: null,
    links: {
      record: `https://example.test/sra/${rawId}`,
      project: `https://example.test/bioproject/${projectId}`,
    },
    provenance: { ingestedUtc: "2024-03-01T00:00:00.000Z", source: "fake", tag: "test", runId: "test-run" },
    ...overrides,
  };
}

export type FakeCall =
  | "search"
  | "fetchDetail"
  | "fetchLinked"
  | "fetchSummaryText"
  | "fetchFullText"
  | "fetchSampleDetails"
  | "fetchProjectDetails";

/**
 * Source backed by maps. Unknown detail ids fail with a permanent error.
 * Keys in `failing` make the matching call throw: a raw id for
 * fetchDetail, `link:<rawId>`, `full:<rawId>`, a secondary id or an
 * accession for the others.
 */
export class FakeSource implements SourceClient {
  readonly name = "fake";
  searchIds: string[] = [];
  readonly details = new Map<string, RawRecord>();
  readonly linked = new Map<string, string[]>();
  readonly summaries = new Map<string, string>();
  readonly fullTexts = new Map<string, string>();
  readonly samples = new Map<string, SampleDetails>();
  readonly projects = new Map<string, ProjectDetails>();
  readonly failing = new Set<string>();
  readonly windows: SearchWindow[] = [];
  private readonly counts = new Map<FakeCall, number>();

  count(call: FakeCall): number {
    return this.counts.get(call) ?? 0;
  }

  get totalCalls(): number {
    let total = 0;
    for (const value of this.counts.values()) total += value;
    return total;
  }

  addRecord(record: RawRecord): void {
    this.details.set(record.id, record);
    if (!this.searchIds.includes(record.id)) {
      this.searchIds.push(record.id);
    }
  }

  private hit(call: FakeCall, key: string): void {
    this.counts.set(call, this.count(call) + 1);
    if (this.failing.has(key)) {
      throw new Error(`${call} failed for ${key}`);
    }
  }

  async search(_query: string, window: SearchWindow, limit: number): Promise<SearchPage> {
    this.hit("search", "search");
    this.windows.push(window);
    const start = window.kind === "page" ? window.start : 0;
    return { ids: this.searchIds.slice(start, start + limit), total: this.searchIds.length };
  }

  async fetchDetail(rawId: string): Promise<RawRecord> {
    this.hit("fetchDetail", rawId);
    const record = this.details.get(rawId);
    if (!record) {
      throw new PermanentSourceError(`No summary document for record ${rawId}`);
    }
    return record;
  }

  async fetchLinked(rawId: string, _target: LinkTarget): Promise<string[]> {
    this.hit("fetchLinked", `link:${rawId}`);
    return this.linked.get(rawId) ?? [];
  }

  async fetchSummaryText(_target: LinkTarget, secondaryId: string): Promise<string> {
    this.hit("fetchSummaryText", secondaryId);
    return this.summaries.get(secondaryId) ?? "";
  }

  async fetchFullText(rawId: string): Promise<string> {
    this.hit("fetchFullText", `full:${rawId}`);
    return this.fullTexts.get(rawId) ?? "";
  }

  async fetchSampleDetails(accession: string): Promise<SampleDetails | null> {
    this.hit("fetchSampleDetails", accession);
    return this.samples.get(accession) ?? null;
  }

  async fetchProjectDetails(accession: string): Promise<ProjectDetails | null> {
    this.hit("fetchProjectDetails", accession);
    return this.projects.get(accession) ?? null;
  }
}
