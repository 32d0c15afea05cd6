/**
 * NCBI E-utilities implementation of the catalog boundary.
 *
 * Raw records are SRA run sets (numeric uids). Every HTTP call passes
 * through the CallGate, so it is paced after successes and retried with
 * backoff on transient failures or unparsable payloads.
 */

import type { SourceCredentials } from "../config/index.js";
import type { ProjectDetails, RawRecord, SampleDetails } from "../types/index.js";
import { findFirstAccession, normalizeAccession } from "../resolve/accession.js";
import { PermanentSourceError } from "./errors.js";
import type { HttpTransport, QueryParams } from "./http.js";
import type { CallGate } from "./retry.js";
import { parseRunInfo } from "./runinfo.js";
import type {
  LinkTarget,
  SearchPage,
  SearchWindow,
  SourceClient,
} from "./types.js";
import {
  attrOf,
  child,
  children,
  descendants,
  flattenText,
  parseXml,
  pathText,
  textOf,
  type XmlNode,
} from "./xml.js";

export function recordUrl(rawId: string): string {
  return `https://www.ncbi.nlm.nih.gov/sra/?term=${encodeURIComponent(rawId)}`;
}

export function projectUrl(accession: string): string {
  return `https://www.ncbi.nlm.nih.gov/bioproject/${encodeURIComponent(accession)}`;
}

export function sampleUrl(accession: string): string {
  return `https://www.ncbi.nlm.nih.gov/biosample/${encodeURIComponent(accession)}`;
}

/** YYYY-MM-DD → YYYY/MM/DD, the date form the search endpoint expects */
function toEutilsDate(date: string): string {
  return date.replace(/-/g, "/");
}

// ---------------------------------------------------------------------------
// Payload parsers (pure; exported for tests)
// ---------------------------------------------------------------------------

export function parseSearchResult(root: XmlNode): SearchPage {
  const result = child(root, "eSearchResult");
  const ids = descendants(child(result, "IdList"), "Id").map(textOf).filter(Boolean);
  const total = Number.parseInt(textOf(child(result, "Count")), 10);
  return { ids, total: Number.isNaN(total) ? ids.length : total };
}

export interface RecordSummary {
  readonly uid: string;
  readonly title: string;
  readonly embeddedAccession: string | null;
  readonly items: Readonly<Record<string, string>>;
}

const EXP_TITLE_RE = /<Title>([^<]*)<\/Title>/;

/**
 * Version-1 summary documents (`DocSum` with named `Item`s). The run-set
 * title usually sits inside the embedded `ExpXml` item.
 */
export function parseRecordSummaries(root: XmlNode): RecordSummary[] {
  const out: RecordSummary[] = [];
  for (const doc of descendants(root, "DocSum")) {
    const uid = textOf(child(doc, "Id"));
    if (!uid) {
      continue;
    }
    const items: Record<string, string> = {};
    for (const item of children(doc, "Item")) {
      const name = attrOf(item, "Name");
      if (name) {
        items[name] = textOf(item);
      }
    }
    const expTitle = EXP_TITLE_RE.exec(items["ExpXml"] ?? "")?.[1] ?? "";
    out.push({
      uid,
      title: (items["Title"] || expTitle).trim(),
      embeddedAccession: findFirstAccession(Object.values(items)),
      items,
    });
  }
  return out;
}

export function parseLinkedIds(root: XmlNode): string[] {
  const ids: string[] = [];
  for (const linkSetDb of descendants(root, "LinkSetDb")) {
    for (const link of children(linkSetDb, "Link")) {
      const id = textOf(child(link, "Id"));
      if (id && !ids.includes(id)) {
        ids.push(id);
      }
    }
  }
  return ids;
}

/**
 * Project summaries come in a flat `DocumentSummary` layout or the legacy
 * `DocSum`/`Item` layout. Returns null when neither carries an accession.
 */
export function parseProjectSummary(root: XmlNode, uid: string): ProjectDetails | null {
  const doc = descendants(root, "DocumentSummary")[0];
  if (doc !== undefined && child(doc, "Project_Acc") !== undefined) {
    const accession = normalizeAccession(pathText(doc, "Project_Acc"));
    if (!accession) {
      return null;
    }
    const center =
      pathText(doc, "Submitter_Organization") ||
      children(child(doc, "Submitter_Organization_List"), "string").map(textOf).find(Boolean) ||
      "";
    return {
      accession,
      uid,
      title: pathText(doc, "Project_Title"),
      description: pathText(doc, "Project_Description"),
      organism: pathText(doc, "Organism_Name"),
      dataType: pathText(doc, "Project_Data_Type"),
      submissionDate: pathText(doc, "Registration_Date"),
      lastUpdate: "",
      centerName: center,
      url: projectUrl(accession),
    };
  }

  const docsum = descendants(root, "DocSum")[0];
  if (docsum === undefined) {
    return null;
  }
  const items: Record<string, string> = {};
  for (const item of children(docsum, "Item")) {
    const name = attrOf(item, "Name");
    if (name) {
      items[name] = textOf(item);
    }
  }
  const pick = (...keys: string[]): string => keys.map((k) => items[k] ?? "").find(Boolean) ?? "";
  const accession = normalizeAccession(pick("Project_Acc", "Accession"));
  if (!accession) {
    return null;
  }
  return {
    accession,
    uid,
    title: pick("Project_Title", "Title"),
    description: pick("Project_Description", "Description"),
    organism: pick("Organism_Name", "Organism"),
    dataType: pick("Project_Data_Type", "DataType"),
    submissionDate: pick("Submission_Date", "CreateDate"),
    lastUpdate: pick("Last_Update", "UpdateDate"),
    centerName: pick("Center_Name", "Center", "Submitter"),
    url: projectUrl(accession),
  };
}

export function parseSampleDetails(root: XmlNode, accession: string): SampleDetails | null {
  const sample = descendants(root, "BioSample")[0];
  if (sample === undefined) {
    return null;
  }
  const attributes: Record<string, string> = {};
  for (const attr of descendants(sample, "Attribute")) {
    const key = attrOf(attr, "attribute_name") || attrOf(attr, "harmonized_name");
    const value = textOf(attr);
    if (key && value) {
      attributes[key] = value;
    }
  }
  const organism = descendants(sample, "OrganismName").map(textOf).find(Boolean) ?? "";
  return {
    accession,
    title: descendants(sample, "Title").map(textOf).find(Boolean) ?? "",
    organism,
    attributes,
    url: sampleUrl(accession),
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface EutilsClientOptions {
  transport: HttpTransport;
  gate: CallGate;
  credentials: SourceCredentials;
  /** Cap on run-info rows read per record (0 = no cap) */
  runInfoMaxRows?: number;
}

export class EutilsClient implements SourceClient {
  readonly name = "ncbi-sra";
  private readonly transport: HttpTransport;
  private readonly gate: CallGate;
  private readonly credentials: SourceCredentials;
  private readonly runInfoMaxRows: number;

  constructor(options: EutilsClientOptions) {
    this.transport = options.transport;
    this.gate = options.gate;
    this.credentials = options.credentials;
    this.runInfoMaxRows = options.runInfoMaxRows ?? 200_000;
  }

  async search(query: string, window: SearchWindow, limit: number): Promise<SearchPage> {
    const params: Record<string, string> = {
      db: "sra",
      term: query,
      retmode: "xml",
      retmax: String(limit),
    };
    switch (window.kind) {
      case "recent":
        params["reldate"] = String(window.days);
        params["datetype"] = "edat";
        params["sort"] = "date";
        break;
      case "day":
        params["mindate"] = toEutilsDate(window.date);
        params["maxdate"] = toEutilsDate(window.date);
        params["datetype"] = "edat";
        break;
      case "page":
        params["retstart"] = String(window.start);
        if (window.sort) params["sort"] = window.sort;
        break;
    }
    const root = await this.getXml("esearch.fcgi", params);
    return parseSearchResult(root);
  }

  async fetchDetail(rawId: string): Promise<RawRecord> {
    const summaryRoot = await this.getXml("esummary.fcgi", { db: "sra", id: rawId, retmode: "xml" });
    const summary = parseRecordSummaries(summaryRoot).find((s) => s.uid === rawId);
    if (!summary) {
      throw new PermanentSourceError(`No summary document for record ${rawId}`);
    }

    const runInfoText = await this.getText("efetch.fcgi", {
      db: "sra",
      id: rawId,
      rettype: "runinfo",
      retmode: "text",
    });
    const rows = parseRunInfo(runInfoText, this.runInfoMaxRows);

    return {
      id: rawId,
      title: summary.title,
      fields: rows[0] ?? {},
      ...(summary.embeddedAccession ? { embeddedAccession: summary.embeddedAccession } : {}),
      runAccessions: rows.map((row) => row["Run"] ?? "").filter(Boolean),
    };
  }

  async fetchLinked(rawId: string, target: LinkTarget): Promise<string[]> {
    const root = await this.getXml("elink.fcgi", {
      dbfrom: "sra",
      db: target,
      id: rawId,
      retmode: "xml",
    });
    return parseLinkedIds(root);
  }

  async fetchSummaryText(target: LinkTarget, secondaryId: string): Promise<string> {
    const root = await this.getXml("esummary.fcgi", { db: target, id: secondaryId, retmode: "xml" });
    return flattenText(root);
  }

  async fetchFullText(rawId: string): Promise<string> {
    return this.getText("efetch.fcgi", { db: "sra", id: rawId, retmode: "xml" });
  }

  async fetchSampleDetails(accession: string): Promise<SampleDetails | null> {
    const root = await this.getXml("efetch.fcgi", { db: "biosample", id: accession, retmode: "xml" });
    return parseSampleDetails(root, accession);
  }

  async fetchProjectDetails(accession: string): Promise<ProjectDetails | null> {
    const found = await this.getXml("esearch.fcgi", {
      db: "bioproject",
      term: `${accession}[Accession]`,
      retmode: "xml",
      retmax: "5",
    });
    const uid = parseSearchResult(found).ids[0];
    if (!uid) {
      return null;
    }
    const root = await this.getXml("esummary.fcgi", { db: "bioproject", id: uid, retmode: "xml" });
    return parseProjectSummary(root, uid);
  }

  private withCredentials(params: QueryParams): QueryParams {
    const { apiKey, tool, email } = this.credentials;
    return {
      ...params,
      ...(apiKey ? { api_key: apiKey } : {}),
      ...(tool ? { tool } : {}),
      ...(email ? { email } : {}),
    };
  }

  private getText(endpoint: string, params: QueryParams): Promise<string> {
    const url = this.credentials.baseUrl + endpoint;
    return this.gate.run(`GET ${endpoint}`, () =>
      this.transport.getText(url, this.withCredentials(params))
    );
  }

  /** Fetch and parse inside one gated call, so parse failures are retried too. */
  private getXml(endpoint: string, params: QueryParams): Promise<XmlNode> {
    const url = this.credentials.baseUrl + endpoint;
    return this.gate.run(`GET ${endpoint}`, async () => {
      const text = await this.transport.getText(url, this.withCredentials(params));
      return parseXml(text, url);
    });
  }
}
