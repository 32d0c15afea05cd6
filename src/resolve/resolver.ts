/**
 * Entity resolution: raw record → canonical project accession.
 *
 * Tiers run in a fixed order, each only when the previous found nothing:
 *
 *   1. embedded  accession in the record's embedded reference, structured
 *                fields (in field order) or title
 *   2. linked    link service → secondary numeric ids → summary lookup;
 *                cached per secondary id, which many records share
 *   3. fulltext  accession in the full detail document
 *
 * A record with no accession after all three is unresolved. That is a
 * normal outcome, returned with a reason and never thrown. Errors inside
 * tiers 2 and 3 are logged and the chain moves on, so one flaky lookup
 * cannot abort the batch. When nothing is found and a tier errored, the
 * result is `failed` instead: the record may still resolve once upstream
 * recovers, so it must not be marked as seen.
 */

import { z } from "zod";
import type { Logger } from "../logging/index.js";
import type { CacheStore } from "../storage/cache-store.js";
import type { LinkSource, LinkTarget } from "../source/types.js";
import type {
  CanonicalProjectId,
  RawRecord,
  ResolutionResult,
  ResolvedMethod,
} from "../types/index.js";
import { findAccession, findFirstAccession, normalizeAccession } from "./accession.js";

export const LinkCacheEntrySchema = z.object({
  accession: z.string().min(1),
});
export type LinkCacheEntry = z.infer<typeof LinkCacheEntrySchema>;

export interface EntityResolverOptions {
  source: LinkSource;
  /** secondary id → accession, tombstoned when the summary has none */
  links: CacheStore<LinkCacheEntry>;
  logger: Logger;
  linkTarget?: LinkTarget;
}

interface TierOutcome {
  projectId: CanonicalProjectId | null;
  cacheHit: boolean;
  /** A lookup in this tier threw */
  errored: boolean;
  note: string;
}

export class EntityResolver {
  private readonly source: LinkSource;
  private readonly links: CacheStore<LinkCacheEntry>;
  private readonly logger: Logger;
  private readonly linkTarget: LinkTarget;

  constructor(options: EntityResolverOptions) {
    this.source = options.source;
    this.links = options.links;
    this.logger = options.logger;
    this.linkTarget = options.linkTarget ?? "bioproject";
  }

  async resolve(record: RawRecord): Promise<ResolutionResult> {
    const embedded = this.embedded(record);
    if (embedded) {
      return this.resolved(record, embedded, "embedded", false);
    }

    const linked = await this.linked(record);
    if (linked.projectId) {
      return this.resolved(record, linked.projectId, "linked", linked.cacheHit);
    }

    const fulltext = await this.fulltext(record);
    if (fulltext.projectId) {
      return this.resolved(record, fulltext.projectId, "fulltext", false);
    }

    const reason = `no accession in fields or title; linked: ${linked.note}; fulltext: ${fulltext.note}`;
    if (linked.errored || fulltext.errored) {
      this.logger.warn("Record resolution failed", { rawId: record.id, reason });
      return { status: "failed", method: "none", cacheHit: linked.cacheHit, reason };
    }
    this.logger.info("Record unresolved", { rawId: record.id, reason });
    return { status: "unresolved", method: "none", cacheHit: linked.cacheHit, reason };
  }

  private resolved(
    record: RawRecord,
    projectId: CanonicalProjectId,
    method: ResolvedMethod,
    cacheHit: boolean
  ): ResolutionResult {
    this.logger.debug("Record resolved", { rawId: record.id, projectId, method, cacheHit });
    return { status: "resolved", projectId, method, cacheHit };
  }

  private embedded(record: RawRecord): CanonicalProjectId | null {
    const candidates: string[] = [];
    if (record.embeddedAccession) {
      candidates.push(record.embeddedAccession);
    }
    candidates.push(...Object.values(record.fields), record.title);
    return findFirstAccession(candidates);
  }

  private async linked(record: RawRecord): Promise<TierOutcome> {
    let secondaryIds: string[];
    try {
      secondaryIds = await this.source.fetchLinked(record.id, this.linkTarget);
    } catch (err) {
      this.logger.warn("Link lookup failed", { rawId: record.id, error: err });
      return { projectId: null, cacheHit: false, errored: true, note: "link lookup failed" };
    }
    if (secondaryIds.length === 0) {
      return { projectId: null, cacheHit: false, errored: false, note: "no linked ids" };
    }

    let cacheHit = false;
    let failures = 0;
    for (const secondaryId of secondaryIds) {
      const cached = this.links.lookup(secondaryId);
      if (cached.kind === "hit") {
        const accession = normalizeAccession(cached.value.accession);
        if (accession) {
          return { projectId: accession, cacheHit: true, errored: false, note: "cached" };
        }
        continue;
      }
      if (cached.kind === "tombstone") {
        cacheHit = true;
        continue;
      }

      let text: string;
      try {
        text = await this.source.fetchSummaryText(this.linkTarget, secondaryId);
      } catch (err) {
        failures++;
        this.logger.warn("Summary lookup failed", { rawId: record.id, secondaryId, error: err });
        continue;
      }
      const accession = findAccession(text);
      if (accession) {
        this.links.set(secondaryId, { accession });
        return { projectId: accession, cacheHit: false, errored: false, note: "found" };
      }
      this.links.markNotFound(secondaryId);
    }

    const note =
      failures > 0
        ? `${failures} of ${secondaryIds.length} summary lookup(s) failed`
        : `no accession in ${secondaryIds.length} linked summar${secondaryIds.length === 1 ? "y" : "ies"}`;
    return { projectId: null, cacheHit, errored: failures > 0, note };
  }

  private async fulltext(record: RawRecord): Promise<TierOutcome> {
    try {
      const text = await this.source.fetchFullText(record.id);
      const accession = findAccession(text);
      return {
        projectId: accession,
        cacheHit: false,
        errored: false,
        note: accession ? "found" : "no accession in document",
      };
    } catch (err) {
      this.logger.warn("Full-text lookup failed", { rawId: record.id, error: err });
      return { projectId: null, cacheHit: false, errored: true, note: "detail fetch failed" };
    }
  }
}
