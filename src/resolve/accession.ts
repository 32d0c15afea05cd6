/**
 * Canonical project accessions: `PRJ` + archive code (NA, EB, DB) + digits.
 */

import type { CanonicalProjectId } from "../types/index.js";

const ACCESSION_SOURCE = "PRJ(?:NA|EB|DB)\\d+";

/** Whole-string form, applied after normalization */
const EXACT_RE = new RegExp(`^${ACCESSION_SOURCE}$`);

/** Search form, word-bounded, case-insensitive */
const SEARCH_RE = new RegExp(`\\b${ACCESSION_SOURCE}\\b`, "i");

/**
 * Uppercase, trim and validate. Returns null for anything that is not a
 * well-formed accession.
 */
export function normalizeAccession(value: string | null | undefined): CanonicalProjectId | null {
  const candidate = (value ?? "").trim().toUpperCase();
  return EXACT_RE.test(candidate) ? candidate : null;
}

/**
 * First accession found in `text`, normalized; null when none.
 */
export function findAccession(text: string | null | undefined): CanonicalProjectId | null {
  if (!text) {
    return null;
  }
  const match = SEARCH_RE.exec(text);
  return match ? normalizeAccession(match[0]) : null;
}

/**
 * First accession found across `texts`, scanned in order.
 */
export function findFirstAccession(texts: Iterable<string>): CanonicalProjectId | null {
  for (const text of texts) {
    const found = findAccession(text);
    if (found) {
      return found;
    }
  }
  return null;
}
