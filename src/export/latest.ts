/**
 * Single-file "latest additions" view under a hard byte ceiling.
 *
 * The view is one JSON document, so it cannot be split into parts.
 * Instead the largest prefix of the (newest-first) item list whose
 * serialized document fits the budget is found by binary search.
 */

export interface LatestDocument<T> {
  generated_utc: string;
  count: number;
  items: T[];
}

export function serializeLatest<T>(generatedUtc: string, items: readonly T[]): string {
  const doc: LatestDocument<T> = { generated_utc: generatedUtc, count: items.length, items: [...items] };
  return JSON.stringify(doc, null, 2) + "\n";
}

/**
 * Largest n such that the document holding `items.slice(0, n)` is at
 * most `maxBytes`. Zero when not even the empty document fits.
 */
export function largestFittingPrefix<T>(
  items: readonly T[],
  maxBytes: number,
  generatedUtc: string
): number {
  const fits = (n: number): boolean =>
    Buffer.byteLength(serializeLatest(generatedUtc, items.slice(0, n)), "utf-8") <= maxBytes;

  let lo = 0;
  let hi = items.length;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (fits(mid)) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return lo;
}

export function buildLatest<T>(
  items: readonly T[],
  maxBytes: number,
  generatedUtc: string
): { text: string; count: number } {
  const count = largestFittingPrefix(items, maxBytes, generatedUtc);
  return { text: serializeLatest(generatedUtc, items.slice(0, count)), count };
}
