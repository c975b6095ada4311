/**
 * @file src/lib/aggregator.ts
 * @description Groups attributed articles into per-country buckets. Anything at or below the
 *              identification threshold lands in the `Unidentified` bucket.
 */

import type { AttributionInput, AttributionResult } from './attribution';

export const IDENTIFICATION_THRESHOLD = 0.1;
export const UNIDENTIFIED = 'Unidentified';

export interface AttributedEntry<T> {
  input: AttributionInput;
  result: AttributionResult;
  payload: T;
}

export type CountryBuckets<T> = Record<string, T[]>;

export const isIdentified = (result: AttributionResult): boolean =>
  result.country !== null && result.confidence > IDENTIFICATION_THRESHOLD;

/**
 * Buckets keep arrival order. Country keys appear in first-arrival order and `Unidentified`, when
 * present, comes last.
 */
export const aggregateByCountry = <T>(entries: Iterable<AttributedEntry<T>>): CountryBuckets<T> => {
  const buckets = new Map<string, T[]>();
  const unidentified: T[] = [];

  for (const { result, payload } of entries) {
    if (result.country !== null && isIdentified(result)) {
      const bucket = buckets.get(result.country);
      if (bucket) {
        bucket.push(payload);
      } else {
        buckets.set(result.country, [payload]);
      }
    } else {
      unidentified.push(payload);
    }
  }

  const output: CountryBuckets<T> = Object.fromEntries(buckets);
  if (unidentified.length) {
    output[UNIDENTIFIED] = unidentified;
  }
  return output;
};
