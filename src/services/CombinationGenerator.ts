import type { ICandidate } from '../models';

/**
 * Cross every base string with every TLD, base-major.
 * All TLDs for the first base come before any TLD of the second base.
 * Inputs are taken verbatim: no trimming, lowercasing or deduplication.
 * @param bases - Base strings in caller order
 * @param tlds - TLDs without a leading dot, in caller order
 * @returns |bases| x |tlds| candidates, empty when either input is empty
 */
export function generateDomainCombinations(
  bases: readonly string[],
  tlds: readonly string[]
): ICandidate[] {
  return bases.flatMap(base =>
    tlds.map(tld => ({ domain: `${base}.${tld}`, base, tld }))
  );
}
