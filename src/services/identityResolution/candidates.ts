/**
 * Candidate Pair Generation
 *
 * Enumerates the pairs worth scoring: every unordered pair inside each
 * blocking bucket, visited in sorted bucket order and ascending (i, j)
 * order, so a `maxPairs` cut always lands on the same pairs.
 */

import type {
  BlockingIndex,
  CandidatePair,
  CandidatePairBatch,
  IdentityId,
  NormalizedIdentity,
  ScoredPair,
} from './types';
import type { PairScorer } from './scoring';

function* pairsInBucket(members: readonly IdentityId[]): Generator<CandidatePair> {
  for (let x = 0; x < members.length; x++) {
    for (let y = x + 1; y < members.length; y++) {
      const i = members[x];
      const j = members[y];
      if (i !== j) yield i < j ? [i, j] : [j, i];
    }
  }
}

/**
 * Generate at most `maxPairs` distinct pairs from a blocking index.
 * `truncated` is set when at least one further distinct pair was left out,
 * and always for a zero budget.
 */
export function generateCandidatePairs(
  index: BlockingIndex,
  maxPairs: number
): CandidatePairBatch {
  const limit = Math.max(0, Math.floor(maxPairs));
  const seen = new Set<string>();
  const pairs: CandidatePair[] = [];

  for (const members of index.values()) {
    for (const pair of pairsInBucket(members)) {
      const key = `${pair[0]}:${pair[1]}`;
      if (seen.has(key)) continue;

      if (pairs.length >= limit) {
        return { pairs, emitted: pairs.length, truncated: true };
      }

      seen.add(key);
      pairs.push(pair);
    }
  }

  return { pairs, emitted: pairs.length, truncated: limit === 0 };
}

/**
 * Score candidate pairs with any heuristic.
 */
export function scoreCandidatePairs(
  pairs: readonly CandidatePair[],
  identities: readonly NormalizedIdentity[],
  scorer: PairScorer
): ScoredPair[] {
  return pairs.map(([i, j]) => ({
    i,
    j,
    ...scorer.score(identities[i], identities[j]),
  }));
}
