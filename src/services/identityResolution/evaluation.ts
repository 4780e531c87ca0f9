/**
 * Partition Evaluation
 *
 * Pairwise precision/recall over the "same cluster" relation, computed from
 * cluster-overlap counts instead of walking all n² identity pairs.
 */

import { PartitionMismatchError } from '../../utils/errors';
import { countClusters } from './clustering';
import type {
  ClusterId,
  EvaluationResult,
  IdentityId,
  PairSetComparison,
  Partition,
  ScoredPair,
} from './types';

function choose2(k: number): number {
  return (k * (k - 1)) / 2;
}

function increment<K>(counts: Map<K, number>, key: K): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function sumPairs<K>(counts: Map<K, number>): number {
  let total = 0;
  for (const count of counts.values()) total += choose2(count);
  return total;
}

/**
 * Compare a candidate partition against a reference (labels or another heuristic).
 * With no positive pairs on a side, the matching ratio is defined as 1.
 */
export function evaluatePartition(candidate: Partition, reference: Partition): EvaluationResult {
  const n = candidate.assignments.length;
  if (reference.assignments.length !== n) {
    throw new PartitionMismatchError(n, reference.assignments.length);
  }

  const candidateSizes = new Map<ClusterId, number>();
  const referenceSizes = new Map<ClusterId, number>();
  const overlaps = new Map<string, number>();

  for (let id = 0; id < n; id++) {
    const c = candidate.assignments[id];
    const r = reference.assignments[id];
    increment(candidateSizes, c);
    increment(referenceSizes, r);
    increment(overlaps, `${c}:${r}`);
  }

  const candidatePairs = sumPairs(candidateSizes);
  const referencePairs = sumPairs(referenceSizes);
  const truePositives = sumPairs(overlaps);
  const falsePositives = candidatePairs - truePositives;
  const falseNegatives = referencePairs - truePositives;

  const precision = candidatePairs === 0 ? 1 : truePositives / candidatePairs;
  const recall = referencePairs === 0 ? 1 : truePositives / referencePairs;
  const f1 = precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);

  const totalPairs = choose2(n);
  const randIndex =
    totalPairs === 0 ? 1 : (totalPairs - falsePositives - falseNegatives) / totalPairs;

  return {
    identityCount: n,
    candidateClusters: countClusters(candidate),
    referenceClusters: countClusters(reference),
    truePositives,
    falsePositives,
    falseNegatives,
    precision,
    recall,
    f1,
    randIndex,
  };
}

/**
 * Build a reference partition from external labels, one per identity id.
 * A null or empty label keeps the identity on its own.
 */
export function partitionFromLabels(labels: readonly (string | null | undefined)[]): Partition {
  const firstByLabel = new Map<string, IdentityId>();

  const assignments = labels.map((label, id) => {
    if (!label) return id;
    const first = firstByLabel.get(label);
    if (first === undefined) {
      firstByLabel.set(label, id);
      return id;
    }
    return first;
  });

  return Object.freeze({ assignments: Object.freeze(assignments) });
}

/**
 * Overlap of the duplicate pairs found by two heuristics.
 */
export function compareDuplicatePairs(
  left: readonly ScoredPair[],
  right: readonly ScoredPair[]
): PairSetComparison {
  const keyOf = (pair: ScoredPair) => `${Math.min(pair.i, pair.j)}:${Math.max(pair.i, pair.j)}`;
  const leftKeys = new Set(left.filter((p) => p.isDuplicate).map(keyOf));
  const rightKeys = new Set(right.filter((p) => p.isDuplicate).map(keyOf));

  let common = 0;
  for (const key of leftKeys) {
    if (rightKeys.has(key)) common++;
  }

  return {
    common,
    leftOnly: leftKeys.size - common,
    rightOnly: rightKeys.size - common,
  };
}
