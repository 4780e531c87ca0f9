/**
 * Analysis Context
 *
 * Everything a heuristic run needs, constructed up front and passed
 * explicitly. A context is read-only: each run clusters into its own
 * union-find, so one context can back any number of heuristics.
 */

import { logger } from '../../utils/logger';
import { buildBlockingIndex, getBlockingStats } from './blocking';
import { generateCandidatePairs, scoreCandidatePairs } from './candidates';
import { clusterIdentities, groupClusters } from './clustering';
import { summarizeScore, type PairScorer } from './scoring';
import type {
  BlockingIndex,
  CandidatePairBatch,
  ClusterId,
  DedupConfig,
  HeuristicKind,
  IdentityId,
  IdentityIndex,
  Partition,
  RawIdentity,
  ScoredPair,
} from './types';

export interface AnalysisContext {
  readonly index: IdentityIndex;
  readonly config: DedupConfig;
  readonly blocking: BlockingIndex;
  readonly candidates: CandidatePairBatch;
}

export interface IdentityRef extends RawIdentity {
  id: IdentityId;
}

export interface DuplicatePairRow extends ScoredPair {
  left: IdentityRef;
  right: IdentityRef;
}

export interface ClusterRow {
  clusterId: ClusterId;
  primaryName: string;
  primaryEmail: string;
  commitCount: number;
  members: Array<IdentityRef & { commitCount: number }>;
}

export interface Coverage {
  candidatePairs: number;
  truncated: boolean;
  comparisonsWithoutBlocking: number;
}

export interface HeuristicResult {
  heuristic: HeuristicKind;
  duplicatePairs: DuplicatePairRow[];
  partition: Partition;
  clusters: ClusterRow[];
  coverage: Coverage;
}

/**
 * Build the blocking index and candidate pairs for one run.
 * `config` is expected to have passed parseDedupConfig.
 */
export function createAnalysisContext(index: IdentityIndex, config: DedupConfig): AnalysisContext {
  const blocking = buildBlockingIndex(index.normalized, config.blocking);
  const candidates = generateCandidatePairs(blocking, config.maxPairs);

  logger.debug(
    {
      strategy: config.blocking,
      ...getBlockingStats(blocking, index.size),
      candidatePairs: candidates.emitted,
      truncated: candidates.truncated,
    },
    'Identity resolution: Blocking index built'
  );

  if (candidates.truncated) {
    logger.warn(
      { maxPairs: config.maxPairs },
      'Identity resolution: Pair budget reached, coverage is partial'
    );
  }

  return {
    index,
    config,
    blocking,
    candidates,
  };
}

function identityRef(index: IdentityIndex, id: IdentityId): IdentityRef {
  const { name, email } = index.identities[id];
  return { id, name, email };
}

/**
 * Pick the display identity of a cluster: most commits, then longest name.
 */
function selectPrimary(members: ClusterRow['members']): ClusterRow['members'][number] {
  return members.reduce((best, m) => {
    if (m.commitCount !== best.commitCount) return m.commitCount > best.commitCount ? m : best;
    return m.name.length > best.name.length ? m : best;
  });
}

function toClusterRows(index: IdentityIndex, partition: Partition): ClusterRow[] {
  return groupClusters(partition).map(({ clusterId, members }) => {
    const rows = members.map((id) => ({
      ...identityRef(index, id),
      commitCount: index.stats[id].commitCount,
    }));
    const primary = selectPrimary(rows);

    return {
      clusterId,
      primaryName: primary.name,
      primaryEmail: primary.email,
      commitCount: rows.reduce((sum, m) => sum + m.commitCount, 0),
      members: rows,
    };
  });
}

/**
 * Score the context's candidate pairs with one heuristic and cluster the duplicates.
 */
export function runHeuristic(context: AnalysisContext, scorer: PairScorer): HeuristicResult {
  const { index, candidates } = context;

  const scored = scoreCandidatePairs(candidates.pairs, index.normalized, scorer);
  const duplicatePairs: DuplicatePairRow[] = [];

  for (const pair of scored) {
    if (!pair.isDuplicate) continue;

    duplicatePairs.push({
      ...pair,
      left: identityRef(index, pair.i),
      right: identityRef(index, pair.j),
    });

    logger.trace(
      {
        left: index.identities[pair.i],
        right: index.identities[pair.j],
        decision: summarizeScore(scorer.kind, pair),
      },
      'Identity resolution: Duplicate pair'
    );
  }

  const partition = clusterIdentities(index.size, scored);
  const clusters = toClusterRows(index, partition);

  logger.info(
    {
      heuristic: scorer.kind,
      identities: index.size,
      scoredPairs: scored.length,
      duplicatePairs: duplicatePairs.length,
      clusters: clusters.length,
    },
    'Identity resolution: Heuristic complete'
  );

  return {
    heuristic: scorer.kind,
    duplicatePairs,
    partition,
    clusters,
    coverage: {
      candidatePairs: candidates.emitted,
      truncated: candidates.truncated,
      comparisonsWithoutBlocking: (index.size * (index.size - 1)) / 2,
    },
  };
}
