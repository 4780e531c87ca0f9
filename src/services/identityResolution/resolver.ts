/**
 * Identity Resolution Orchestrator
 *
 * Main entry point. Runs both heuristics over one commit batch and
 * compares their partitions.
 *
 * Flow:
 * 1. Validate config, cap the commit batch at maxCommits
 * 2. Build the identity index (distinct identities, normalized once)
 * 3. Run baseline and improved heuristics on independent contexts
 * 4. Evaluate improved against baseline
 */

import { logger } from '../../utils/logger';
import { parseDedupConfig, type DedupConfigInput } from './config';
import { createAnalysisContext, runHeuristic, type HeuristicResult } from './context';
import { compareDuplicatePairs, evaluatePartition, partitionFromLabels } from './evaluation';
import { buildIdentityIndex } from './identityIndex';
import { createBaselineScorer, createImprovedScorer } from './scoring';
import type {
  CommitRecord,
  DedupConfig,
  EvaluationResult,
  IdentityIndex,
  PairSetComparison,
  Partition,
  RawIdentity,
} from './types';

export interface AnalysisReport {
  config: DedupConfig;
  commitsAnalyzed: number;
  index: IdentityIndex;
  baseline: HeuristicResult;
  improved: HeuristicResult;
  metrics: {
    /** Improved partition scored against the baseline partition. */
    improvedVsBaseline: EvaluationResult;
    /** Overlap of duplicate pairs: left = baseline, right = improved. */
    duplicatePairs: PairSetComparison;
  };
}

/**
 * Keep the earliest `maxCommits` commits (ties broken by commit id).
 */
export function selectCommits(
  commits: readonly CommitRecord[],
  maxCommits?: number
): readonly CommitRecord[] {
  if (maxCommits === undefined || commits.length <= maxCommits) return commits;

  return [...commits]
    .sort((a, b) => {
      const byTime = a.timestamp.getTime() - b.timestamp.getTime();
      if (byTime !== 0) return byTime;
      return a.commitId < b.commitId ? -1 : a.commitId > b.commitId ? 1 : 0;
    })
    .slice(0, maxCommits);
}

export function analyzeCommits(
  commits: readonly CommitRecord[],
  options: DedupConfigInput = {}
): AnalysisReport {
  const config = parseDedupConfig(options);
  const selected = selectCommits(commits, config.maxCommits);

  logger.info(
    {
      commits: commits.length,
      selected: selected.length,
      threshold: config.threshold,
      maxPairs: config.maxPairs,
      blocking: config.blocking,
    },
    'Identity resolution: Starting analysis'
  );

  const index = buildIdentityIndex(selected);

  const baseline = runHeuristic(createAnalysisContext(index, config), createBaselineScorer());
  const improved = runHeuristic(
    createAnalysisContext(index, config),
    createImprovedScorer({ threshold: config.threshold, weights: config.weights })
  );

  const metrics = {
    improvedVsBaseline: evaluatePartition(improved.partition, baseline.partition),
    duplicatePairs: compareDuplicatePairs(baseline.duplicatePairs, improved.duplicatePairs),
  };

  logger.info(
    {
      identities: index.size,
      baselineClusters: baseline.clusters.length,
      improvedClusters: improved.clusters.length,
      ...metrics.duplicatePairs,
      f1: metrics.improvedVsBaseline.f1,
    },
    'Identity resolution: Complete'
  );

  return {
    config,
    commitsAnalyzed: selected.length,
    index,
    baseline,
    improved,
    metrics,
  };
}

/**
 * Score a partition against externally labelled ground truth.
 * Identities the labeller does not know stay singletons in the reference.
 */
export function evaluateAgainstLabels(
  index: IdentityIndex,
  partition: Partition,
  labelOf: (identity: RawIdentity) => string | null | undefined
): EvaluationResult {
  const reference = partitionFromLabels(index.identities.map(labelOf));
  return evaluatePartition(partition, reference);
}
