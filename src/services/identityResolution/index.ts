/**
 * Identity Resolution Service
 *
 * Clusters the author identities of a commit log into real developers.
 *
 * Key features:
 * - Deterministic normalization of (name, email) pairs
 * - Multi-key blocking (email domain, initial + last name)
 * - Two interchangeable heuristics: Bird baseline and weighted multi-signal
 * - Bounded candidate generation with explicit truncation reporting
 * - Order-independent union-find clustering
 * - Pairwise precision/recall evaluation
 */

// Types
export type {
  RawIdentity,
  CommitRecord,
  NormalizedIdentity,
  IdentityId,
  IdentityIndex,
  IdentityStats,
  BlockingStrategy,
  BlockingIndex,
  BucketKey,
  SignalWeights,
  SignalBreakdown,
  CandidatePair,
  CandidatePairBatch,
  BirdRule,
  HeuristicKind,
  PairScore,
  ScoredPair,
  DuplicateDecision,
  ClusterId,
  Partition,
  Cluster,
  EvaluationResult,
  PairSetComparison,
  DedupConfig,
} from './types';

export { DEFAULT_CONFIG, DEFAULT_WEIGHTS } from './types';

// Main resolver
export {
  analyzeCommits,
  selectCommits,
  evaluateAgainstLabels,
  type AnalysisReport,
} from './resolver';

// Context
export {
  createAnalysisContext,
  runHeuristic,
  type AnalysisContext,
  type HeuristicResult,
  type DuplicatePairRow,
  type ClusterRow,
  type Coverage,
  type IdentityRef,
} from './context';

// Config
export { parseDedupConfig, getDefaultDedupConfig, type DedupConfigInput } from './config';

// Normalization
export {
  normalizeIdentity,
  tokenizeName,
  splitEmail,
  normalizeEmailLocal,
  compactEmailLocal,
  canonicalizeFirstName,
  type EmailParts,
} from './normalize';

export { buildIdentityIndex } from './identityIndex';

// Blocking
export { buildBlockingIndex, getBucketKeys, getBlockingStats } from './blocking';

// Scoring
export { explainBird, scoreBird } from './baseline';
export {
  levenshteinSimilarity,
  scoreNameSimilarity,
  scoreEmailLocalSimilarity,
  scoreDomainMatch,
  scoreInitialsMatch,
  computeSignalBreakdown,
  computeWeightedScore,
  computeConfidence,
  scoreImproved,
  createBaselineScorer,
  createImprovedScorer,
  summarizeScore,
  type PairScorer,
} from './scoring';

// Candidates
export { generateCandidatePairs, scoreCandidatePairs } from './candidates';

// Clustering
export {
  UnionFind,
  clusterIdentities,
  groupClusters,
  countClusters,
  sameCluster,
} from './clustering';

// Evaluation
export { evaluatePartition, partitionFromLabels, compareDuplicatePairs } from './evaluation';
