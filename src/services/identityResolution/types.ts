/**
 * Identity Resolution Types
 *
 * Clusters the raw (name, email) author identities of a commit log
 * into one group per real developer.
 */

// ========== Raw Input ==========

export interface RawIdentity {
  name: string;
  email: string;
}

export interface CommitRecord {
  commitId: string;
  identity: RawIdentity;
  timestamp: Date;
}

// ========== Normalized Identity ==========

export interface NormalizedIdentity {
  nameTokens: readonly string[];
  emailLocal: string;
  emailDomain: string;
  initials: ReadonlySet<string>;
  /** Initial of the first raw name token, kept even when the token itself is dropped. */
  firstInitial: string;
  /** First name token with nicknames folded to their formal form ("bob" -> "robert"). */
  canonicalFirstName: string;
}

// ========== Identity Index ==========

export type IdentityId = number;

export interface IdentityStats {
  commitCount: number;
  firstCommitAt: Date;
  lastCommitAt: Date;
}

export interface IdentityIndex {
  readonly identities: readonly RawIdentity[];
  readonly normalized: readonly NormalizedIdentity[];
  readonly stats: readonly IdentityStats[];
  readonly size: number;
  idOf(identity: RawIdentity): IdentityId | undefined;
}

// ========== Blocking ==========

export type BlockingStrategy = 'domain' | 'initials' | 'both';

export type BucketKey = string;

export type BlockingIndex = ReadonlyMap<BucketKey, readonly IdentityId[]>;

// ========== Signal Weights ==========

export interface SignalWeights {
  name: number;
  emailLocal: number;
  domain: number;
  initials: number;
}

export const DEFAULT_WEIGHTS: SignalWeights = {
  name: 0.15,
  emailLocal: 0.45,
  domain: 0.25,
  initials: 0.15,
};

export type SignalBreakdown = SignalWeights;

// ========== Pairs ==========

export type CandidatePair = readonly [IdentityId, IdentityId];

export interface CandidatePairBatch {
  pairs: CandidatePair[];
  emitted: number;
  truncated: boolean;
}

export type BirdRule = 'email' | 'email-local' | 'name-set';

export type HeuristicKind = 'baseline' | 'improved';

export interface PairScore {
  score: number;
  isDuplicate: boolean;
  rule?: BirdRule;
  signals?: SignalBreakdown;
  confidence?: number;
}

export interface ScoredPair extends PairScore {
  i: IdentityId;
  j: IdentityId;
}

export interface DuplicateDecision {
  i: IdentityId;
  j: IdentityId;
  isDuplicate: boolean;
}

// ========== Partition ==========

export type ClusterId = IdentityId;

export interface Partition {
  /** assignments[id] is the smallest IdentityId of the cluster holding id. */
  readonly assignments: readonly ClusterId[];
}

export interface Cluster {
  clusterId: ClusterId;
  members: IdentityId[];
}

// ========== Evaluation ==========

export interface EvaluationResult {
  identityCount: number;
  candidateClusters: number;
  referenceClusters: number;
  truePositives: number;
  falsePositives: number;
  falseNegatives: number;
  precision: number;
  recall: number;
  f1: number;
  /** Fraction of all identity pairs on which both partitions agree. */
  randIndex: number;
}

export interface PairSetComparison {
  common: number;
  leftOnly: number;
  rightOnly: number;
}

// ========== Config ==========

export interface DedupConfig {
  threshold: number;
  maxPairs: number;
  maxCommits?: number;
  blocking: BlockingStrategy;
  weights: SignalWeights;
}

export const DEFAULT_CONFIG: DedupConfig = {
  threshold: 0.85,
  maxPairs: 1000,
  blocking: 'both',
  weights: DEFAULT_WEIGHTS,
};
