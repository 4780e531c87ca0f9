/**
 * Multi-Signal Scoring for Identity Resolution
 *
 * Combines independent signals, each in [0, 1], into one weighted score:
 * - Name similarity (order-independent edit distance, nicknames folded)
 * - Email local-part similarity (edit distance)
 * - Email domain match
 * - Initials overlap ("J. Doe" vs "Jane Doe")
 *
 * Both heuristics are exposed through the PairScorer contract so pair
 * generation and clustering never need to know which one is in use.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import { explainBird } from './baseline';
import {
  DEFAULT_WEIGHTS,
  type HeuristicKind,
  type NormalizedIdentity,
  type PairScore,
  type SignalBreakdown,
  type SignalWeights,
} from './types';

// ========== String Similarity ==========

/**
 * Normalized Levenshtein similarity [0, 1]. Empty input never matches.
 */
export function levenshteinSimilarity(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  if (a === b) return 1;

  const maxLen = Math.max(a.length, b.length);
  return 1 - levenshteinDistance(a, b) / maxLen;
}

// ========== Signals ==========

/**
 * Name tokens with the first name folded to its formal form, sorted
 * and joined ("Bob Smith" -> "robert smith").
 */
function comparableName(identity: NormalizedIdentity): string {
  const { nameTokens, canonicalFirstName } = identity;
  // A canonical first name implies the first token is a full name token
  const tokens = canonicalFirstName
    ? [canonicalFirstName, ...nameTokens.slice(1)]
    : [...nameTokens];
  return tokens.sort().join(' ');
}

export function scoreNameSimilarity(a: NormalizedIdentity, b: NormalizedIdentity): number {
  return levenshteinSimilarity(comparableName(a), comparableName(b));
}

export function scoreEmailLocalSimilarity(a: NormalizedIdentity, b: NormalizedIdentity): number {
  return levenshteinSimilarity(a.emailLocal, b.emailLocal);
}

export function scoreDomainMatch(a: NormalizedIdentity, b: NormalizedIdentity): number {
  return a.emailDomain.length > 0 && a.emailDomain === b.emailDomain ? 1 : 0;
}

/**
 * Shared initials over the smaller initials set, so an abbreviated
 * name fully contained in a longer one scores 1.
 */
export function scoreInitialsMatch(a: NormalizedIdentity, b: NormalizedIdentity): number {
  const smaller = Math.min(a.initials.size, b.initials.size);
  if (smaller === 0) return 0;

  let shared = 0;
  for (const initial of a.initials) {
    if (b.initials.has(initial)) shared++;
  }
  return shared / smaller;
}

// ========== Combined Scoring ==========

export function computeSignalBreakdown(
  a: NormalizedIdentity,
  b: NormalizedIdentity
): SignalBreakdown {
  return {
    name: scoreNameSimilarity(a, b),
    emailLocal: scoreEmailLocalSimilarity(a, b),
    domain: scoreDomainMatch(a, b),
    initials: scoreInitialsMatch(a, b),
  };
}

export function computeWeightedScore(signals: SignalBreakdown, weights: SignalWeights): number {
  const score =
    signals.name * weights.name +
    signals.emailLocal * weights.emailLocal +
    signals.domain * weights.domain +
    signals.initials * weights.initials;

  return Math.min(1, Math.max(0, score));
}

/**
 * Compute confidence based on signal agreement.
 * High confidence when signals agree, low when they conflict.
 */
export function computeConfidence(signals: SignalBreakdown): number {
  const values = [signals.name, signals.emailLocal, signals.domain, signals.initials];
  const nonZeroValues = values.filter((v) => v > 0);

  if (nonZeroValues.length === 0) return 0;

  const mean = nonZeroValues.reduce((a, b) => a + b, 0) / nonZeroValues.length;
  const variance =
    nonZeroValues.reduce((sum, v) => sum + (v - mean) ** 2, 0) / nonZeroValues.length;

  // Max variance is 0.25 (e.g., [0, 1])
  const normalizedVariance = Math.min(variance / 0.25, 1);
  return 1 - normalizedVariance;
}

export function scoreImproved(
  a: NormalizedIdentity,
  b: NormalizedIdentity,
  weights: SignalWeights = DEFAULT_WEIGHTS
): number {
  return computeWeightedScore(computeSignalBreakdown(a, b), weights);
}

// ========== Scorer Contract ==========

export interface PairScorer {
  readonly kind: HeuristicKind;
  score(a: NormalizedIdentity, b: NormalizedIdentity): PairScore;
}

export function createBaselineScorer(): PairScorer {
  return {
    kind: 'baseline',
    score(a, b) {
      const rule = explainBird(a, b);
      return rule
        ? { score: 1, isDuplicate: true, rule }
        : { score: 0, isDuplicate: false };
    },
  };
}

export function createImprovedScorer(options: {
  threshold: number;
  weights?: SignalWeights;
}): PairScorer {
  const weights = options.weights ?? DEFAULT_WEIGHTS;

  return {
    kind: 'improved',
    score(a, b) {
      const signals = computeSignalBreakdown(a, b);
      const score = computeWeightedScore(signals, weights);
      return {
        score,
        isDuplicate: score >= options.threshold,
        signals,
        confidence: computeConfidence(signals),
      };
    },
  };
}

/**
 * Human-readable summary of a scored pair, for debug logs.
 */
export function summarizeScore(kind: HeuristicKind, result: PairScore): string {
  const verdict = result.isDuplicate ? 'DUPLICATE' : 'DISTINCT';

  if (kind === 'baseline') {
    return `${verdict} (rule=${result.rule ?? 'none'})`;
  }

  const signals = result.signals;
  const signalSummary = signals
    ? [
        `name=${signals.name.toFixed(2)}`,
        `local=${signals.emailLocal.toFixed(2)}`,
        `domain=${signals.domain.toFixed(2)}`,
        `initials=${signals.initials.toFixed(2)}`,
      ].join(', ')
    : 'no signals';

  return `${verdict} (score=${result.score.toFixed(3)}, ${signalSummary})`;
}
