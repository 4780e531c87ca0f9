/**
 * Baseline Heuristic (Bird et al., MSR 2006)
 *
 * Rule-ordered binary decision. The first rule that fires wins:
 * 1. email       - identical normalized email (local part and domain)
 * 2. email-local - identical local part once separators and digits are
 *                  stripped, and at least one shared full name token
 * 3. name-set    - identical name token sets with a token of 3+ letters
 */

import { compactEmailLocal } from './normalize';
import type { BirdRule, NormalizedIdentity } from './types';

function sameEmail(a: NormalizedIdentity, b: NormalizedIdentity): boolean {
  return (
    a.emailLocal.length > 0 && a.emailLocal === b.emailLocal && a.emailDomain === b.emailDomain
  );
}

function sameCompactLocal(a: NormalizedIdentity, b: NormalizedIdentity): boolean {
  const compactA = compactEmailLocal(a.emailLocal);
  return compactA.length > 0 && compactA === compactEmailLocal(b.emailLocal);
}

function shareFullToken(a: readonly string[], b: readonly string[]): boolean {
  const tokensB = new Set(b.filter((token) => token.length > 1));
  return a.some((token) => token.length > 1 && tokensB.has(token));
}

function sameTokenSet(a: readonly string[], b: readonly string[]): boolean {
  const setA = new Set(a);
  const setB = new Set(b);
  if (setA.size === 0 || setA.size !== setB.size) return false;
  for (const token of setA) {
    if (!setB.has(token)) return false;
  }
  return true;
}

/**
 * Name the rule that matches a pair, or null when none does.
 */
export function explainBird(a: NormalizedIdentity, b: NormalizedIdentity): BirdRule | null {
  if (sameEmail(a, b)) {
    return 'email';
  }

  if (sameCompactLocal(a, b) && shareFullToken(a.nameTokens, b.nameTokens)) {
    return 'email-local';
  }

  // Initials alone ("j d") are too weak to match on
  if (sameTokenSet(a.nameTokens, b.nameTokens) && a.nameTokens.some((token) => token.length >= 3)) {
    return 'name-set';
  }

  return null;
}

export function scoreBird(a: NormalizedIdentity, b: NormalizedIdentity): boolean {
  return explainBird(a, b) !== null;
}
