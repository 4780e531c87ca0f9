/**
 * Multi-Key Blocking for Identity Resolution
 *
 * Reduces O(n²) comparisons by only comparing identities that share a key.
 * An identity may sit in several buckets; the union keeps recall high.
 *
 * Keys:
 * 1. Email domain: "domain:example.com"
 * 2. First initial + last name: "name:jdoe" (plus the nickname-folded
 *    initial, so "Bob Smith" and "Robert Smith" meet in "name:rsmith")
 */

import type {
  BlockingIndex,
  BlockingStrategy,
  BucketKey,
  IdentityId,
  NormalizedIdentity,
} from './types';

function domainKeys(identity: NormalizedIdentity): BucketKey[] {
  return identity.emailDomain ? [`domain:${identity.emailDomain}`] : [];
}

function initialsKeys(identity: NormalizedIdentity): BucketKey[] {
  const { nameTokens, firstInitial, canonicalFirstName } = identity;
  const last = nameTokens[nameTokens.length - 1];

  if (!firstInitial || !last || last.length < 2) return [];

  const keys = [`name:${firstInitial}${last}`];
  const canonicalInitial = canonicalFirstName.slice(0, 1);
  if (canonicalInitial && canonicalInitial !== firstInitial) {
    keys.push(`name:${canonicalInitial}${last}`);
  }
  return keys;
}

/**
 * Blocking keys for one identity under the given strategy.
 */
export function getBucketKeys(
  identity: NormalizedIdentity,
  strategy: BlockingStrategy
): BucketKey[] {
  switch (strategy) {
    case 'domain':
      return domainKeys(identity);
    case 'initials':
      return initialsKeys(identity);
    case 'both':
      return [...domainKeys(identity), ...initialsKeys(identity)];
  }
}

/**
 * Build the blocking index. Keys come out sorted and members ascending,
 * so the index only depends on the identity set.
 */
export function buildBlockingIndex(
  identities: readonly NormalizedIdentity[],
  strategy: BlockingStrategy = 'both'
): BlockingIndex {
  const buckets = new Map<BucketKey, Set<IdentityId>>();

  identities.forEach((identity, id) => {
    for (const key of getBucketKeys(identity, strategy)) {
      let bucket = buckets.get(key);
      if (!bucket) {
        bucket = new Set();
        buckets.set(key, bucket);
      }
      bucket.add(id);
    }
  });

  const sortedKeys = [...buckets.keys()].sort();
  return new Map(
    sortedKeys.map((key): [BucketKey, IdentityId[]] => [
      key,
      [...(buckets.get(key) ?? [])].sort((a, b) => a - b),
    ])
  );
}

/**
 * Get blocking statistics for debugging.
 */
export function getBlockingStats(
  index: BlockingIndex,
  identityCount: number
): {
  bucketCount: number;
  largestBucket: number;
  comparisonsWithBlocking: number;
  comparisonsWithoutBlocking: number;
} {
  let largestBucket = 0;
  let comparisonsWithBlocking = 0;

  for (const members of index.values()) {
    largestBucket = Math.max(largestBucket, members.length);
    comparisonsWithBlocking += (members.length * (members.length - 1)) / 2;
  }

  return {
    bucketCount: index.size,
    largestBucket,
    comparisonsWithBlocking,
    comparisonsWithoutBlocking: (identityCount * (identityCount - 1)) / 2,
  };
}
