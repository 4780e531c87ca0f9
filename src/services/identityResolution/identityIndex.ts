/**
 * Identity Index
 *
 * Assigns a stable integer id to every distinct raw identity in a commit log.
 * Ids follow (name, email) order, so shuffling the commits never changes them.
 */

import { normalizeIdentity } from './normalize';
import type {
  CommitRecord,
  IdentityId,
  IdentityIndex,
  IdentityStats,
  RawIdentity,
} from './types';

function identityKey(identity: RawIdentity): string {
  return `${identity.name}\u0000${identity.email}`;
}

function compareIdentities(a: RawIdentity, b: RawIdentity): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  if (a.email !== b.email) return a.email < b.email ? -1 : 1;
  return 0;
}

/**
 * Build the identity index for a batch of commits.
 */
export function buildIdentityIndex(commits: readonly CommitRecord[]): IdentityIndex {
  const seen = new Map<string, { identity: RawIdentity; stats: IdentityStats }>();

  for (const commit of commits) {
    const identity: RawIdentity = { name: commit.identity.name, email: commit.identity.email };
    const key = identityKey(identity);
    const entry = seen.get(key);

    if (!entry) {
      seen.set(key, {
        identity,
        stats: {
          commitCount: 1,
          firstCommitAt: commit.timestamp,
          lastCommitAt: commit.timestamp,
        },
      });
      continue;
    }

    entry.stats.commitCount++;
    if (commit.timestamp < entry.stats.firstCommitAt) {
      entry.stats.firstCommitAt = commit.timestamp;
    }
    if (commit.timestamp > entry.stats.lastCommitAt) {
      entry.stats.lastCommitAt = commit.timestamp;
    }
  }

  const entries = [...seen.values()].sort((a, b) => compareIdentities(a.identity, b.identity));

  const identities = entries.map((e) => Object.freeze(e.identity));
  const ids = new Map<string, IdentityId>(
    identities.map((identity, id) => [identityKey(identity), id])
  );

  return Object.freeze({
    identities,
    normalized: identities.map(normalizeIdentity),
    stats: entries.map((e) => Object.freeze(e.stats)),
    size: identities.length,
    idOf: (identity: RawIdentity) => ids.get(identityKey(identity)),
  });
}
