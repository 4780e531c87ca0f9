import { normalizeIdentity } from '../../services/identityResolution/normalize';
import type {
  CommitRecord,
  NormalizedIdentity,
  RawIdentity,
} from '../../services/identityResolution/types';

let commitCounter = 0;

export function resetCommitCounter() {
  commitCounter = 0;
}

export function identity(name: string, email: string): NormalizedIdentity {
  return normalizeIdentity({ name, email });
}

interface CommitInsert {
  commitId?: string;
  timestamp?: Date | string;
}

export function createCommit(
  author: RawIdentity,
  overrides: CommitInsert = {}
): CommitRecord {
  const sequence = ++commitCounter;
  const timestamp = overrides.timestamp ?? new Date(Date.UTC(2020, 0, 1, 0, sequence));

  return {
    commitId: overrides.commitId ?? `commit-${sequence.toString().padStart(4, '0')}`,
    identity: { ...author },
    timestamp: typeof timestamp === 'string' ? new Date(timestamp) : timestamp,
  };
}

/**
 * Deterministic Fisher-Yates shuffle (mulberry32), so "any order" tests are reproducible.
 */
export function shuffled<T>(items: readonly T[], seed: number): T[] {
  let state = seed >>> 0;
  const random = () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
