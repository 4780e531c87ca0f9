import { beforeEach, describe, expect, test } from 'vitest';
import { createCommit, resetCommitCounter, shuffled } from '../../../__tests__/helpers';
import { buildIdentityIndex } from '../identityIndex';

const JANE = { name: 'Jane Doe', email: 'jane.doe@co.com' };

describe('buildIdentityIndex', () => {
  beforeEach(() => {
    resetCommitCounter();
  });

  test('collapses repeated identities and counts their commits', () => {
    const index = buildIdentityIndex([
      createCommit(JANE, { timestamp: '2021-03-01T00:00:00Z' }),
      createCommit({ name: 'Bob Smith', email: 'bob@home.com' }),
      createCommit(JANE, { timestamp: '2020-06-01T00:00:00Z' }),
    ]);

    expect(index.size).toBe(2);
    expect(index.identities).toEqual([
      { name: 'Bob Smith', email: 'bob@home.com' },
      { name: 'Jane Doe', email: 'jane.doe@co.com' },
    ]);
    expect(index.stats[1]).toEqual({
      commitCount: 2,
      firstCommitAt: new Date('2020-06-01T00:00:00Z'),
      lastCommitAt: new Date('2021-03-01T00:00:00Z'),
    });
    expect(index.stats[0].commitCount).toBe(1);
  });

  test('treats differing case as distinct raw identities', () => {
    const index = buildIdentityIndex([
      createCommit({ name: 'Jane Doe', email: 'Jane.Doe@co.com' }),
      createCommit({ name: 'Jane Doe', email: 'jane.doe@co.com' }),
    ]);

    expect(index.size).toBe(2);
    expect(index.normalized[0].emailLocal).toBe('jane.doe');
    expect(index.normalized[1].emailLocal).toBe('jane.doe');
  });

  test('looks up ids by raw identity', () => {
    const index = buildIdentityIndex([
      createCommit({ name: 'Bob Smith', email: 'bob@home.com' }),
      createCommit({ name: 'Alice Wong', email: 'alice@co.com' }),
    ]);

    expect(index.idOf({ name: 'Alice Wong', email: 'alice@co.com' })).toBe(0);
    expect(index.idOf({ name: 'Bob Smith', email: 'bob@home.com' })).toBe(1);
    expect(index.idOf({ name: 'Carol', email: 'carol@co.com' })).toBeUndefined();
  });

  test('assigns the same ids in any commit order', () => {
    const commits = [
      createCommit({ name: 'Jane Doe', email: 'jdoe@home.org' }),
      createCommit({ name: 'J. Doe', email: 'jane.doe@co.com' }),
      createCommit({ name: 'Alice Wong', email: 'alice@co.com' }),
      createCommit({ name: 'Jane Doe', email: 'jane.doe@co.com' }),
    ];

    const expected = buildIdentityIndex(commits).identities;
    expect(buildIdentityIndex(shuffled(commits, 11)).identities).toEqual(expected);
    expect(buildIdentityIndex([...commits].reverse()).identities).toEqual(expected);
  });

  test('handles an empty commit batch', () => {
    const index = buildIdentityIndex([]);
    expect(index.size).toBe(0);
    expect(index.normalized).toEqual([]);
  });
});
