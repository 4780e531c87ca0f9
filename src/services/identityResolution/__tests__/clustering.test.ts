import { describe, expect, test } from 'vitest';
import { shuffled } from '../../../__tests__/helpers';
import {
  UnionFind,
  clusterIdentities,
  countClusters,
  groupClusters,
  sameCluster,
} from '../clustering';
import type { DuplicateDecision } from '../types';

describe('UnionFind', () => {
  test('starts with every identity alone', () => {
    const sets = new UnionFind(3);
    expect(sets.size).toBe(3);
    expect(sets.toPartition().assignments).toEqual([0, 1, 2]);
  });

  test('reports whether a union merged two sets', () => {
    const sets = new UnionFind(3);
    expect(sets.union(2, 1)).toBe(true);
    expect(sets.union(1, 2)).toBe(false);
  });

  test('roots every set at its smallest id', () => {
    const sets = new UnionFind(5);
    sets.union(4, 3);
    sets.union(3, 1);
    expect(sets.find(4)).toBe(1);
    expect(sets.toPartition().assignments).toEqual([0, 1, 2, 1, 1]);
  });
});

describe('clusterIdentities', () => {
  test('closes duplicates transitively', () => {
    const partition = clusterIdentities(5, [
      { i: 3, j: 4, isDuplicate: true },
      { i: 1, j: 4, isDuplicate: true },
    ]);

    expect(partition.assignments).toEqual([0, 1, 2, 1, 1]);
    expect(sameCluster(partition, 1, 3)).toBe(true);
    expect(sameCluster(partition, 0, 2)).toBe(false);
  });

  test('ignores non-duplicates and self pairs', () => {
    const partition = clusterIdentities(3, [
      { i: 0, j: 1, isDuplicate: false },
      { i: 2, j: 2, isDuplicate: true },
    ]);

    expect(partition.assignments).toEqual([0, 1, 2]);
  });

  test('is independent of decision order', () => {
    const decisions: DuplicateDecision[] = [
      { i: 0, j: 5, isDuplicate: true },
      { i: 5, j: 2, isDuplicate: true },
      { i: 6, j: 3, isDuplicate: true },
      { i: 1, j: 4, isDuplicate: false },
      { i: 7, j: 6, isDuplicate: true },
    ];
    const expected = clusterIdentities(8, decisions).assignments;

    for (const seed of [1, 2, 3, 4]) {
      expect(clusterIdentities(8, shuffled(decisions, seed)).assignments).toEqual(expected);
    }
    expect(expected).toEqual([0, 1, 0, 3, 4, 0, 3, 3]);
  });

  test('handles an empty identity set', () => {
    expect(clusterIdentities(0, []).assignments).toEqual([]);
  });
});

describe('groupClusters', () => {
  test('lists clusters by id with ascending members', () => {
    const partition = clusterIdentities(5, [
      { i: 3, j: 4, isDuplicate: true },
      { i: 1, j: 4, isDuplicate: true },
    ]);

    expect(groupClusters(partition)).toEqual([
      { clusterId: 0, members: [0] },
      { clusterId: 1, members: [1, 3, 4] },
      { clusterId: 2, members: [2] },
    ]);
    expect(countClusters(partition)).toBe(3);
  });
});
