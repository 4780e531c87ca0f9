/**
 * Union-Find Clustering
 *
 * Merges every pair judged a duplicate into one set. Closure is transitive:
 * if (a, b) and (b, c) are duplicates, a, b and c share a cluster even when
 * (a, c) was never scored.
 *
 * The root of a set is always its smallest id, so the partition does not
 * depend on the order in which decisions arrive.
 */

import type { Cluster, ClusterId, DuplicateDecision, IdentityId, Partition } from './types';

export class UnionFind {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  get size(): number {
    return this.parent.length;
  }

  find(id: IdentityId): IdentityId {
    let root = id;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }

    // Path compression
    let node = id;
    while (this.parent[node] !== root) {
      const next = this.parent[node];
      this.parent[node] = root;
      node = next;
    }

    return root;
  }

  /**
   * Returns true when two previously separate sets were merged.
   */
  union(a: IdentityId, b: IdentityId): boolean {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return false;

    if (rootA < rootB) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootA] = rootB;
    }
    return true;
  }

  toPartition(): Partition {
    return Object.freeze({
      assignments: Object.freeze(this.parent.map((_, id) => this.find(id))),
    });
  }
}

/**
 * Cluster `identityCount` identities from a stream of duplicate decisions.
 */
export function clusterIdentities(
  identityCount: number,
  decisions: Iterable<DuplicateDecision>
): Partition {
  const sets = new UnionFind(identityCount);

  for (const decision of decisions) {
    if (decision.isDuplicate && decision.i !== decision.j) {
      sets.union(decision.i, decision.j);
    }
  }

  return sets.toPartition();
}

/**
 * List clusters with ascending members, ordered by cluster id.
 */
export function groupClusters(partition: Partition): Cluster[] {
  const byCluster = new Map<ClusterId, IdentityId[]>();

  partition.assignments.forEach((clusterId, id) => {
    const members = byCluster.get(clusterId) ?? [];
    members.push(id);
    byCluster.set(clusterId, members);
  });

  return [...byCluster.entries()]
    .sort(([a], [b]) => a - b)
    .map(([clusterId, members]) => ({ clusterId, members }));
}

export function countClusters(partition: Partition): number {
  return new Set(partition.assignments).size;
}

export function sameCluster(partition: Partition, a: IdentityId, b: IdentityId): boolean {
  return partition.assignments[a] === partition.assignments[b];
}
