/** n×n matrix; entry (i, j) is the number of links from node i to node j. */
export type EdgeCounts = ReadonlyArray<ReadonlyArray<number>>;

export type OutDegree = ReadonlyArray<number>;

/** Row-stochastic n×n matrix. Row i is the next-node distribution from i. */
export type TransitionMatrix = ReadonlyArray<ReadonlyArray<number>>;

/** One value per node, summing to 1. */
export type RankVector = number[];

export interface Graph {
  counts: EdgeCounts;
  outDegree: OutDegree;
}

/** What to do with a node that has no outbound links. */
export type DanglingPolicy = 'reject' | 'self-loop' | 'teleport';

export const DANGLING_POLICIES: readonly DanglingPolicy[] = ['reject', 'self-loop', 'teleport'];

export type RankMode = 'random_surfer' | 'markov_mixing';

export function isDanglingPolicy(value: unknown): value is DanglingPolicy {
  return DANGLING_POLICIES.some(p => p === value);
}
