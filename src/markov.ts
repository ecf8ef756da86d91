/**
 * Markov mixing — exact rank via power iteration of a distribution.
 *
 * Starting from a distribution over nodes (by default all mass on node 0),
 * each step applies one transition of the chain to the whole distribution:
 *
 *   next_i = Σ_j rank_j · T[j][i]
 *
 * Because T is row-stochastic the result stays a distribution, and as the
 * number of steps grows it converges to the chain's stationary distribution.
 * No convergence test is made; the caller picks the step count.
 */

import { checkStartNode, checkSteps } from './pagerank.js';
import type { RankVector, TransitionMatrix } from './types.js';

export interface MixingOptions {
  /** Put all initial mass on this node. Default 0. Ignored if `initial` is given. */
  startNode?: number;
  /** Explicit initial distribution: one non-negative entry per node, summing to 1. */
  initial?: ReadonlyArray<number>;
}

/**
 * Run `numSteps` vector-matrix multiplications.
 *
 * Each output entry is accumulated over source nodes in ascending order, so
 * the same matrix and step count always give bit-identical results.
 */
export function markovMixing(
  matrix: TransitionMatrix,
  numSteps: number,
  options: MixingOptions = {},
): RankVector {
  const n = matrix.length;
  checkSteps(n, numSteps);

  let rank = new Float64Array(n);
  if (options.initial !== undefined) {
    checkDistribution(options.initial, n);
    rank.set(options.initial);
  } else {
    const start = options.startNode ?? 0;
    checkStartNode(n, start);
    rank[start] = 1.0;
  }

  let next = new Float64Array(n);

  for (let t = 0; t < numSteps; t++) {
    next.fill(0);

    // Scatter row j into every target; per target the terms still arrive in j order.
    for (let j = 0; j < n; j++) {
      const row = matrix[j];
      const mass = rank[j];
      for (let i = 0; i < n; i++) {
        next[i] += mass * row[i];
      }
    }

    // Swap buffers
    const tmp = rank;
    rank = next;
    next = tmp;
  }

  return Array.from(rank);
}

const DISTRIBUTION_TOLERANCE = 1e-9;

function checkDistribution(initial: ReadonlyArray<number>, n: number): void {
  if (initial.length !== n) {
    throw new RangeError(`Initial distribution has ${initial.length} entries, expected ${n}`);
  }

  let total = 0;
  initial.forEach((p, i) => {
    if (!Number.isFinite(p) || p < 0) {
      throw new RangeError(`Initial probability of node ${i} must be a finite non-negative number, got ${p}`);
    }
    total += p;
  });

  if (Math.abs(total - 1) > DISTRIBUTION_TOLERANCE) {
    throw new RangeError(`Initial distribution must sum to 1, got ${total}`);
  }
}
