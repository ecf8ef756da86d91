/**
 * Transition model — turns raw link counts into a row-stochastic matrix.
 *
 * A surfer on node i follows one of i's outbound links with probability
 * `damping` (picking a link proportionally to its multiplicity), and
 * otherwise teleports to any node uniformly:
 *
 *   T[i][j] = damping * counts[i][j] / outDegree[i] + teleport / n
 *
 * where teleport = 1 - damping (exactly 0.1 for the default damping 0.9).
 *
 * With damping < 1 every entry is strictly positive, so the chain is
 * irreducible and aperiodic and has a unique stationary distribution.
 */

import { InvariantViolation } from './errors.js';
import type { DanglingPolicy, EdgeCounts, OutDegree, TransitionMatrix } from './types.js';

export const DEFAULT_DAMPING = 0.9;
export const DEFAULT_TELEPORT = 0.1;

export interface TransitionOptions {
  /** Probability of following a link rather than teleporting. Default 0.9. */
  damping?: number;
  /** Handling of nodes with out-degree 0. Default 'reject'. */
  dangling?: DanglingPolicy;
}

/**
 * Build the transition matrix for a graph.
 *
 * Throws InvariantViolation if the counts and out-degrees are not a
 * consistent description of the same graph, or if a dangling node is met
 * under the 'reject' policy.
 */
export function computeTransition(
  counts: EdgeCounts,
  outDegree: OutDegree,
  options: TransitionOptions = {},
): TransitionMatrix {
  const damping = options.damping ?? DEFAULT_DAMPING;
  const dangling = options.dangling ?? 'reject';
  const n = outDegree.length;

  if (!(damping >= 0 && damping <= 1)) {
    throw new RangeError(`Damping must be in [0, 1], got ${damping}`);
  }
  if (n === 0) {
    throw new InvariantViolation('Graph has no nodes');
  }
  if (counts.length !== n) {
    throw new InvariantViolation(`Count matrix has ${counts.length} rows but there are ${n} out-degrees`);
  }

  // 1 - 0.9 is not 0.1 in binary; the default split uses the literal
  const teleport = (damping === DEFAULT_DAMPING ? DEFAULT_TELEPORT : 1 - damping) / n;
  const matrix: number[][] = new Array(n);

  for (let i = 0; i < n; i++) {
    const row = counts[i];
    checkRow(row, outDegree[i], i, n);

    const out = new Array<number>(n);

    if (outDegree[i] === 0) {
      if (dangling === 'reject') {
        throw new InvariantViolation(`Node ${i} has out-degree 0; cannot compute its transition probabilities`, i);
      }
      // self-loop: a single link i -> i; teleport: link mass spread over all nodes
      for (let j = 0; j < n; j++) {
        const follow = dangling === 'self-loop' ? (i === j ? 1 : 0) : 1 / n;
        out[j] = damping * follow + teleport;
      }
    } else {
      for (let j = 0; j < n; j++) {
        out[j] = damping * row[j] / outDegree[i] + teleport;
      }
    }

    matrix[i] = out;
  }

  return matrix;
}

function checkRow(row: ReadonlyArray<number>, degree: number, i: number, n: number): void {
  if (row.length !== n) {
    throw new InvariantViolation(`Row ${i} of the count matrix has ${row.length} entries, expected ${n}`, i);
  }
  if (!Number.isInteger(degree) || degree < 0) {
    throw new InvariantViolation(`Out-degree of node ${i} must be a non-negative integer, got ${degree}`, i);
  }

  let sum = 0;
  for (let j = 0; j < n; j++) {
    const c = row[j];
    if (!Number.isInteger(c) || c < 0) {
      throw new InvariantViolation(`Link count from node ${i} to node ${j} must be a non-negative integer, got ${c}`, i);
    }
    sum += c;
  }

  if (sum !== degree) {
    throw new InvariantViolation(`Node ${i} has out-degree ${degree} but ${sum} outbound links`, i);
  }
}
