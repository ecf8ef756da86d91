/**
 * PageRank sampling — random surfer estimate of the stationary distribution.
 *
 * A single surfer walks the transition matrix for a fixed number of steps.
 * Every node moved to gets its visit count incremented, so after the walk
 *
 *   rank(j) = visits(j) / numSteps
 *
 * is an empirical estimate of the chain's stationary probability of j.
 * The estimate is noisy; `markovMixing` computes the same quantity exactly.
 */

import { type RandomSource } from './random.js';
import type { RankVector, TransitionMatrix } from './types.js';

export interface WalkOptions {
  /** Node the walk starts on. Default 0. */
  startNode?: number;
  /** Source of uniform [0, 1) draws. Default Math.random. */
  random?: RandomSource;
}

/**
 * Pick the surfer's next node from `page`'s row.
 *
 * Inverse-CDF sampling by linear scan: the first column whose cumulative
 * probability reaches the draw wins. If rounding leaves the row sum short of
 * the draw, the last column is taken.
 */
export function makeOneMove(matrix: TransitionMatrix, page: number, random: RandomSource): number {
  const row = matrix[page];
  const r = random();
  let psum = 0;

  for (let j = 0; j < row.length; j++) {
    psum += row[j];
    if (psum >= r) return j;
  }

  return row.length - 1;
}

/**
 * Walk `numSteps` steps and return how many times each node was moved to.
 * The starting node is not counted unless the walk returns to it.
 *
 * @returns Visit tally, summing to exactly numSteps.
 */
export function randomSurferVisits(
  matrix: TransitionMatrix,
  numSteps: number,
  options: WalkOptions = {},
): number[] {
  const n = matrix.length;
  const start = options.startNode ?? 0;
  const random = options.random ?? Math.random;
  checkSteps(n, numSteps);
  checkStartNode(n, start);

  const visits = new Array<number>(n).fill(0);
  let page = start;

  for (let t = 0; t < numSteps; t++) {
    page = makeOneMove(matrix, page, random);
    visits[page]++;
  }

  return visits;
}

/**
 * Estimate node ranks by simulating one surfer for `numSteps` steps.
 * With zero steps the surfer never leaves the start node, so all the mass
 * sits there.
 */
export function randomSurfer(
  matrix: TransitionMatrix,
  numSteps: number,
  options: WalkOptions = {},
): RankVector {
  const visits = randomSurferVisits(matrix, numSteps, options);

  if (numSteps === 0) {
    const rank = new Array<number>(matrix.length).fill(0);
    rank[options.startNode ?? 0] = 1;
    return rank;
  }

  return visits.map(v => v / numSteps);
}

export function checkSteps(n: number, numSteps: number): void {
  if (n === 0) {
    throw new RangeError('Transition matrix is empty');
  }
  if (!Number.isInteger(numSteps) || numSteps < 0) {
    throw new RangeError(`Number of steps must be a non-negative integer, got ${numSteps}`);
  }
}

export function checkStartNode(n: number, startNode: number): void {
  if (!Number.isInteger(startNode) || startNode < 0 || startNode >= n) {
    throw new RangeError(`Start node must be in [0, ${n}), got ${startNode}`);
  }
}
