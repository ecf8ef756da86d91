/**
 * Markov mixing tests — exact power iteration of a distribution.
 */

import { markovMixing } from '../src/markov.js';
import { computeTransition } from '../src/transition.js';
import { buildGraph } from '../src/graph_load.js';
import { createSeededRandom } from '../src/random.js';
import { sum } from './test-utils.js';

const CYCLE3 = buildGraph(3, [[0, 1], [1, 2], [2, 0]]);
const T3 = computeTransition(CYCLE3.counts, CYCLE3.outDegree);

describe('markovMixing', () => {
  test('zero steps returns the initial distribution', () => {
    expect(markovMixing(T3, 0)).toEqual([1, 0, 0]);
    expect(markovMixing(T3, 0, { startNode: 2 })).toEqual([0, 0, 1]);
  });

  test('one step from node 0 is row 0 of the matrix', () => {
    const rank = markovMixing(T3, 1);
    expect(rank).toEqual([...T3[0]]);
    expect(rank.map(r => r.toFixed(3))).toEqual(['0.033', '0.933', '0.033']);
  });

  test('one step from another start node is that node\'s row', () => {
    expect(markovMixing(T3, 1, { startNode: 1 })).toEqual([...T3[1]]);
  });

  test('3-cycle converges to uniform', () => {
    const rank = markovMixing(T3, 500);
    for (const r of rank) {
      expect(r).toBeCloseTo(1 / 3, 9);
    }
  });

  test('output is a distribution for every step count', () => {
    const random = createSeededRandom(2024);
    const n = 6;
    const links: Array<[number, number]> = [];
    for (let u = 0; u < n; u++) {
      for (let k = 0; k < 3; k++) links.push([u, Math.floor(random() * n)]);
    }
    const { counts, outDegree } = buildGraph(n, links);
    const T = computeTransition(counts, outDegree);

    for (const steps of [0, 1, 2, 5, 20, 100]) {
      const rank = markovMixing(T, steps);
      expect(rank).toHaveLength(n);
      expect(Math.abs(sum(rank) - 1)).toBeLessThan(1e-9);
      for (const r of rank) expect(r).toBeGreaterThanOrEqual(0);
    }
  });

  test('stationary distribution is a fixed point', () => {
    const { counts, outDegree } = buildGraph(4, [[0, 1], [0, 2], [1, 2], [2, 0], [2, 0], [3, 2]]);
    const T = computeTransition(counts, outDegree);

    const stationary = markovMixing(T, 300);
    const onceMore = markovMixing(T, 1, { initial: stationary });
    for (let i = 0; i < 4; i++) {
      expect(onceMore[i]).toBeCloseTo(stationary[i], 12);
    }

    // Node 3 has no inbound links, so it only gets teleport mass
    expect(stationary[3]).toBeCloseTo(0.1 / 4, 12);
  });

  test('is deterministic', () => {
    expect(markovMixing(T3, 37)).toEqual(markovMixing(T3, 37));
  });

  test('explicit initial distribution must match the node count', () => {
    expect(() => markovMixing(T3, 1, { initial: [0.5, 0.5] })).toThrow('Initial distribution has 2 entries, expected 3');
  });

  test('explicit initial distribution must be a distribution', () => {
    expect(() => markovMixing(T3, 3, { initial: [2, -1, NaN] })).toThrow(RangeError);
    expect(() => markovMixing(T3, 3, { initial: [2, -1, NaN] }))
      .toThrow('Initial probability of node 1 must be a finite non-negative number, got -1');
    expect(() => markovMixing(T3, 3, { initial: [0.5, 0.5, NaN] }))
      .toThrow('Initial probability of node 2 must be a finite non-negative number, got NaN');
    expect(() => markovMixing(T3, 3, { initial: [0, Infinity, 0] })).toThrow(RangeError);
    expect(() => markovMixing(T3, 3, { initial: [2, 0, 0] })).toThrow('Initial distribution must sum to 1, got 2');
    expect(() => markovMixing(T3, 3, { initial: [0, 0, 0] })).toThrow('Initial distribution must sum to 1, got 0');
  });

  test('start node is ignored when an initial distribution is given', () => {
    expect(markovMixing(T3, 0, { startNode: 7, initial: [0, 1, 0] })).toEqual([0, 1, 0]);
    expect(markovMixing(T3, 1, { startNode: -1, initial: [1, 0, 0] })).toEqual(markovMixing(T3, 1));
  });

  test('rejects bad arguments', () => {
    expect(() => markovMixing(T3, -1)).toThrow(RangeError);
    expect(() => markovMixing(T3, 1, { startNode: -1 })).toThrow(RangeError);
  });
});
