/**
 * graph_load.ts — Read a link graph description into dense link counts.
 *
 * File format:
 *   line 1:  node count n
 *   rest:    whitespace-separated pairs "u v", each a link u -> v,
 *            spread over any number of lines
 *
 * Repeated pairs are kept; each one adds to counts[u][v].
 */

import { promises as fs } from 'fs';
import { FormatError, LoadError } from './errors.js';
import type { Graph } from './types.js';

export type Link = readonly [number, number];

export interface GraphSummary {
  nodeCount: number;
  linkCount: number;
  outDegree: number[];
  inDegree: number[];
  danglingNodes: number[];
}

const INTEGER_RE = /^[+-]?\d+$/;

/** Largest graph held as a dense n×n matrix. */
export const MAX_NODE_COUNT = 5000;

/**
 * Build counts and out-degrees for `nodeCount` nodes from a list of links.
 * Throws FormatError if a link names a node outside [0, nodeCount).
 */
export function buildGraph(nodeCount: number, links: Iterable<Link>): Graph {
  if (!Number.isSafeInteger(nodeCount) || nodeCount <= 0) {
    throw new FormatError(`Node count must be a positive integer, got ${nodeCount}`);
  }
  if (nodeCount > MAX_NODE_COUNT) {
    throw new FormatError(`Node count ${nodeCount} exceeds the limit of ${MAX_NODE_COUNT} nodes`);
  }

  const counts: number[][] = [];
  for (let i = 0; i < nodeCount; i++) {
    counts.push(new Array<number>(nodeCount).fill(0));
  }
  const outDegree = new Array<number>(nodeCount).fill(0);

  for (const [u, v] of links) {
    checkNode(u, nodeCount);
    checkNode(v, nodeCount);
    outDegree[u]++;
    counts[u][v]++;
  }

  return { counts, outDegree };
}

/** Parse the text of a graph file. */
export function parseGraph(text: string): Graph {
  const newline = text.indexOf('\n');
  const header = (newline === -1 ? text : text.slice(0, newline)).trim();
  const body = newline === -1 ? '' : text.slice(newline + 1);

  if (!INTEGER_RE.test(header)) {
    throw new FormatError(`First line must be the node count, got "${header}"`);
  }
  const nodeCount = Number(header);

  const tokens = body.split(/\s+/).filter(t => t !== '');
  if (tokens.length % 2 !== 0) {
    throw new FormatError(`Expected pairs of node ids, got ${tokens.length} tokens`);
  }

  const links: Link[] = [];
  for (let k = 0; k < tokens.length; k += 2) {
    links.push([parseNode(tokens[k]), parseNode(tokens[k + 1])]);
  }

  return buildGraph(nodeCount, links);
}

/**
 * Read and parse a graph file.
 * I/O failures become LoadError (cause attached); bad content is FormatError.
 */
export async function loadGraph(filePath: string): Promise<Graph> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LoadError(`Cannot read graph file ${filePath}: ${reason}`, { cause: error });
  }
  return parseGraph(text);
}

export function describeGraph(graph: Graph): GraphSummary {
  const n = graph.outDegree.length;
  const inDegree = new Array<number>(n).fill(0);
  let linkCount = 0;

  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      inDegree[j] += graph.counts[i][j];
    }
    linkCount += graph.outDegree[i];
  }

  const danglingNodes: number[] = [];
  graph.outDegree.forEach((d, i) => {
    if (d === 0) danglingNodes.push(i);
  });

  return {
    nodeCount: n,
    linkCount,
    outDegree: [...graph.outDegree],
    inDegree,
    danglingNodes,
  };
}

function parseNode(token: string): number {
  if (!INTEGER_RE.test(token)) {
    throw new FormatError(`Node id must be an integer, got "${token}"`);
  }
  return Number(token);
}

function checkNode(id: number, nodeCount: number): void {
  if (!Number.isInteger(id) || id < 0 || id >= nodeCount) {
    throw new FormatError(`Node id ${id} is out of range [0, ${nodeCount})`);
  }
}
