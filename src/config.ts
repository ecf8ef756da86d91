/**
 * Runtime configuration, read from environment variables.
 *
 *   PAGERANK_DAMPING    link-following probability in [0, 1]   (default 0.9)
 *   PAGERANK_DANGLING   reject | self-loop | teleport          (default reject)
 *   PAGERANK_SEED       integer seed for the random surfer     (default: Math.random)
 *   PAGERANK_GRAPH_DIR  base directory for relative graph paths (default: cwd)
 */

import path from 'path';
import { ConfigError } from './errors.js';
import { DEFAULT_DAMPING } from './transition.js';
import { type DanglingPolicy, DANGLING_POLICIES, isDanglingPolicy } from './types.js';

export interface RankConfig {
  damping: number;
  dangling: DanglingPolicy;
  seed: number | undefined;
  graphDir: string;
}

/**
 * Build the configuration. Keys present in `overrides` win, and the matching
 * variable is never read; an explicit `seed: undefined` means unseeded.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<RankConfig> = {}): RankConfig {
  return {
    damping: overrides.damping ?? parseDamping(env.PAGERANK_DAMPING),
    dangling: overrides.dangling ?? parseDangling(env.PAGERANK_DANGLING),
    seed: 'seed' in overrides ? overrides.seed : parseSeed(env.PAGERANK_SEED),
    graphDir: overrides.graphDir ?? parseGraphDir(env.PAGERANK_GRAPH_DIR),
  };
}

/** Absolute paths pass through; anything else is taken relative to graphDir. */
export function resolveGraphPath(config: RankConfig, filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(config.graphDir, filePath);
}

function parseGraphDir(raw: string | undefined): string {
  return raw ? path.resolve(raw) : process.cwd();
}

function parseDamping(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_DAMPING;
  const value = Number(raw);
  if (!(value >= 0 && value <= 1)) {
    throw new ConfigError(`PAGERANK_DAMPING must be a number in [0, 1], got "${raw}"`);
  }
  return value;
}

function parseDangling(raw: string | undefined): DanglingPolicy {
  if (raw === undefined || raw.trim() === '') return 'reject';
  const value = raw.trim();
  if (!isDanglingPolicy(value)) {
    throw new ConfigError(`PAGERANK_DANGLING must be one of ${DANGLING_POLICIES.join(', ')}, got "${raw}"`);
  }
  return value;
}

function parseSeed(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`PAGERANK_SEED must be an integer, got "${raw}"`);
  }
  return value;
}
