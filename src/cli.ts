/**
 * Command-line driver.
 *
 * Usage:
 *   markov-rank <-r or -m> <file name> <number of steps>
 *
 *   -r   random surfer simulation
 *   -m   Markov mixing (power iteration)
 *
 * Prints one rank per node, 3 decimals, space-separated.
 */

import { type RankConfig, loadConfig, resolveGraphPath } from './config.js';
import { RankError, UsageError } from './errors.js';
import { formatRanks } from './format.js';
import { loadGraph } from './graph_load.js';
import { markovMixing } from './markov.js';
import { randomSurfer } from './pagerank.js';
import { createSeededRandom } from './random.js';
import { computeTransition } from './transition.js';
import type { RankMode } from './types.js';

export const USAGE = 'Usage: markov-rank <-r or -m> <file name> <number of steps>';

const MODE_FLAGS: Record<string, RankMode> = {
  '-r': 'random_surfer',
  '-m': 'markov_mixing',
};

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

interface CliArgs {
  mode: RankMode;
  file: string;
  steps: number;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  if (argv.length !== 3) {
    throw new UsageError(`Expected 3 arguments, got ${argv.length}`);
  }
  const [flag, file, rawSteps] = argv;

  const mode = Object.prototype.hasOwnProperty.call(MODE_FLAGS, flag) ? MODE_FLAGS[flag] : undefined;
  if (mode === undefined) {
    throw new UsageError(`Unknown mode "${flag}"`);
  }
  if (!/^\d+$/.test(rawSteps)) {
    throw new UsageError(`Number of steps must be a non-negative integer, got "${rawSteps}"`);
  }

  return { mode, file, steps: Number(rawSteps) };
}

/**
 * Run the driver with `argv` (program arguments only).
 * @returns Process exit status.
 */
export async function runCli(argv: readonly string[], io: CliIO, config?: RankConfig): Promise<number> {
  try {
    const args = parseArgs(argv);
    const cfg = config ?? loadConfig();

    const { counts, outDegree } = await loadGraph(resolveGraphPath(cfg, args.file));
    const matrix = computeTransition(counts, outDegree, { damping: cfg.damping, dangling: cfg.dangling });

    const ranks = args.mode === 'random_surfer'
      ? randomSurfer(matrix, args.steps, {
          random: cfg.seed === undefined ? undefined : createSeededRandom(cfg.seed),
        })
      : markovMixing(matrix, args.steps);

    io.stdout(formatRanks(ranks));
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n${USAGE}\n`);
      return 1;
    }
    if (error instanceof RankError) {
      io.stderr(`Error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
}
