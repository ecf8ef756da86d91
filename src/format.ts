import type { RankVector } from './types.js';

/** Ranks as space-separated 3-decimal values, newline-terminated. */
export function formatRanks(ranks: RankVector): string {
  return ranks.map(r => r.toFixed(3)).join(' ') + '\n';
}
