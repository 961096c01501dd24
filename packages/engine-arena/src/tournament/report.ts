import type { TournamentSummary } from './types.js';

const RULE = '='.repeat(72);
const DIVIDER = '-'.repeat(72);

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/** Fixed-width per-opponent comparison table. */
export function formatComparisonTable(summary: TournamentSummary): string {
  const lines = [
    RULE,
    `${'Opponent'.padEnd(20)} | ${'Our Score'.padStart(9)} | ${'Their Score'.padStart(11)} | ${'Our Coop'.padStart(8)} | ${'Result'.padStart(6)}`,
    DIVIDER,
  ];

  for (const r of summary.results) {
    lines.push(
      `${r.opponent.padEnd(20)} | ${String(r.our_score).padStart(9)} | ${String(r.opponent_score).padStart(11)} | ${percent(r.our_coop).padStart(8)} | ${(r.won ? 'WIN' : 'LOSS').padStart(6)}`,
    );
  }

  lines.push(DIVIDER);
  lines.push(
    `Total score: ${summary.total_score} | Average: ${summary.average_score.toFixed(2)} | Wins: ${summary.wins}/${summary.total_matches} (${percent(summary.win_rate)})`,
  );
  lines.push(RULE);
  return lines.join('\n');
}
