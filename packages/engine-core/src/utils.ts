/** count / total, or 0 when total is 0. */
export function rate(count: number, total: number): number {
  return total > 0 ? count / total : 0;
}

export function countMoves<T>(items: readonly T[], value: T): number {
  let n = 0;
  for (const item of items) {
    if (item === value) n++;
  }
  return n;
}
