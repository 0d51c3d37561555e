export type AgeStats = {
  count: number;
  mean: number;
  median: number;
  min: number;
  max: number;
};

/** Summary of a non-empty list of day counts; mean and median rounded to 0.1. */
export function ageStats(days: readonly number[]): AgeStats {
  const xs = [...days].sort((a, b) => a - b);
  const n = xs.length;
  const mid = Math.floor(n / 2);
  const median = n % 2 === 1 ? xs[mid] : (xs[mid - 1] + xs[mid]) / 2;

  return {
    count: n,
    mean: round1(xs.reduce((a, b) => a + b, 0) / n),
    median: round1(median),
    min: xs[0],
    max: xs[n - 1],
  };
}

function round1(x: number): number {
  return Math.round(x * 10) / 10;
}
