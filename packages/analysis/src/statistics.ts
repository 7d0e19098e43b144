/**
 * Descriptive statistics over per-trial measurements
 */

/** Statistical summary */
export interface Statistics {
  count: number;
  sum: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  /** Population standard deviation */
  stdDev: number;
  p90: number;
  p95: number;
  p99: number;
}

const EMPTY: Statistics = {
  count: 0, sum: 0, min: 0, max: 0, mean: 0, median: 0, stdDev: 0,
  p90: 0, p95: 0, p99: 0,
};

export function calculateStatistics(values: readonly number[]): Statistics {
  if (values.length === 0) {
    return { ...EMPTY };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const count = values.length;
  const total = sum(values);
  const mean = total / count;

  const variance = values.reduce((acc, v) => acc + Math.pow(v - mean, 2), 0) / count;
  const stdDev = Math.sqrt(variance);

  return {
    count,
    sum: total,
    min: sorted[0],
    max: sorted[count - 1],
    mean,
    median: median(sorted),
    stdDev,
    p90: percentile(sorted, 90),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

/**
 * Middle value of sorted input; mean of the two middle values for an even count.
 * Nearest-rank p50 would report the lower middle value instead.
 */
export function median(sorted: readonly number[]): number {
  if (sorted.length === 0) return 0;
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid];
}

/**
 * Nearest-rank percentile of sorted input.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, idx)];
}

export function sum(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}
