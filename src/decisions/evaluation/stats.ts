/**
 * Linear-interpolation percentile at rank `(n - 1) * quantile`.
 * `quantile` is a fraction in [0, 1]; an empty list yields 0.
 */
export function computePercentile(values: readonly number[], quantile: number): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const q = Math.min(1, Math.max(0, quantile));
  const rank = q * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  if (lower === upper) {
    return sorted[lower];
  }
  const weight = rank - lower;
  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

export type PercentileSummary = {
  n: number;
  mean: number;
  p50: number;
  p90: number;
  p95: number;
};

export const DEFAULT_QUANTILES = [0.5, 0.9, 0.95] as const;

export function summarizePercentiles(values: readonly number[]): PercentileSummary {
  if (values.length === 0) {
    return { n: 0, mean: 0, p50: 0, p90: 0, p95: 0 };
  }
  const [q50, q90, q95] = DEFAULT_QUANTILES;
  const total = values.reduce((acc, value) => acc + value, 0);
  return {
    n: values.length,
    mean: total / values.length,
    p50: computePercentile(values, q50),
    p90: computePercentile(values, q90),
    p95: computePercentile(values, q95),
  };
}
