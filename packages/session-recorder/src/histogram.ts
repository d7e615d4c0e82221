export interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  p50: number;
  p95: number;
  p99: number;
  mean: number;
}

// Half to even at three decimals. The only doubles that sit exactly on a
// half are odd multiples of 1/16; everything else rounds by `toFixed`.
export function round3(value: number): number {
  if (Number.isInteger(value * 16) && !Number.isInteger(value * 8)) {
    const lower = Math.floor(value * 1000);
    return (lower % 2 === 0 ? lower : lower + 1) / 1000;
  }
  return Number(value.toFixed(3));
}

/** Linear interpolation between order statistics at rank `(n - 1) * q`. */
export function percentile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return 0;
  if (sorted.length === 1) return sorted[0];
  const position = (sorted.length - 1) * q;
  const lo = Math.floor(position);
  const hi = Math.min(lo + 1, sorted.length - 1);
  const fraction = position - lo;
  return sorted[lo] + (sorted[hi] - sorted[lo]) * fraction;
}

export function histogramSummary(samples: readonly number[]): HistogramSummary {
  if (samples.length === 0) {
    return { count: 0, min: 0, max: 0, p50: 0, p95: 0, p99: 0, mean: 0 };
  }
  const sorted = [...samples].sort((a, b) => a - b);
  const total = sorted.reduce((sum, value) => sum + value, 0);
  return {
    count: sorted.length,
    min: round3(sorted[0]),
    max: round3(sorted[sorted.length - 1]),
    p50: round3(percentile(sorted, 0.5)),
    p95: round3(percentile(sorted, 0.95)),
    p99: round3(percentile(sorted, 0.99)),
    mean: round3(total / sorted.length),
  };
}
