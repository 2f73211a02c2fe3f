/**
 * Plain descriptive statistics. Standard deviation is always the population
 * form (denominator n), including for the risk classification.
 */

export function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return sum(values) / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid];
}

export function populationStd(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const m = mean(values);
  const variance = sum(values.map(v => (v - m) ** 2)) / values.length;
  return Math.sqrt(variance);
}

export function minOf(values: readonly number[]): number {
  return values.reduce((acc, v) => (v < acc ? v : acc), Infinity);
}

export function maxOf(values: readonly number[]): number {
  return values.reduce((acc, v) => (v > acc ? v : acc), -Infinity);
}

export interface Summary {
  count: number;
  mean: number | null;
  median: number | null;
  std: number | null;
  min: number | null;
  max: number | null;
}

export function summarize(values: readonly number[]): Summary {
  if (values.length === 0) {
    return {
      count: 0,
      mean: null,
      median: null,
      std: null,
      min: null,
      max: null,
    };
  }
  return {
    count: values.length,
    mean: mean(values),
    median: median(values),
    std: populationStd(values),
    min: minOf(values),
    max: maxOf(values),
  };
}

/** Trailing simple moving average over at most `window` points. */
export function trailingMean(
  values: readonly number[],
  window: number
): number {
  return mean(values.slice(Math.max(0, values.length - window)));
}

/** Percent changes between consecutive values. */
export function pctChanges(values: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < values.length; i++) {
    out.push((values[i] / values[i - 1] - 1) * 100);
  }
  return out;
}
