import type { DatedPrice, TrendAnalysis } from "../domain/types";
import { groupByMonth } from "./aggregate";
import { mean, trailingMean } from "./statistics";

/** Minimum spacing, in months, between two detected peaks (or troughs). */
export const CYCLE_PEAK_DISTANCE = 3;
const TREND_LOOKBACK = 30;

export function analyzeTrends(prices: readonly DatedPrice[]): TrendAnalysis {
  const values = prices.map(p => p.price);
  const latestMa30 = trailingMean(values, TREND_LOOKBACK);
  const earlierIdx = Math.max(0, values.length - TREND_LOOKBACK);
  const earlierMa30 = trailingMean(
    values.slice(0, earlierIdx + 1),
    TREND_LOOKBACK
  );

  const monthlyAvg = [...groupByMonth(prices).values()].map(m =>
    mean(m.map(p => p.price))
  );
  const peaks = findPeaks(monthlyAvg, CYCLE_PEAK_DISTANCE);
  const troughs = findPeaks(
    monthlyAvg.map(v => -v),
    CYCLE_PEAK_DISTANCE
  );
  const gaps = peaks.slice(1).map((p, i) => p - peaks[i]);

  return {
    current_trend: latestMa30 > earlierMa30 ? "Upward" : "Downward",
    ma_7_current: trailingMean(values, 7),
    ma_30_current: latestMa30,
    ma_90_current: trailingMean(values, 90),
    yoy_growth: yearOverYear(prices),
    cycle_info: {
      peaks_detected: peaks.length,
      troughs_detected: troughs.length,
      avg_cycle_months: gaps.length > 0 ? mean(gaps) : 0,
    },
  };
}

export function yearOverYear(
  prices: readonly DatedPrice[]
): Array<{ year: number; growth_pct: number }> {
  const byYear = new Map<number, number[]>();
  for (const p of prices) {
    const bucket = byYear.get(p.year);
    if (bucket) bucket.push(p.price);
    else byYear.set(p.year, [p.price]);
  }
  const growth: Array<{ year: number; growth_pct: number }> = [];
  for (const [year, values] of byYear) {
    const previous = byYear.get(year - 1);
    if (!previous) continue;
    growth.push({
      year,
      growth_pct: (mean(values) / mean(previous) - 1) * 100,
    });
  }
  return growth;
}

/**
 * Indices of strict local maxima. When two peaks are closer than `distance`
 * the higher one wins (the earlier one on equal height).
 */
export function findPeaks(
  values: readonly number[],
  distance: number
): number[] {
  const candidates: number[] = [];
  for (let i = 1; i < values.length - 1; i++) {
    if (values[i] > values[i - 1] && values[i] > values[i + 1]) {
      candidates.push(i);
    }
  }

  const byHeight = [...candidates].sort(
    (a, b) => values[b] - values[a] || a - b
  );
  const removed = new Set<number>();
  const kept: number[] = [];
  for (const idx of byHeight) {
    if (removed.has(idx)) continue;
    kept.push(idx);
    for (const other of candidates) {
      if (other !== idx && Math.abs(other - idx) < distance) removed.add(other);
    }
  }
  return kept.sort((a, b) => a - b);
}
