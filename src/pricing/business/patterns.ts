/**
 * Calendar patterns measured against the monthly baseline: per-month detail,
 * week-of-month and weekday behaviour.
 */
import type {
  DatedPrice,
  MonthlyDetail,
  WeekdayPattern,
  WeeklyPattern,
} from "../domain/types";
import { groupByMonth } from "./aggregate";
import {
  WEEKDAY_NAMES,
  WEEKS_OF_MONTH,
  monthName,
  weekLabel,
  weekdayName,
} from "./calendar";
import { maxOf, mean, minOf, populationStd } from "./statistics";

export function monthlyDetails(prices: readonly DatedPrice[]): MonthlyDetail[] {
  return [...groupByMonth(prices).values()].map(month => {
    const values = month.map(p => p.price);
    const average = mean(values);
    const best = month.reduce((hi, p) => (p.price > hi.price ? p : hi));
    const worst = month.reduce((lo, p) => (p.price < lo.price ? p : lo));
    const { year, month: monthNumber } = month[0];
    return {
      year,
      month: monthNumber,
      month_name: monthName(monthNumber),
      average,
      min: minOf(values),
      max: maxOf(values),
      std: populationStd(values),
      days_above_average: values.filter(v => v > average).length,
      days_below_average: values.filter(v => v <= average).length,
      best_day: {
        date: best.date,
        value: best.price,
        premium_to_avg: best.price - average,
      },
      worst_day: {
        date: worst.date,
        value: worst.price,
        discount_to_avg: average - worst.price,
      },
    };
  });
}

/** Week-of-month buckets with data, best average performance first. */
export function weeklyPatterns(prices: readonly DatedPrice[]): WeeklyPattern[] {
  const monthAverages = monthlyAverages(prices);
  const patterns: WeeklyPattern[] = [];

  for (const week of WEEKS_OF_MONTH) {
    const inWeek = prices.filter(p => p.weekOfMonth === week);
    if (inWeek.length === 0) continue;

    const performances = [...groupByMonth(inWeek).entries()].map(
      ([key, group]) => {
        const baseline = monthAverages.get(key) ?? NaN;
        return (mean(group.map(p => p.price)) / baseline - 1) * 100;
      }
    );
    const values = inWeek.map(p => p.price);
    patterns.push({
      week: weekLabel(week),
      avg_price: mean(values),
      std: populationStd(values),
      count: values.length,
      avg_performance_vs_month: mean(performances),
      best_performance: maxOf(performances),
      worst_performance: minOf(performances),
    });
  }

  return patterns.sort(
    (a, b) => b.avg_performance_vs_month - a.avg_performance_vs_month
  );
}

/** Weekdays with data, ordered by how often they beat their month's average. */
export function weekdayPatterns(
  prices: readonly DatedPrice[]
): WeekdayPattern[] {
  const monthAverages = monthlyAverages(prices);
  const patterns: WeekdayPattern[] = [];

  WEEKDAY_NAMES.forEach((_, i) => {
    const weekday = i + 1;
    const onDay = prices.filter(p => p.weekday === weekday);
    if (onDay.length === 0) return;
    const beats = onDay.filter(
      p => p.price > (monthAverages.get(p.monthKey) ?? Infinity)
    ).length;
    const values = onDay.map(p => p.price);
    patterns.push({
      weekday: weekdayName(weekday),
      avg_price: mean(values),
      std: populationStd(values),
      count: values.length,
      beats_monthly_avg_pct: (beats / onDay.length) * 100,
    });
  });

  return patterns.sort(
    (a, b) => b.beats_monthly_avg_pct - a.beats_monthly_avg_pct
  );
}

export function monthlyAverages(
  prices: readonly DatedPrice[]
): Map<string, number> {
  const out = new Map<string, number>();
  for (const [key, group] of groupByMonth(prices)) {
    out.set(key, mean(group.map(p => p.price)));
  }
  return out;
}
