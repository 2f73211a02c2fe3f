/**
 * Aggregator: calendar groupings of the settlement series.
 *
 * Every fixed bucket is present in the output; buckets without observations
 * carry null statistics so the dashboard can tell sparse data from zeros.
 */
import type {
  DatedPrice,
  GroupStat,
  GroupedStats,
  OverallStats,
  Series,
} from "../domain/types";
import {
  MONTH_NAMES,
  WEEKDAY_NAMES,
  WEEKS_OF_MONTH,
  calendarParts,
  monthName,
  weekLabel,
  weekdayName,
} from "./calendar";
import {
  maxOf,
  mean,
  median,
  minOf,
  populationStd,
  summarize,
} from "./statistics";

export function toDatedPrices(series: Series): DatedPrice[] {
  return series.records.map(r => ({
    date: r.date,
    price: r.settlementPrice,
    ...calendarParts(r.date),
  }));
}

/**
 * Groups prices by YYYY-MM. Insertion order follows the input, so a sorted
 * series yields chronologically ordered months.
 */
export function groupByMonth(
  prices: readonly DatedPrice[]
): Map<string, DatedPrice[]> {
  const months = new Map<string, DatedPrice[]>();
  for (const p of prices) {
    const bucket = months.get(p.monthKey);
    if (bucket) bucket.push(p);
    else months.set(p.monthKey, [p]);
  }
  return months;
}

export function aggregateSeries(series: Series): GroupedStats {
  const prices = toDatedPrices(series);
  const years = prices.map(p => p.year);
  const firstYear = Math.min(...years);
  const lastYear = Math.max(...years);

  return {
    weekday: buildGroups(
      WEEKDAY_NAMES.map((_, i) => i + 1),
      weekdayName,
      prices,
      p => p.weekday
    ),
    week_of_month: buildGroups(
      [...WEEKS_OF_MONTH],
      weekLabel,
      prices,
      p => p.weekOfMonth
    ),
    month: buildGroups(
      MONTH_NAMES.map((_, i) => i + 1),
      monthName,
      prices,
      p => p.month
    ),
    year: buildGroups(
      Array.from({ length: lastYear - firstYear + 1 }, (_, i) => firstYear + i),
      String,
      prices,
      p => p.year
    ),
  };
}

export function overallStats(series: Series): OverallStats {
  const values = series.records.map(r => r.settlementPrice);
  const min = minOf(values);
  const max = maxOf(values);
  return {
    count: values.length,
    mean: mean(values),
    median: median(values),
    std: populationStd(values),
    min,
    max,
    range: max - min,
  };
}

function buildGroups(
  keys: number[],
  label: (key: number) => string,
  prices: readonly DatedPrice[],
  keyOf: (p: DatedPrice) => number
): GroupStat[] {
  const values = new Map<number, number[]>(keys.map(k => [k, []]));
  for (const p of prices) values.get(keyOf(p))?.push(p.price);
  return keys.map(key => ({
    key,
    label: label(key),
    ...summarize(values.get(key) ?? []),
  }));
}
