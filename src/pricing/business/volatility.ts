import type { DatedPrice, VolatilityAnalysis } from "../domain/types";
import { groupByMonth } from "./aggregate";
import { weekdayName } from "./calendar";
import { maxOf, mean, minOf, pctChanges, populationStd } from "./statistics";

export function analyzeVolatility(
  prices: readonly DatedPrice[]
): VolatilityAnalysis {
  const values = prices.map(p => p.price);
  const returns = pctChanges(values);

  const monthStd = [...groupByMonth(prices).values()]
    .filter(m => m.length > 1)
    .map(m => ({ key: m[0].month, std: populationStd(m.map(p => p.price)) }));
  const weekdayStd = dispersionBy(prices, p => p.weekday);
  const weekStd = dispersionBy(prices, p => p.weekOfMonth);

  const mostVolatileWeekday = extreme(weekdayStd, "max");

  return {
    overall_volatility: populationStd(values),
    daily_return_stats:
      returns.length > 0
        ? {
            mean: mean(returns),
            std: populationStd(returns),
            max: maxOf(returns),
            min: minOf(returns),
          }
        : { mean: 0, std: 0, max: 0, min: 0 },
    most_volatile_month: extreme(monthStd, "max"),
    least_volatile_month: extreme(monthStd, "min"),
    most_volatile_weekday:
      mostVolatileWeekday === null ? null : weekdayName(mostVolatileWeekday),
    most_volatile_week: extreme(weekStd, "max"),
  };
}

/** Population std per key with at least two observations, in key order. */
function dispersionBy(
  prices: readonly DatedPrice[],
  keyOf: (p: DatedPrice) => number
): Array<{ key: number; std: number }> {
  const groups = new Map<number, number[]>();
  for (const p of prices) {
    const key = keyOf(p);
    const bucket = groups.get(key);
    if (bucket) bucket.push(p.price);
    else groups.set(key, [p.price]);
  }
  return [...groups.entries()]
    .filter(([, v]) => v.length > 1)
    .sort(([a], [b]) => a - b)
    .map(([key, v]) => ({ key, std: populationStd(v) }));
}

function extreme(
  entries: ReadonlyArray<{ key: number; std: number }>,
  direction: "max" | "min"
): number | null {
  let pick: { key: number; std: number } | null = null;
  for (const e of entries) {
    if (
      pick === null ||
      (direction === "max" ? e.std > pick.std : e.std < pick.std)
    ) {
      pick = e;
    }
  }
  return pick === null ? null : pick.key;
}
