/**
 * Strategy Evaluator: scores each catalog heuristic against the monthly
 * average baseline, month by month.
 */
import type { RiskThresholds } from "../../config/analysis_config";
import {
  InsufficientDataError,
  StrategyDefinitionError,
} from "../../util/errors";
import { getLogger } from "../../util/logger";
import type {
  BucketDimension,
  DatedPrice,
  GroupedStats,
  RiskLevel,
  Series,
  StrategyDefinition,
  StrategyResult,
  WeightMap,
} from "../domain/types";
import { groupByMonth, toDatedPrices } from "./aggregate";
import {
  WEEKDAY_NAMES,
  WEEKS_OF_MONTH,
  weekLabel,
  weekdayName,
} from "./calendar";
import { DEFAULT_STRATEGY_CATALOG } from "./strategy_catalog";
import { mean, populationStd, sum } from "./statistics";

export const WEIGHT_SUM_TOLERANCE = 1e-6;
export const PERFORMANCE_TIE_TOLERANCE = 1e-9;
/** A month has at most 31 trading days, so at most 31 price ranks. */
export const MAX_PRICE_RANK = 31;

export interface EvaluateStrategiesOptions {
  risk: RiskThresholds;
  minMonths: number;
  catalog?: readonly StrategyDefinition[];
}

export function evaluateStrategies(
  series: Series,
  grouped: GroupedStats,
  options: EvaluateStrategiesOptions
): StrategyResult[] {
  const logger = getLogger("pricing/evaluate_strategies");
  const catalog = options.catalog ?? DEFAULT_STRATEGY_CATALOG;
  const months = [...groupByMonth(toDatedPrices(series)).values()];
  if (months.length < options.minMonths) {
    throw new InsufficientDataError(months.length, options.minMonths);
  }

  const results = catalog.map(definition => {
    const allocation = definition.allocate(series, grouped);
    assertWeights(definition.id, definition.dimension, allocation.weights);

    const performances = months.flatMap(month => {
      const p = periodPerformance(
        month,
        definition.dimension,
        allocation.weights
      );
      return p === null ? [] : [p];
    });
    const evaluated = performances.length > 0;
    const std = evaluated ? populationStd(performances) : 0;
    const wins = performances.filter(p => p >= 0).length;

    const result: StrategyResult = {
      id: definition.id,
      name: allocation.name,
      description: allocation.description,
      dimension: definition.dimension,
      weights: allocation.weights,
      avg_performance_vs_monthly: evaluated ? mean(performances) : 0,
      success_rate: evaluated ? (wins / performances.length) * 100 : 0,
      risk_level: evaluated ? classifyRisk(std, options.risk) : "High",
      performance_std: std,
      periods_evaluated: performances.length,
    };
    logger.debug(
      {
        id: result.id,
        avg: result.avg_performance_vs_monthly,
        successRate: result.success_rate,
        periods: result.periods_evaluated,
      },
      "strategy evaluated"
    );
    return Object.freeze(result);
  });

  return sortStrategies(results);
}

/**
 * Weighted price of one month relative to that month's mean, in percent.
 * Buckets with no observation in the month are left out and the remaining
 * weights renormalized; null when no weighted bucket traded that month.
 */
export function periodPerformance(
  month: readonly DatedPrice[],
  dimension: BucketDimension,
  weights: WeightMap
): number | null {
  const baseline = mean(month.map(p => p.price));
  const buckets = bucketize(month, dimension);

  let weighted = 0;
  let totalWeight = 0;
  for (const [label, weight] of Object.entries(weights)) {
    const prices = buckets.get(label);
    if (!prices || weight <= 0) continue;
    weighted += weight * mean(prices);
    totalWeight += weight;
  }
  if (totalWeight === 0) return null;
  return ((weighted / totalWeight - baseline) / baseline) * 100;
}

export function bucketLabel(dimension: BucketDimension, p: DatedPrice): string {
  switch (dimension) {
    case "weekday":
      return weekdayName(p.weekday);
    case "week_of_month":
      return weekLabel(p.weekOfMonth);
    case "price_rank":
      throw new StrategyDefinitionError(
        "price_rank buckets depend on the whole month"
      );
  }
}

export function rankLabel(rank: number): string {
  return `Rank ${rank}`;
}

/** Every bucket label a weight map may name for the dimension. */
export function bucketLabels(dimension: BucketDimension): readonly string[] {
  switch (dimension) {
    case "weekday":
      return WEEKDAY_NAMES;
    case "week_of_month":
      return WEEKS_OF_MONTH.map(weekLabel);
    case "price_rank":
      return Array.from({ length: MAX_PRICE_RANK }, (_, i) => rankLabel(i + 1));
  }
}

function bucketize(
  month: readonly DatedPrice[],
  dimension: BucketDimension
): Map<string, number[]> {
  const buckets = new Map<string, number[]>();
  const add = (label: string, price: number) => {
    const bucket = buckets.get(label);
    if (bucket) bucket.push(price);
    else buckets.set(label, [price]);
  };

  if (dimension === "price_rank") {
    // 1 = cheapest day of the month; equal prices keep date order
    [...month]
      .sort((a, b) => a.price - b.price)
      .forEach((p, i) => add(rankLabel(i + 1), p.price));
  } else {
    for (const p of month) add(bucketLabel(dimension, p), p.price);
  }
  return buckets;
}

export function assertWeights(
  strategyId: string,
  dimension: BucketDimension,
  weights: WeightMap
): void {
  const known = new Set(bucketLabels(dimension));
  const unknown = Object.keys(weights).filter(label => !known.has(label));
  if (unknown.length > 0) {
    throw new StrategyDefinitionError(
      `${strategyId}: unknown ${dimension} bucket "${unknown[0]}"`
    );
  }
  const values = Object.values(weights);
  if (values.some(w => !Number.isFinite(w) || w < 0)) {
    throw new StrategyDefinitionError(
      `${strategyId}: weights must be finite and non-negative`
    );
  }
  const total = sum(values);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new StrategyDefinitionError(
      `${strategyId}: weights sum to ${total}, expected 1`
    );
  }
}

export function classifyRisk(
  std: number,
  thresholds: RiskThresholds
): RiskLevel {
  if (std < thresholds.lowPct) return "Low";
  if (std < thresholds.mediumPct) return "Medium";
  return "High";
}

/**
 * Evaluated strategies first, then best average performance. Performances
 * that round to the same multiple of 1e-9 count as equal and are ordered by
 * success rate; anything still tied keeps catalog order.
 */
export function sortStrategies(
  results: readonly StrategyResult[]
): StrategyResult[] {
  const tier = (r: StrategyResult) =>
    Math.round(r.avg_performance_vs_monthly / PERFORMANCE_TIE_TOLERANCE);
  return [...results].sort((a, b) => {
    const unevaluated =
      Number(a.periods_evaluated === 0) - Number(b.periods_evaluated === 0);
    if (unevaluated !== 0) return unevaluated;
    const byPerformance = tier(b) - tier(a);
    if (byPerformance !== 0) return byPerformance;
    return b.success_rate - a.success_rate;
  });
}
