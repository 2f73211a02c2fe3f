/**
 * The closed catalog of pricing heuristics.
 *
 * Each entry derives its allocation from the grouped statistics of the
 * analysed period only. "Best" means the highest average settlement price:
 * strategies are scored from the seller's side.
 */
import type {
  GroupStat,
  StrategyAllocation,
  StrategyDefinition,
  WeightMap,
} from "../domain/types";
import { StrategyDefinitionError } from "../../util/errors";

type RankedGroup = GroupStat & { mean: number };

/** Buckets with data, highest mean first; ties keep calendar order. */
export function rankByMean(groups: readonly GroupStat[]): RankedGroup[] {
  return groups
    .filter((g): g is RankedGroup => g.mean !== null)
    .sort((a, b) => b.mean - a.mean);
}

function requireRanked(
  groups: readonly GroupStat[],
  strategyId: string
): RankedGroup[] {
  const ranked = rankByMean(groups);
  if (ranked.length === 0) {
    throw new StrategyDefinitionError(
      `${strategyId}: no bucket has observations`
    );
  }
  return ranked;
}

export const singleBestDay: StrategyDefinition = {
  id: "single-best-day",
  dimension: "weekday",
  allocate: (_series, grouped): StrategyAllocation => {
    const [best] = requireRanked(grouped.weekday, "single-best-day");
    return {
      name: `Single Day Strategy (All on ${best.label})`,
      description: `Price 100% of quantity on ${best.label}`,
      weights: { [best.label]: 1 },
    };
  },
};

export const twoDaySplit: StrategyDefinition = {
  id: "two-day-split",
  dimension: "weekday",
  allocate: (_series, grouped): StrategyAllocation => {
    const ranked = requireRanked(grouped.weekday, "two-day-split");
    if (ranked.length === 1) {
      const only = ranked[0].label;
      return {
        name: `Two-Day Split Strategy (${only})`,
        description: `Price 100% on ${only}; no second weekday has data`,
        weights: { [only]: 1 },
      };
    }
    const [first, second] = ranked;
    return {
      name: `Two-Day Split Strategy (${first.label}, ${second.label})`,
      description: `Price 50% each on ${first.label} and ${second.label}`,
      weights: { [first.label]: 0.5, [second.label]: 0.5 },
    };
  },
};

export const bestWeekConcentration: StrategyDefinition = {
  id: "best-week-concentration",
  dimension: "week_of_month",
  allocate: (_series, grouped): StrategyAllocation => {
    const [best] = requireRanked(
      grouped.week_of_month,
      "best-week-concentration"
    );
    const others = grouped.week_of_month.filter(g => g.key !== best.key);
    const weights: WeightMap = { [best.label]: 0.7 };
    for (const g of others) weights[g.label] = 0.3 / others.length;
    return {
      name: `${best.label} Focus Strategy`,
      description: `Price 70% in ${best.label}, 30% spread across other weeks`,
      weights,
    };
  },
};

export const avoidWorstDay: StrategyDefinition = {
  id: "avoid-worst-day",
  dimension: "weekday",
  allocate: (_series, grouped): StrategyAllocation => {
    const withData = requireRanked(grouped.weekday, "avoid-worst-day").sort(
      (a, b) => a.key - b.key
    );
    const worst = withData.reduce((lo, g) => (g.mean < lo.mean ? g : lo));
    const kept = withData.filter(g => g.key !== worst.key);
    const targets = kept.length > 0 ? kept : withData;
    const weights: WeightMap = {};
    for (const g of targets) weights[g.label] = 1 / targets.length;
    return {
      name: `Avoid ${worst.label} Strategy`,
      description: `Spread pricing equally across all days but ${worst.label}`,
      weights,
    };
  },
};

export const DEFAULT_STRATEGY_CATALOG: readonly StrategyDefinition[] =
  Object.freeze([
    singleBestDay,
    twoDaySplit,
    bestWeekConcentration,
    avoidWorstDay,
  ]);
