import { aggregateSeries } from "@src/pricing/business/aggregate";
import {
  classifyRisk,
  evaluateStrategies,
  rankLabel,
  sortStrategies,
} from "@src/pricing/business/evaluate_strategies";
import {
  DEFAULT_STRATEGY_CATALOG,
} from "@src/pricing/business/strategy_catalog";
import type {
  BucketDimension,
  Series,
  StrategyDefinition,
  StrategyResult,
} from "@src/pricing/domain/types";
import {
  InsufficientDataError,
  StrategyDefinitionError,
} from "@src/util/errors";
import { TWO_MONTH_ROWS, seriesOf } from "./fixtures";

const options = { risk: { lowPct: 1, mediumPct: 3 }, minMonths: 2 };

function evaluate(series: Series, catalog?: readonly StrategyDefinition[]) {
  return evaluateStrategies(series, aggregateSeries(series), {
    ...options,
    catalog,
  });
}

const cheapestTwoDays: StrategyDefinition = {
  id: "cheapest-two-days",
  dimension: "price_rank",
  allocate: () => ({
    name: "Cheapest Two Days",
    description: "Price 50% on each of the two lowest-priced days of the month",
    weights: { [rankLabel(1)]: 0.5, [rankLabel(2)]: 0.5 },
  }),
};

describe("evaluateStrategies with the default catalog", () => {
  const results = evaluate(seriesOf(TWO_MONTH_ROWS));
  const byId = new Map(results.map(r => [r.id, r]));

  it("evaluates every catalog entry with weights summing to one", () => {
    expect(results).toHaveLength(DEFAULT_STRATEGY_CATALOG.length);
    for (const r of results) {
      const total = Object.values(r.weights).reduce((a, b) => a + b, 0);
      expect(Math.abs(total - 1)).toBeLessThan(1e-6);
    }
  });

  it("puts everything on the highest-priced weekday", () => {
    const r = byId.get("single-best-day");
    expect(r).toMatchObject({
      name: "Single Day Strategy (All on Tuesday)",
      weights: { Tuesday: 1 },
      periods_evaluated: 2,
      success_rate: 100,
      risk_level: "Medium",
    });
    // Jan: 104 vs 100 -> +4%; Feb: 130 vs 120 -> +8.33%
    expect(r?.avg_performance_vs_monthly).toBeCloseTo((4 + 25 / 3) / 2, 9);
    expect(r?.performance_std).toBeCloseTo((25 / 3 - 4) / 2, 9);
  });

  it("splits between the two best weekdays", () => {
    const r = byId.get("two-day-split");
    expect(r?.weights).toEqual({ Tuesday: 0.5, Monday: 0.5 });
    // Jan: (104 + 101) / 2 = 102.5 -> +2.5%; Feb: 125 vs 120 -> +4.17%
    expect(r?.avg_performance_vs_monthly).toBeCloseTo((2.5 + 25 / 6) / 2, 9);
  });

  it("concentrates 70% on the best week and renormalizes missing weeks", () => {
    const r = byId.get("best-week-concentration");
    expect(r?.name).toBe("Week 1 Focus Strategy");
    expect(r?.weights["Week 1"]).toBe(0.7);
    expect(r?.weights["Week 3"]).toBeCloseTo(0.075, 12);
    // Both months' week buckets average exactly the monthly mean
    expect(r?.avg_performance_vs_monthly).toBeCloseTo(0, 9);
    expect(r?.periods_evaluated).toBe(2);
  });

  it("avoids the lowest-priced weekday", () => {
    const r = byId.get("avoid-worst-day");
    expect(r?.name).toBe("Avoid Wednesday Strategy");
    expect(r?.weights).toEqual({ Monday: 0.5, Tuesday: 0.5 });
  });

  it("orders by performance, then success rate, then catalog order", () => {
    expect(results.map(r => r.id)).toEqual([
      "single-best-day",
      "two-day-split",
      "avoid-worst-day",
      "best-week-concentration",
    ]);
  });
});

describe("evaluateStrategies edge cases", () => {
  it("scores the two cheapest days of each month against its mean", () => {
    const series = seriesOf([
      ["2024-01-02", 9000],
      ["2024-01-03", 9100],
      ["2024-02-01", 9200],
      ["2024-02-02", 9300],
    ]);
    const [result] = evaluate(series, [cheapestTwoDays]);
    expect(result.avg_performance_vs_monthly).toBe(0);
    expect(result.success_rate).toBe(100);
    expect(result.periods_evaluated).toBe(2);
    expect(result.risk_level).toBe("Low");
  });

  it("fails with InsufficientDataError on a single month", () => {
    const series = seriesOf(
      TWO_MONTH_ROWS.filter(([d]) => d.startsWith("2024-01"))
    );
    expect(() => evaluate(series)).toThrow(InsufficientDataError);
    expect(() => evaluate(series)).toThrow(
      "Strategy evaluation needs at least 2 calendar months of data, found 1"
    );
  });

  it("fails fast when a strategy's weights do not sum to one", () => {
    const broken: StrategyDefinition = {
      id: "broken",
      dimension: "weekday",
      allocate: () => ({
        name: "Broken",
        description: "",
        weights: { Monday: 0.6 },
      }),
    };
    expect(() => evaluate(seriesOf(TWO_MONTH_ROWS), [broken])).toThrow(
      StrategyDefinitionError
    );
  });

  const unknownBuckets: Array<[BucketDimension, string]> = [
    ["weekday", "monday"],
    ["week_of_month", "Week 6"],
    ["price_rank", "Cheapest"],
  ];

  it.each(unknownBuckets)(
    "rejects a %s weight on unknown bucket %s",
    (dim, label) => {
      const typo: StrategyDefinition = {
        id: "typo",
        dimension: dim,
        allocate: () => ({
          name: "Typo",
          description: "",
          weights: { [label]: 1 },
        }),
      };
      expect(() => evaluate(seriesOf(TWO_MONTH_ROWS), [typo])).toThrow(
        new StrategyDefinitionError(`typo: unknown ${dim} bucket "${label}"`)
      );
    }
  );

  it("ranks a strategy that was never evaluated after measured ones", () => {
    const weekdayOnly = (id: string, day: string): StrategyDefinition => ({
      id,
      dimension: "weekday",
      allocate: () => ({ name: id, description: "", weights: { [day]: 1 } }),
    });
    const results = evaluate(seriesOf(TWO_MONTH_ROWS), [
      weekdayOnly("sundays", "Sunday"),
      weekdayOnly("wednesdays", "Wednesday"),
    ]);
    // Jan: 90 vs 100 -> -10%; Feb: 110 vs 120 -> -8.33%
    expect(results.map(r => [r.id, r.periods_evaluated])).toEqual([
      ["wednesdays", 2],
      ["sundays", 0],
    ]);
    expect(results[0].avg_performance_vs_monthly).toBeCloseTo(
      (-10 - 25 / 3) / 2,
      9
    );
  });

  it("skips months where no weighted bucket traded", () => {
    const sundays: StrategyDefinition = {
      id: "sundays",
      dimension: "weekday",
      allocate: () => ({
        name: "Sundays",
        description: "",
        weights: { Sunday: 1 },
      }),
    };
    const [result] = evaluate(seriesOf(TWO_MONTH_ROWS), [sundays]);
    expect(result).toMatchObject({
      avg_performance_vs_monthly: 0,
      success_rate: 0,
      periods_evaluated: 0,
      risk_level: "High",
    });
  });
});

describe("classifyRisk", () => {
  const thresholds = { lowPct: 1, mediumPct: 3 };

  it("maps performance dispersion to three tiers", () => {
    expect(classifyRisk(0.5, thresholds)).toBe("Low");
    expect(classifyRisk(1, thresholds)).toBe("Medium");
    expect(classifyRisk(2.99, thresholds)).toBe("Medium");
    expect(classifyRisk(3, thresholds)).toBe("High");
  });
});

describe("sortStrategies", () => {
  function result(
    id: string,
    avg: number,
    success: number,
    periods = 4
  ): StrategyResult {
    return {
      id,
      name: id,
      description: "",
      dimension: "weekday",
      weights: { Monday: 1 },
      avg_performance_vs_monthly: avg,
      success_rate: success,
      risk_level: "Low",
      performance_std: 0,
      periods_evaluated: periods,
    };
  }

  it("breaks near-equal performance by success rate, then input order", () => {
    const sorted = sortStrategies([
      result("a", 0.5, 50),
      result("b", 1, 25),
      result("c", 0.5 + 1e-12, 75),
      result("d", 0.5, 50),
    ]);
    expect(sorted.map(r => r.id)).toEqual(["b", "c", "a", "d"]);
  });

  it("orders a chain of near-equal performances the same way", () => {
    const a = result("a", 0, 90);
    const b = result("b", 0.8e-9, 80);
    const c = result("c", 1.6e-9, 70);
    const orders = [
      [a, b, c],
      [a, c, b],
      [b, a, c],
      [b, c, a],
      [c, a, b],
      [c, b, a],
    ];
    for (const input of orders) {
      expect(sortStrategies(input).map(r => r.id)).toEqual(["c", "b", "a"]);
    }
  });

  it("puts unevaluated strategies after evaluated losers", () => {
    const sorted = sortStrategies([
      result("never", 0, 0, 0),
      result("loser", -5, 0),
    ]);
    expect(sorted.map(r => r.id)).toEqual(["loser", "never"]);
  });
});
