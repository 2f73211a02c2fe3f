import { z } from "zod";
import type { AnalysisReport } from "../domain/types";

/**
 * Shape of `analysis_results.json` as read by the dashboard. The contract is
 * versioned by field presence only, so fields may be added but never renamed.
 */

const nullableNumber = z.number().nullable();

const GroupStatSchema = z.object({
  key: z.number().int(),
  label: z.string(),
  count: z.number().int().min(0),
  mean: nullableNumber,
  median: nullableNumber,
  std: nullableNumber,
  min: nullableNumber,
  max: nullableNumber,
});

const StrategyResultSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  dimension: z.enum(["weekday", "week_of_month", "price_rank"]),
  weights: z.record(z.number().min(0)),
  avg_performance_vs_monthly: z.number(),
  success_rate: z.number().min(0).max(100),
  risk_level: z.enum(["Low", "Medium", "High"]),
  performance_std: z.number().min(0),
  periods_evaluated: z.number().int().min(0),
});

const MonthlyDetailSchema = z.object({
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
  month_name: z.string(),
  average: z.number(),
  min: z.number(),
  max: z.number(),
  std: z.number(),
  days_above_average: z.number().int(),
  days_below_average: z.number().int(),
  best_day: z.object({
    date: z.string(),
    value: z.number(),
    premium_to_avg: z.number(),
  }),
  worst_day: z.object({
    date: z.string(),
    value: z.number(),
    discount_to_avg: z.number(),
  }),
});

export const AnalysisReportSchema: z.ZodType<AnalysisReport> = z.object({
  period: z.object({
    start: z.string(),
    end: z.string(),
    total_days: z.number().int().min(1),
  }),
  overall_stats: z.object({
    count: z.number().int(),
    mean: z.number(),
    median: z.number(),
    std: z.number(),
    min: z.number(),
    max: z.number(),
    range: z.number(),
  }),
  pricing_strategy: z.array(StrategyResultSchema),
  grouped_stats: z.object({
    weekday: z.array(GroupStatSchema).length(7),
    week_of_month: z.array(GroupStatSchema).length(5),
    month: z.array(GroupStatSchema).length(12),
    year: z.array(GroupStatSchema).min(1),
  }),
  monthly_analysis: z.array(MonthlyDetailSchema),
  weekly_patterns: z.array(
    z.object({
      week: z.string(),
      avg_price: z.number(),
      std: z.number(),
      count: z.number().int(),
      avg_performance_vs_month: z.number(),
      best_performance: z.number(),
      worst_performance: z.number(),
    })
  ),
  weekday_analysis: z.array(
    z.object({
      weekday: z.string(),
      avg_price: z.number(),
      std: z.number(),
      count: z.number().int(),
      beats_monthly_avg_pct: z.number(),
    })
  ),
  trends: z.object({
    current_trend: z.enum(["Upward", "Downward"]),
    ma_7_current: z.number(),
    ma_30_current: z.number(),
    ma_90_current: z.number(),
    yoy_growth: z.array(
      z.object({ year: z.number().int(), growth_pct: z.number() })
    ),
    cycle_info: z.object({
      peaks_detected: z.number().int(),
      troughs_detected: z.number().int(),
      avg_cycle_months: z.number(),
    }),
  }),
  volatility: z.object({
    overall_volatility: z.number(),
    daily_return_stats: z.object({
      mean: z.number(),
      std: z.number(),
      max: z.number(),
      min: z.number(),
    }),
    most_volatile_month: z.number().int().nullable(),
    least_volatile_month: z.number().int().nullable(),
    most_volatile_weekday: z.string().nullable(),
    most_volatile_week: z.number().int().nullable(),
  }),
  metadata: z.object({
    analysis_timestamp: z.string().datetime({ offset: true }),
    data_source: z.string(),
    total_records: z.number().int(),
    records_used: z.number().int(),
    dropped_rows: z.number().int(),
    duplicate_dates: z.number().int(),
    data_range: z.object({ start: z.string(), end: z.string() }),
  }),
});
