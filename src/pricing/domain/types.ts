/**
 * Domain types for the copper pricing analysis.
 *
 * Internal records are camelCase; everything that ends up in the persisted
 * report uses the snake_case field names the dashboard reads.
 */

export interface PriceRecord {
  /** ISO calendar date, YYYY-MM-DD. Unique within a series. */
  date: string;
  settlementPrice: number;
  threeMonthPrice?: number;
  stock?: number;
}

export interface Series {
  readonly records: readonly PriceRecord[];
  /** Rows skipped because the settlement price was blank. */
  readonly droppedRows: number;
  /** Rows replaced by a later row with the same date. */
  readonly duplicateDates: number;
  readonly source: string;
}

export interface CalendarParts {
  year: number;
  /** 1-12 */
  month: number;
  /** Day of month, 1-31 */
  day: number;
  /** ISO weekday, 1 = Monday .. 7 = Sunday */
  weekday: number;
  /** ceil(day / 7), 1-5 */
  weekOfMonth: number;
  /** YYYY-MM */
  monthKey: string;
}

export interface DatedPrice extends CalendarParts {
  date: string;
  price: number;
}

export interface DateRange {
  start?: string;
  end?: string;
}

export interface GroupStat {
  key: number;
  label: string;
  count: number;
  mean: number | null;
  median: number | null;
  std: number | null;
  min: number | null;
  max: number | null;
}

export interface GroupedStats {
  weekday: GroupStat[];
  week_of_month: GroupStat[];
  month: GroupStat[];
  year: GroupStat[];
}

export interface OverallStats {
  count: number;
  mean: number;
  median: number;
  std: number;
  min: number;
  max: number;
  range: number;
}

/** Calendar dimension a strategy allocates over. */
export type BucketDimension = "weekday" | "week_of_month" | "price_rank";

/** Bucket label -> weight. Weights of a valid map sum to 1. */
export type WeightMap = Record<string, number>;

export type RiskLevel = "Low" | "Medium" | "High";

export interface StrategyAllocation {
  name: string;
  description: string;
  weights: WeightMap;
}

/**
 * A named pricing heuristic. `allocate` must be pure: same inputs, same map.
 */
export interface StrategyDefinition {
  id: string;
  dimension: BucketDimension;
  allocate: (series: Series, grouped: GroupedStats) => StrategyAllocation;
}

export interface StrategyResult {
  id: string;
  name: string;
  description: string;
  dimension: BucketDimension;
  weights: WeightMap;
  avg_performance_vs_monthly: number;
  success_rate: number;
  risk_level: RiskLevel;
  performance_std: number;
  periods_evaluated: number;
}

export interface MonthlyDetail {
  year: number;
  month: number;
  month_name: string;
  average: number;
  min: number;
  max: number;
  std: number;
  days_above_average: number;
  days_below_average: number;
  best_day: { date: string; value: number; premium_to_avg: number };
  worst_day: { date: string; value: number; discount_to_avg: number };
}

export interface WeeklyPattern {
  week: string;
  avg_price: number;
  std: number;
  count: number;
  avg_performance_vs_month: number;
  best_performance: number;
  worst_performance: number;
}

export interface WeekdayPattern {
  weekday: string;
  avg_price: number;
  std: number;
  count: number;
  beats_monthly_avg_pct: number;
}

export interface TrendAnalysis {
  current_trend: "Upward" | "Downward";
  ma_7_current: number;
  ma_30_current: number;
  ma_90_current: number;
  yoy_growth: Array<{ year: number; growth_pct: number }>;
  cycle_info: {
    peaks_detected: number;
    troughs_detected: number;
    avg_cycle_months: number;
  };
}

export interface VolatilityAnalysis {
  overall_volatility: number;
  daily_return_stats: { mean: number; std: number; max: number; min: number };
  most_volatile_month: number | null;
  least_volatile_month: number | null;
  most_volatile_weekday: string | null;
  most_volatile_week: number | null;
}

export interface ReportMetadata {
  analysis_timestamp: string;
  data_source: string;
  total_records: number;
  records_used: number;
  dropped_rows: number;
  duplicate_dates: number;
  data_range: { start: string; end: string };
}

export interface AnalysisReport {
  period: { start: string; end: string; total_days: number };
  overall_stats: OverallStats;
  pricing_strategy: StrategyResult[];
  grouped_stats: GroupedStats;
  monthly_analysis: MonthlyDetail[];
  weekly_patterns: WeeklyPattern[];
  weekday_analysis: WeekdayPattern[];
  trends: TrendAnalysis;
  volatility: VolatilityAnalysis;
  metadata: ReportMetadata;
}
