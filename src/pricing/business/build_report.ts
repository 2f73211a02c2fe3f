/**
 * Report Builder: merges the stage outputs into the persisted report shape.
 * Key order is fixed by the literals below; strategies keep evaluator order.
 */
import { ReportValidationError } from "../../util/errors";
import type {
  AnalysisReport,
  DateRange,
  GroupedStats,
  MonthlyDetail,
  Series,
  StrategyResult,
  TrendAnalysis,
  VolatilityAnalysis,
  WeekdayPattern,
  WeeklyPattern,
} from "../domain/types";
import { AnalysisReportSchema } from "../schema/report_schema";
import { overallStats } from "./aggregate";

export interface BuildReportInput {
  /** Whole loaded series, before the date filter. */
  fullSeries: Series;
  /** Series the analysis ran on. */
  series: Series;
  range: DateRange;
  grouped: GroupedStats;
  strategies: StrategyResult[];
  monthly: MonthlyDetail[];
  weekly: WeeklyPattern[];
  weekdays: WeekdayPattern[];
  trends: TrendAnalysis;
  volatility: VolatilityAnalysis;
  generatedAt: Date;
}

export function buildReport(input: BuildReportInput): AnalysisReport {
  const { fullSeries, series, range } = input;
  const first = series.records[0];
  const last = series.records[series.records.length - 1];

  const report: AnalysisReport = {
    period: {
      start: range.start ?? first.date,
      end: range.end ?? last.date,
      total_days: series.records.length,
    },
    overall_stats: overallStats(series),
    pricing_strategy: input.strategies,
    grouped_stats: input.grouped,
    monthly_analysis: input.monthly,
    weekly_patterns: input.weekly,
    weekday_analysis: input.weekdays,
    trends: input.trends,
    volatility: input.volatility,
    metadata: {
      analysis_timestamp: input.generatedAt.toISOString(),
      data_source: fullSeries.source,
      total_records: fullSeries.records.length,
      records_used: series.records.length,
      dropped_rows: fullSeries.droppedRows,
      duplicate_dates: fullSeries.duplicateDates,
      data_range: {
        start: fullSeries.records[0].date,
        end: fullSeries.records[fullSeries.records.length - 1].date,
      },
    },
  };

  validateReport(report);
  return report;
}

/**
 * Throws when the report does not match the dashboard contract, e.g. a
 * statistic came out as NaN. Nothing is written for an invalid report.
 */
export function validateReport(report: unknown): AnalysisReport {
  const parsed = AnalysisReportSchema.safeParse(report);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ReportValidationError(
      issue.path.join(".") || "<root>",
      issue.message
    );
  }
  return parsed.data;
}

export function serializeReport(report: AnalysisReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/** Console lines for the end of a run. */
export function summarizeReport(report: AnalysisReport): string[] {
  const { start, end, total_days } = report.period;
  const lines = [`Period: ${start} to ${end} (${total_days} trading days)`];
  const top = report.pricing_strategy[0];
  if (top) {
    const performance = top.avg_performance_vs_monthly.toFixed(2);
    lines.push(
      `Top pricing strategy: ${top.name}`,
      `  Performance vs monthly average: ${performance}%`,
      `  Success rate: ${top.success_rate.toFixed(1)}% (${top.risk_level} risk)`
    );
  }
  const bestDay = report.weekday_analysis[0];
  if (bestDay) {
    const beats = bestDay.beats_monthly_avg_pct.toFixed(1);
    lines.push(
      `Best day to price: ${bestDay.weekday} beats the monthly average ` +
        `${beats}% of the time`
    );
  }
  const bestWeek = report.weekly_patterns[0];
  if (bestWeek) {
    const vsMonth = bestWeek.avg_performance_vs_month.toFixed(2);
    lines.push(
      `Best week to price: ${bestWeek.week} averages ${vsMonth}% vs the month`
    );
  }
  return lines;
}
