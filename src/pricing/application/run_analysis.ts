import { randomUUID } from "crypto";
import type { Logger } from "pino";
import {
  loadAnalysisConfig,
  type AnalysisConfig,
} from "../../config/analysis_config";
import { withRunContext } from "../../util/logger";
import { aggregateSeries, toDatedPrices } from "../business/aggregate";
import { buildReport } from "../business/build_report";
import { evaluateStrategies } from "../business/evaluate_strategies";
import { filterSeries, loadSeries } from "../business/load_series";
import {
  monthlyDetails,
  weekdayPatterns,
  weeklyPatterns,
} from "../business/patterns";
import { DEFAULT_STRATEGY_CATALOG } from "../business/strategy_catalog";
import { analyzeTrends } from "../business/trends";
import { analyzeVolatility } from "../business/volatility";
import type {
  AnalysisReport,
  DateRange,
  Series,
  StrategyDefinition,
} from "../domain/types";
import {
  writeReport,
  type WrittenReport,
} from "../infrastructure/report_writer";

/**
 * Everything a single run needs. Built fresh per invocation and dropped
 * afterwards; no stage keeps state between runs.
 */
export interface AnalysisContext {
  runId: string;
  config: AnalysisConfig;
  catalog: readonly StrategyDefinition[];
  now: () => Date;
  logger: Logger;
}

export interface CreateAnalysisContextOptions {
  config?: AnalysisConfig;
  catalog?: readonly StrategyDefinition[];
  now?: () => Date;
  range?: DateRange;
}

export function createAnalysisContext(
  options: CreateAnalysisContextOptions = {}
): AnalysisContext {
  const runId = randomUUID();
  return {
    runId,
    config: options.config ?? loadAnalysisConfig(),
    catalog: options.catalog ?? DEFAULT_STRATEGY_CATALOG,
    now: options.now ?? (() => new Date()),
    logger: withRunContext("pricing/run_analysis", {
      runId,
      start: options.range?.start,
      end: options.range?.end,
    }),
  };
}

/**
 * Pure part of the pipeline: filter, aggregate, evaluate, assemble.
 */
export function computeReport(
  context: AnalysisContext,
  fullSeries: Series,
  range: DateRange = {}
): AnalysisReport {
  const series = filterSeries(fullSeries, range);
  const grouped = aggregateSeries(series);
  const strategies = evaluateStrategies(series, grouped, {
    risk: context.config.risk,
    minMonths: context.config.minMonths,
    catalog: context.catalog,
  });
  const prices = toDatedPrices(series);

  return buildReport({
    fullSeries,
    series,
    range,
    grouped,
    strategies,
    monthly: monthlyDetails(prices),
    weekly: weeklyPatterns(prices),
    weekdays: weekdayPatterns(prices),
    trends: analyzeTrends(prices),
    volatility: analyzeVolatility(prices),
    generatedAt: context.now(),
  });
}

export interface RunAnalysisResult {
  report: AnalysisReport;
  written: WrittenReport;
}

/**
 * Load the CSV, compute the report and persist it with backups.
 */
export async function runAnalysis(
  context: AnalysisContext,
  range: DateRange = {}
): Promise<RunAnalysisResult> {
  const { config, logger } = context;
  logger.info({ csvPath: config.csvPath }, "analysis started");

  const fullSeries = await loadSeries(config.csvPath, config.columns);
  const report = computeReport(context, fullSeries, range);
  const written = await writeReport(
    report,
    {
      outputPath: config.outputPath,
      backupDir: config.backupDir,
      dashboardPath: config.dashboardPath,
    },
    new Date(report.metadata.analysis_timestamp)
  );

  logger.info(
    {
      recordsUsed: report.metadata.records_used,
      topStrategy: report.pricing_strategy[0]?.id,
      outputPath: written.outputPath,
    },
    "analysis completed"
  );
  return { report, written };
}
