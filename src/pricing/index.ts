export * from "./domain/types";
export { loadSeries, buildSeries, filterSeries } from "./business/load_series";
export { aggregateSeries, overallStats } from "./business/aggregate";
export {
  evaluateStrategies,
  sortStrategies,
  classifyRisk,
} from "./business/evaluate_strategies";
export { DEFAULT_STRATEGY_CATALOG } from "./business/strategy_catalog";
export {
  buildReport,
  serializeReport,
  summarizeReport,
} from "./business/build_report";
export { writeReport, readReport } from "./infrastructure/report_writer";
export { AnalysisReportSchema } from "./schema/report_schema";
export {
  createAnalysisContext,
  computeReport,
  runAnalysis,
  type AnalysisContext,
} from "./application/run_analysis";
export { runCli, parseCliArgs } from "./application/cli";
export {
  loadAnalysisConfig,
  type AnalysisConfig,
} from "../config/analysis_config";
export * from "../util/errors";
