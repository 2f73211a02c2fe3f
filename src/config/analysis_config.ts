import path from "path";
import { z } from "zod";
import { getNumber, getStage, getString } from "../util/env";
import { ConfigError } from "../util/errors";

export interface ColumnConfig {
  date: string;
  settlement: string;
  threeMonth: string;
  stock: string;
}

export interface RiskThresholds {
  /** Performance std (percent) below which a strategy is Low risk. */
  lowPct: number;
  /** Below this it is Medium, otherwise High. */
  mediumPct: number;
}

export interface AnalysisConfig {
  stage: string;
  baseDir: string;
  csvPath: string;
  outputPath: string;
  backupDir: string;
  dashboardPath: string;
  columns: ColumnConfig;
  risk: RiskThresholds;
  minMonths: number;
}

export const OUTPUT_FILE_NAME = "analysis_results.json";

const AnalysisConfigSchema = z
  .object({
    dataDir: z.string().min(1),
    csvFile: z.string().min(1),
    outputDir: z.string().min(1),
    backupDir: z.string().min(1),
    dashboardFile: z.string().min(1),
    priceColumn: z.string().min(1),
    threeMonthColumn: z.string().min(1),
    stockColumn: z.string().min(1),
    riskLowPct: z.number().positive(),
    riskMediumPct: z.number().positive(),
    minMonths: z.number().int().min(2),
  })
  .refine(v => v.riskLowPct < v.riskMediumPct, {
    message: "COPPER_RISK_LOW_PCT must be lower than COPPER_RISK_MEDIUM_PCT",
    path: ["riskLowPct"],
  });

export type AnalysisConfigOverrides = Partial<
  z.input<typeof AnalysisConfigSchema>
>;

/**
 * Resolves the run configuration from the environment. Relative paths are
 * anchored at `baseDir` (the working directory by default).
 */
export function loadAnalysisConfig(
  baseDir: string = process.cwd(),
  overrides: AnalysisConfigOverrides = {}
): AnalysisConfig {
  const parsed = AnalysisConfigSchema.safeParse({
    dataDir: getString("COPPER_DATA_DIR", "data"),
    csvFile: getString("COPPER_CSV_FILE", "lme_copper_historical_data.csv"),
    outputDir: getString("COPPER_OUTPUT_DIR", "output"),
    backupDir: getString("COPPER_BACKUP_DIR", path.join("output", "backups")),
    dashboardFile: getString("COPPER_DASHBOARD_FILE", OUTPUT_FILE_NAME),
    priceColumn: getString("COPPER_PRICE_COLUMN", "lme_copper_cash_settlement"),
    threeMonthColumn: getString(
      "COPPER_THREE_MONTH_COLUMN",
      "lme_copper_3_month"
    ),
    stockColumn: getString("COPPER_STOCK_COLUMN", "lme_copper_stock"),
    riskLowPct: getNumber("COPPER_RISK_LOW_PCT", 1),
    riskMediumPct: getNumber("COPPER_RISK_MEDIUM_PCT", 3),
    minMonths: getNumber("COPPER_MIN_MONTHS", 2),
    ...overrides,
  });

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid analysis configuration: ${detail}`);
  }

  const v = parsed.data;
  const resolve = (p: string) => path.resolve(baseDir, p);
  return {
    stage: getStage(),
    baseDir: path.resolve(baseDir),
    csvPath: resolve(path.join(v.dataDir, v.csvFile)),
    outputPath: resolve(path.join(v.outputDir, OUTPUT_FILE_NAME)),
    backupDir: resolve(v.backupDir),
    dashboardPath: resolve(v.dashboardFile),
    columns: {
      date: "date",
      settlement: v.priceColumn,
      threeMonth: v.threeMonthColumn,
      stock: v.stockColumn,
    },
    risk: { lowPct: v.riskLowPct, mediumPct: v.riskMediumPct },
    minMonths: v.minMonths,
  };
}
