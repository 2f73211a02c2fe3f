import path from "path";
import type { AnalysisConfig } from "@src/config/analysis_config";
import type { Series } from "@src/pricing/domain/types";

/**
 * Two months of made-up settlements. 2024-01-01 is a Monday.
 *
 *   Jan: Mon 100, Tue 110, Wed 90, Mon 102, Tue 98    (mean 100)
 *   Feb: Mon 120, Tue 130, Wed 110                    (mean 120)
 */
export const TWO_MONTH_ROWS: Array<[string, number]> = [
  ["2024-01-01", 100],
  ["2024-01-02", 110],
  ["2024-01-03", 90],
  ["2024-01-08", 102],
  ["2024-01-09", 98],
  ["2024-02-05", 120],
  ["2024-02-06", 130],
  ["2024-02-07", 110],
];

export function seriesOf(
  rows: ReadonlyArray<[string, number]>,
  source = "memory.csv"
): Series {
  return {
    records: rows.map(([date, settlementPrice]) => ({ date, settlementPrice })),
    droppedRows: 0,
    duplicateDates: 0,
    source,
  };
}

export function csvOf(rows: ReadonlyArray<[string, number]>): string {
  const lines = [
    "date,lme_copper_cash_settlement,lme_copper_3_month,lme_copper_stock",
  ];
  for (const [date, price] of rows) {
    lines.push(`${date},${price},${price + 5},1000`);
  }
  return `${lines.join("\n")}\n`;
}

export function testConfig(baseDir: string): AnalysisConfig {
  return {
    stage: "test",
    baseDir,
    csvPath: path.join(baseDir, "data", "prices.csv"),
    outputPath: path.join(baseDir, "output", "analysis_results.json"),
    backupDir: path.join(baseDir, "output", "backups"),
    dashboardPath: path.join(baseDir, "analysis_results.json"),
    columns: {
      date: "date",
      settlement: "lme_copper_cash_settlement",
      threeMonth: "lme_copper_3_month",
      stock: "lme_copper_stock",
    },
    risk: { lowPct: 1, mediumPct: 3 },
    minMonths: 2,
  };
}
