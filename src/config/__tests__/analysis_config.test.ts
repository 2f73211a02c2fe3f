import path from "path";
import { loadAnalysisConfig } from "@src/config/analysis_config";
import { ConfigError } from "@src/util/errors";

describe("loadAnalysisConfig", () => {
  const originalEnv = process.env;
  const baseDir = path.resolve("/srv/copper");

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith("COPPER_")) delete process.env[key];
    }
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  it("resolves defaults against the base directory", () => {
    const config = loadAnalysisConfig(baseDir);
    expect(config.csvPath).toBe(
      path.join(baseDir, "data", "lme_copper_historical_data.csv")
    );
    expect(config.outputPath).toBe(
      path.join(baseDir, "output", "analysis_results.json")
    );
    expect(config.backupDir).toBe(path.join(baseDir, "output", "backups"));
    expect(config.dashboardPath).toBe(
      path.join(baseDir, "analysis_results.json")
    );
    expect(config.columns).toEqual({
      date: "date",
      settlement: "lme_copper_cash_settlement",
      threeMonth: "lme_copper_3_month",
      stock: "lme_copper_stock",
    });
    expect(config.risk).toEqual({ lowPct: 1, mediumPct: 3 });
    expect(config.minMonths).toBe(2);
  });

  it("reads the price column and thresholds from the environment", () => {
    process.env.COPPER_PRICE_COLUMN = "cash";
    process.env.COPPER_RISK_LOW_PCT = "0.5";
    process.env.COPPER_RISK_MEDIUM_PCT = "2";
    const config = loadAnalysisConfig(baseDir);
    expect(config.columns.settlement).toBe("cash");
    expect(config.risk).toEqual({ lowPct: 0.5, mediumPct: 2 });
  });

  it("rejects thresholds in the wrong order", () => {
    expect(() =>
      loadAnalysisConfig(baseDir, { riskLowPct: 5, riskMediumPct: 3 })
    ).toThrow(ConfigError);
  });

  it("rejects a minimum below two months", () => {
    expect(() => loadAnalysisConfig(baseDir, { minMonths: 1 })).toThrow(
      /minMonths/
    );
  });
});
