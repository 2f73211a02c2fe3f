import os from "os";
import {
  computeReport,
  createAnalysisContext,
} from "@src/pricing/application/run_analysis";
import {
  serializeReport,
  validateReport,
} from "@src/pricing/business/build_report";
import { ReportValidationError } from "@src/util/errors";
import { TWO_MONTH_ROWS, seriesOf, testConfig } from "./fixtures";

const context = createAnalysisContext({
  config: testConfig(os.tmpdir()),
  now: () => new Date(2024, 2, 1, 9, 30, 15),
});
const report = computeReport(context, seriesOf(TWO_MONTH_ROWS));

describe("validateReport", () => {
  it("accepts a computed report", () => {
    expect(validateReport(report)).toEqual(report);
  });

  it("flags a NaN statistic as a report error, not an input error", () => {
    const broken = {
      ...report,
      overall_stats: { ...report.overall_stats, mean: NaN },
    };
    let caught: unknown;
    try {
      validateReport(broken);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ReportValidationError);
    expect(caught).toMatchObject({
      kind: "ReportValidationError",
      reportPath: "overall_stats.mean",
    });
  });
});

describe("serializeReport", () => {
  it("writes two-space JSON with a trailing newline", () => {
    const json = serializeReport(report);
    const head = '{\n  "period": {\n    "start": "2024-01-01",';
    expect(json.startsWith(head)).toBe(true);
    expect(json.endsWith("}\n")).toBe(true);
  });
});
