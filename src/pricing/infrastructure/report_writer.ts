/**
 * Flat-file report store.
 *
 * The previous report is copied aside before anything is overwritten, and
 * every file is written to a temporary sibling and renamed into place, so a
 * failed run leaves the last good report readable.
 */
import {
  access,
  copyFile,
  mkdir,
  readFile,
  rename,
  rm,
  writeFile,
} from "fs/promises";
import path from "path";
import { format } from "date-fns";
import {
  DataFormatError,
  IOError,
  ReportValidationError,
  describeError,
} from "../../util/errors";
import { getLogger } from "../../util/logger";
import { serializeReport, validateReport } from "../business/build_report";
import type { AnalysisReport } from "../domain/types";

export const PREVIOUS_REPORT_FILE = "analysis_results.previous.json";

export interface ReportPaths {
  outputPath: string;
  backupDir: string;
  dashboardPath: string;
}

export interface WrittenReport {
  outputPath: string;
  backupPath: string;
  previousPath: string | null;
  dashboardPath: string;
}

export function backupFileName(at: Date): string {
  return `analysis_results_${format(at, "yyyyMMdd_HHmmss")}.json`;
}

export async function writeReport(
  report: AnalysisReport,
  paths: ReportPaths,
  at: Date
): Promise<WrittenReport> {
  const logger = getLogger("pricing/report_writer");
  const { outputPath, backupDir, dashboardPath } = paths;
  const json = serializeReport(report);

  await ensureDir(path.dirname(outputPath));
  await ensureDir(backupDir);

  let previousPath: string | null = null;
  if (await fileExists(outputPath)) {
    previousPath = path.join(backupDir, PREVIOUS_REPORT_FILE);
    try {
      await copyFile(outputPath, previousPath);
    } catch (err) {
      throw new IOError(
        `Cannot back up previous report ${outputPath}: ${describeError(err)}`,
        previousPath,
        err
      );
    }
  }

  await writeAtomic(outputPath, json);
  const backupPath = path.join(backupDir, backupFileName(at));
  await writeAtomic(backupPath, json);
  if (path.resolve(dashboardPath) !== path.resolve(outputPath)) {
    await ensureDir(path.dirname(dashboardPath));
    await writeAtomic(dashboardPath, json);
  }

  logger.info(
    { outputPath, backupPath, previousPath, dashboardPath },
    "report written"
  );
  return { outputPath, backupPath, previousPath, dashboardPath };
}

/**
 * Reads and validates a persisted report. A file that does not match the
 * report shape is bad input, so it surfaces as DataFormatError.
 */
export async function readReport(filePath: string): Promise<AnalysisReport> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new IOError(
      `Cannot read report ${filePath}: ${describeError(err)}`,
      filePath,
      err
    );
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new DataFormatError(
      `Report ${filePath} is not valid JSON: ${describeError(err)}`
    );
  }
  try {
    return validateReport(parsed);
  } catch (err) {
    if (!(err instanceof ReportValidationError)) throw err;
    throw new DataFormatError(
      `Report ${filePath} failed validation at ${err.reportPath}: ` +
        err.detail,
      { column: err.reportPath }
    );
  }
}

async function writeAtomic(target: string, content: string): Promise<void> {
  const tmp = `${target}.${process.pid}.tmp`;
  try {
    await writeFile(tmp, content, "utf-8");
    await rename(tmp, target);
  } catch (err) {
    await rm(tmp, { force: true, recursive: true });
    throw new IOError(
      `Cannot write ${target}: ${describeError(err)}`,
      target,
      err
    );
  }
}

async function ensureDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw new IOError(
      `Cannot create directory ${dir}: ${describeError(err)}`,
      dir,
      err
    );
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return false;
    }
    throw new IOError(
      `Cannot access ${filePath}: ${describeError(err)}`,
      filePath,
      err
    );
  }
}
