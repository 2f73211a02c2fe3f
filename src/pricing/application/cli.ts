/**
 * Command-line surface: `copper-analysis [start_date end_date]`.
 *
 * Exit codes: 0 success, 1 analysis failure, 2 usage error.
 */
import { z } from "zod";
import { describeError, isAnalysisError } from "../../util/errors";
import { getLogger } from "../../util/logger";
import { isIsoDate } from "../business/calendar";
import { summarizeReport } from "../business/build_report";
import type { DateRange } from "../domain/types";
import {
  createAnalysisContext,
  runAnalysis,
  type AnalysisContext,
} from "./run_analysis";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE =
  "Usage: copper-analysis [start_date end_date]  (dates as YYYY-MM-DD)";

export type ParseResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string };

const IsoDateArg = z
  .string()
  .refine(isIsoDate, value => ({
    message: `Invalid date "${value}", expected YYYY-MM-DD`,
  }));

export function parseCliArgs(args: readonly string[]): ParseResult<DateRange> {
  if (args.length === 0) return { ok: true, data: {} };
  if (args.length !== 2) {
    return {
      ok: false,
      error: `Expected zero or two arguments, got ${args.length}`,
    };
  }
  const parsed = z.tuple([IsoDateArg, IsoDateArg]).safeParse(args);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues[0].message };
  }
  const [start, end] = parsed.data;
  return { ok: true, data: { start, end } };
}

export interface CliDependencies {
  createContext?: (range: DateRange) => AnalysisContext;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

export async function runCli(
  args: readonly string[],
  deps: CliDependencies = {}
): Promise<number> {
  const logger = getLogger("pricing/cli");
  // eslint-disable-next-line no-console
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  // eslint-disable-next-line no-console
  const stderr = deps.stderr ?? ((line: string) => console.error(line));

  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    stderr(parsed.error);
    stderr(USAGE);
    return EXIT_USAGE;
  }
  const range = parsed.data;

  try {
    const context = deps.createContext
      ? deps.createContext(range)
      : createAnalysisContext({ range });
    const { report, written } = await runAnalysis(context, range);
    for (const line of summarizeReport(report)) stdout(line);
    stdout(`Results saved to ${written.outputPath}`);
    return EXIT_OK;
  } catch (err) {
    const kind = isAnalysisError(err) ? err.kind : "UnexpectedError";
    logger.error({ kind, err }, "analysis failed");
    stderr(`${kind}: ${describeError(err)}`);
    return EXIT_FAILURE;
  }
}
