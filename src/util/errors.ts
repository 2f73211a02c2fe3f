/**
 * Error taxonomy for the analysis pipeline. Every error thrown on purpose
 * carries a `kind` discriminator so the command line can report it without
 * instanceof chains.
 */

export type AnalysisErrorKind =
  | "DataFormatError"
  | "RangeError"
  | "InsufficientDataError"
  | "IOError"
  | "StrategyDefinitionError"
  | "ConfigError"
  | "ReportValidationError";

export abstract class AnalysisError extends Error {
  abstract readonly kind: AnalysisErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DataFormatError extends AnalysisError {
  readonly kind = "DataFormatError";
  readonly row?: number;
  readonly column?: string;

  constructor(
    message: string,
    location: { row?: number; column?: string } = {}
  ) {
    super(message);
    this.row = location.row;
    this.column = location.column;
  }
}

/** Invalid or empty date-range filter. Reported with kind "RangeError". */
export class DateRangeError extends AnalysisError {
  readonly kind = "RangeError";
}

export class InsufficientDataError extends AnalysisError {
  readonly kind = "InsufficientDataError";

  constructor(
    readonly monthsFound: number,
    readonly monthsRequired: number
  ) {
    super(
      `Strategy evaluation needs at least ${monthsRequired} calendar months ` +
        `of data, found ${monthsFound}`
    );
  }
}

export class IOError extends AnalysisError {
  readonly kind = "IOError";

  constructor(
    message: string,
    readonly path: string,
    cause?: unknown
  ) {
    super(message, { cause });
  }
}

export class StrategyDefinitionError extends AnalysisError {
  readonly kind = "StrategyDefinitionError";
}

export class ConfigError extends AnalysisError {
  readonly kind = "ConfigError";
}

/**
 * A computed report broke the dashboard contract, e.g. a statistic came out
 * as NaN. Points at the offending report field, not at an input row.
 */
export class ReportValidationError extends AnalysisError {
  readonly kind = "ReportValidationError";

  constructor(
    readonly reportPath: string,
    readonly detail: string
  ) {
    super(`Report failed validation at ${reportPath}: ${detail}`);
  }
}

export function isAnalysisError(err: unknown): err is AnalysisError {
  return err instanceof AnalysisError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
