/**
 * Series Loader: turns raw CSV cells into a validated, date-sorted series.
 */
import type { ColumnConfig } from "../../config/analysis_config";
import { DataFormatError, DateRangeError } from "../../util/errors";
import { getLogger } from "../../util/logger";
import type { DateRange, PriceRecord, Series } from "../domain/types";
import {
  readPriceTable,
  type RawPriceTable,
} from "../infrastructure/csv_reader";
import { normalizeDate } from "./calendar";

export async function loadSeries(
  filePath: string,
  columns: ColumnConfig
): Promise<Series> {
  const table = await readPriceTable(filePath);
  return buildSeries(table, columns, filePath);
}

/**
 * Rows with a blank settlement price are dropped and counted. Duplicate dates
 * are resolved last-write-wins: a later row replaces an earlier one.
 */
export function buildSeries(
  table: RawPriceTable,
  columns: ColumnConfig,
  source: string
): Series {
  const logger = getLogger("pricing/load_series");
  const header = table.header.map(h => h.trim());
  const dateIdx = requireColumn(header, columns.date);
  const priceIdx = requireColumn(header, columns.settlement);
  const threeMonthIdx = header.indexOf(columns.threeMonth);
  const stockIdx = header.indexOf(columns.stock);

  const byDate = new Map<string, PriceRecord>();
  let droppedRows = 0;
  let duplicateDates = 0;

  table.rows.forEach((cells, i) => {
    const row = i + 1;
    const rawPrice = cells[priceIdx] ?? "";
    if (rawPrice === "") {
      droppedRows++;
      return;
    }

    const rawDate = cells[dateIdx] ?? "";
    const date = normalizeDate(rawDate);
    if (!date) {
      throw new DataFormatError(
        `Row ${row}, column "${columns.date}": unparseable date "${rawDate}"`,
        { row, column: columns.date }
      );
    }

    const settlementPrice = parseNumber(rawPrice, row, columns.settlement);
    if (settlementPrice <= 0) {
      throw new DataFormatError(
        `Row ${row}, column "${columns.settlement}": ` +
          `price must be positive, got ${rawPrice}`,
        { row, column: columns.settlement }
      );
    }

    const record: PriceRecord = { date, settlementPrice };
    const threeMonth = optionalNumber(
      cells,
      threeMonthIdx,
      row,
      columns.threeMonth
    );
    if (threeMonth !== undefined) record.threeMonthPrice = threeMonth;
    const stock = optionalNumber(cells, stockIdx, row, columns.stock);
    if (stock !== undefined) record.stock = stock;

    if (byDate.has(date)) duplicateDates++;
    byDate.set(date, Object.freeze(record));
  });

  if (byDate.size === 0) {
    throw new DataFormatError(`No usable price rows in ${source}`, {
      column: columns.settlement,
    });
  }

  const records = [...byDate.values()].sort((a, b) =>
    a.date < b.date ? -1 : a.date > b.date ? 1 : 0
  );
  logger.info(
    {
      source,
      records: records.length,
      droppedRows,
      duplicateDates,
      from: records[0].date,
      to: records[records.length - 1].date,
    },
    "price series loaded"
  );

  return Object.freeze({
    records: Object.freeze(records),
    droppedRows,
    duplicateDates,
    source,
  });
}

/**
 * Inclusive date filter. Either bound may be omitted.
 */
export function filterSeries(series: Series, range: DateRange): Series {
  const { start, end } = range;
  if (start && end && start > end) {
    throw new DateRangeError(`Start date ${start} is after end date ${end}`);
  }
  const records = series.records.filter(
    r => (!start || r.date >= start) && (!end || r.date <= end)
  );
  if (records.length === 0) {
    throw new DateRangeError(
      "No data available for the selected period " +
        `${start ?? "..."} to ${end ?? "..."}`
    );
  }
  return Object.freeze({ ...series, records: Object.freeze(records) });
}

function requireColumn(header: string[], column: string): number {
  const idx = header.indexOf(column);
  if (idx < 0) {
    throw new DataFormatError(`Missing required column "${column}"`, {
      column,
    });
  }
  return idx;
}

/** Plain decimals, optionally with well-formed thousands groups: 9,100.50 */
const DECIMAL_PATTERN = /^[+-]?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?$/;

function parseNumber(raw: string, row: number, column: string): number {
  const n = DECIMAL_PATTERN.test(raw) ? Number(raw.replace(/,/g, "")) : NaN;
  if (!Number.isFinite(n)) {
    throw new DataFormatError(
      `Row ${row}, column "${column}": not a number "${raw}"`,
      { row, column }
    );
  }
  return n;
}

function optionalNumber(
  cells: string[],
  idx: number,
  row: number,
  column: string
): number | undefined {
  if (idx < 0) return undefined;
  const raw = cells[idx] ?? "";
  return raw === "" ? undefined : parseNumber(raw, row, column);
}
