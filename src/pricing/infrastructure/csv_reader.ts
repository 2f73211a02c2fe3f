/**
 * CSV access for the settlement price history.
 *
 * Returns the header and the raw string cells; typing and validation of the
 * cells happens in the loader so that errors can name the row and column.
 */
import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { DataFormatError, IOError, describeError } from "../../util/errors";
import { getLogger } from "../../util/logger";

export interface RawPriceTable {
  header: string[];
  /** Data rows in file order, header excluded. */
  rows: string[][];
}

const CellsSchema = z.array(z.array(z.string()));

export function parsePriceTable(
  content: string,
  source: string
): RawPriceTable {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw new DataFormatError(
      `Malformed CSV in ${source}: ${describeError(err)}`
    );
  }

  const cells = CellsSchema.parse(parsed);
  const [header, ...rows] = cells;
  if (!header || header.length === 0) {
    throw new DataFormatError(`CSV ${source} has no header row`);
  }
  return { header, rows };
}

export async function readPriceTable(filePath: string): Promise<RawPriceTable> {
  const logger = getLogger("pricing/csv_reader");
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new IOError(
      `Cannot read price history ${filePath}: ${describeError(err)}`,
      filePath,
      err
    );
  }
  const table = parsePriceTable(content, filePath);
  logger.debug(
    { filePath, columns: table.header, rowCount: table.rows.length },
    "price table read"
  );
  return table;
}
