import * as fs from "fs";
import { parse } from "csv-parse/sync";
import { LedgerError } from "./errors";

/**
 * Escape a value for safe inclusion in a CSV cell.
 * Wraps in double quotes if the value contains commas, quotes, or newlines.
 */
export function escapeCsv(value: string | number | null | undefined): string {
  const str = value == null ? "" : String(value);
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/** Join already-ordered cell values into one CSV line (no trailing newline). */
export function toCsvLine(cells: ReadonlyArray<string | number>): string {
  return cells.map(escapeCsv).join(",");
}

/**
 * Read a CSV file whose first row must equal `header`.
 * Returns the data rows only; every row has exactly `header.length` cells.
 * @param filePath - CSV file to read
 * @param header - Expected column names, in order
 */
export function readCsvTable(filePath: string, header: readonly string[]): string[][] {
  if (!fs.existsSync(filePath)) {
    throw new LedgerError(filePath, "file does not exist");
  }

  const content = fs.readFileSync(filePath, "utf-8");
  let records: string[][];
  try {
    records = parse(content, { bom: true, skip_empty_lines: true });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new LedgerError(filePath, `malformed CSV (${msg})`);
  }

  if (records.length === 0) {
    throw new LedgerError(filePath, "file is empty");
  }

  const [found, ...rows] = records;
  if (found.length !== header.length || found.some((h, i) => h.trim() !== header[i])) {
    throw new LedgerError(
      filePath,
      `expected header "${header.join(",")}", found "${found.join(",")}"`
    );
  }

  return rows;
}
