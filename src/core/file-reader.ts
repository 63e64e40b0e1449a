import * as fs from "fs";
import * as path from "path";
import { parse } from "csv-parse/sync";
import * as XLSX from "xlsx";
import { ConfigError } from "./errors";

// The ESM build of xlsx does not load fs on its own
XLSX.set_fs(fs);

const URL_COLUMN_NAMES = ["url", "link", "href", "address", "uri"];

/**
 * Read listing URLs from a CSV or XLSX file.
 * @param filePath - Path to the file
 * @param columnName - Header of the URL column; guessed from common names when omitted
 */
export function readUrlsFromFile(filePath: string, columnName?: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`URL list file not found: ${filePath}`);
  }
  const ext = path.extname(filePath).toLowerCase();
  let rows: string[][];
  if (ext === ".csv") {
    rows = readCsvRows(filePath);
  } else if (ext === ".xlsx" || ext === ".xls") {
    rows = readXlsxRows(filePath);
  } else {
    throw new ConfigError(
      `Unsupported file type "${ext}". Only .csv and .xlsx/.xls are supported.`
    );
  }

  if (rows.length === 0) {
    throw new ConfigError(`File "${filePath}" is empty.`);
  }

  const [headers, ...data] = rows;
  const colIdx = findUrlColumn(headers, columnName);
  return data
    .map((row) => (row[colIdx] ?? "").trim())
    .filter(isValidUrl);
}

// ── Internals ────────────────────────────────────────────────────────────────

function findUrlColumn(headers: string[], preferred?: string): number {
  if (preferred) {
    const idx = headers.findIndex(
      (h) => h.trim().toLowerCase() === preferred.trim().toLowerCase()
    );
    if (idx === -1) {
      throw new ConfigError(
        `Column "${preferred}" not found. ` +
          `Available headers: ${headers.map((h) => `"${h}"`).join(", ")}`
      );
    }
    return idx;
  }

  for (const name of URL_COLUMN_NAMES) {
    const idx = headers.findIndex((h) => h.trim().toLowerCase() === name);
    if (idx !== -1) return idx;
  }

  throw new ConfigError(
    `No URL column found automatically. ` +
      `Headers present: ${headers.map((h) => `"${h}"`).join(", ")}. ` +
      `Set URL_COLUMN to the correct column.`
  );
}

function isValidUrl(str: string): boolean {
  try {
    const u = new URL(str);
    return u.protocol === "http:" || u.protocol === "https:";
  } catch {
    return false;
  }
}

function readCsvRows(filePath: string): string[][] {
  return parse(fs.readFileSync(filePath, "utf-8"), {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
}

function readXlsxRows(filePath: string): string[][] {
  const wb = XLSX.readFile(filePath);
  const sheetName = wb.SheetNames[0];
  if (!sheetName) return [];

  // header:1 → array of arrays; first row is headers
  const rows = XLSX.utils.sheet_to_json<unknown[]>(wb.Sheets[sheetName], { header: 1 });
  return rows.map((row) => row.map((cell) => String(cell ?? "")));
}
