import * as fs from "fs";
import * as path from "path";
import dayjs from "dayjs";
import { readCsvTable, toCsvLine } from "../core/csv";
import { compareText } from "../core/utils";
import type { PriceObservation, ScrapedRow } from "../types";

export const LEDGER_HEADER = ["Name", "Price", "Brand", "Date"] as const;

export interface LedgerWriterDeps {
  scrape: (url: string) => Promise<ScrapedRow[]>;
  /** Date stamp for this run's rows; defaults to today in local time */
  today?: () => string;
  onUrlDone?: (completed: number, total: number, url: string, rows: ScrapedRow[]) => void;
}

export interface LedgerWriteResult {
  ledgerPath: string;
  fetched: number;
  written: number;
}

export function todayStamp(): string {
  return dayjs().format("YYYY-MM-DD");
}

function observationKey(o: PriceObservation): string {
  return JSON.stringify([o.name, o.price, o.brand, o.date]);
}

/** Drop exact duplicates (all four fields), keeping the first occurrence. */
export function dedupeObservations(rows: PriceObservation[]): PriceObservation[] {
  const seen = new Set<string>();
  return rows.filter((row) => {
    const key = observationKey(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** Stable sort by product name. */
export function sortByName<T extends { name: string }>(rows: T[]): T[] {
  return [...rows].sort((a, b) => compareText(a.name, b.name));
}

function observationLine(o: PriceObservation): string {
  return toCsvLine([o.name, o.price, o.brand, o.date]);
}

/**
 * Append observations to the ledger. The header is written first only when
 * the file does not exist yet or is empty.
 * @returns Number of rows appended
 */
export function appendObservations(
  ledgerPath: string,
  rows: PriceObservation[]
): number {
  fs.mkdirSync(path.dirname(ledgerPath), { recursive: true });
  const isEmpty = !fs.existsSync(ledgerPath) || fs.statSync(ledgerPath).size === 0;

  const lines = rows.map(observationLine);
  if (isEmpty) lines.unshift(toCsvLine(LEDGER_HEADER));
  if (lines.length > 0) {
    fs.appendFileSync(ledgerPath, lines.join("\n") + "\n", "utf-8");
  }
  return rows.length;
}

/** Read every observation from the ledger, in file order. */
export function readLedger(ledgerPath: string): PriceObservation[] {
  return readCsvTable(ledgerPath, LEDGER_HEADER).map(([name, price, brand, date]) => ({
    name,
    price,
    brand,
    date,
  }));
}

/**
 * Fetch every URL in turn, date the rows and append this run's batch to the ledger.
 * Duplicates are removed within the batch only; rows already in the file are
 * not consulted, so an identical run on the same day appends the same rows again.
 */
export async function writeLedger(
  urls: string[],
  ledgerPath: string,
  deps: LedgerWriterDeps
): Promise<LedgerWriteResult> {
  const today = (deps.today ?? todayStamp)();
  const batch: PriceObservation[] = [];

  for (const [i, url] of urls.entries()) {
    const rows = await deps.scrape(url);
    batch.push(...rows.map((row) => ({ ...row, date: today })));
    deps.onUrlDone?.(i + 1, urls.length, url, rows);
  }

  const unique = sortByName(dedupeObservations(batch));
  const written = appendObservations(ledgerPath, unique);

  return { ledgerPath, fetched: batch.length, written };
}

/**
 * Rewrite the whole ledger with exact duplicates removed and rows sorted by name.
 * Run explicitly; `writeLedger` never does this on its own.
 */
export function compactLedger(ledgerPath: string): { before: number; after: number } {
  const rows = readLedger(ledgerPath);
  const compacted = sortByName(dedupeObservations(rows));
  const lines = [toCsvLine(LEDGER_HEADER), ...compacted.map(observationLine)];

  const tmpPath = `${ledgerPath}.tmp`;
  try {
    fs.writeFileSync(tmpPath, lines.join("\n") + "\n", "utf-8");
    fs.renameSync(tmpPath, ledgerPath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }

  return { before: rows.length, after: compacted.length };
}
