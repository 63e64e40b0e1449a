import * as fs from "fs";
import * as path from "path";
import { readCsvTable, toCsvLine } from "../core/csv";
import { compareText } from "../core/utils";
import type { GroupedProduct, PriceObservation } from "../types";
import { readLedger } from "./writer";

export const GROUPED_HEADER = ["Name", "Prices"] as const;

/**
 * Group observations by product name. Prices keep their ledger row order;
 * groups are returned sorted by name.
 */
export function groupByName(observations: PriceObservation[]): GroupedProduct[] {
  const groups = new Map<string, string[]>();
  for (const o of observations) {
    const prices = groups.get(o.name);
    if (prices) prices.push(o.price);
    else groups.set(o.name, [o.price]);
  }
  return Array.from(groups, ([name, prices]) => ({ name, prices })).sort((a, b) =>
    compareText(a.name, b.name)
  );
}

/**
 * ["120.5", "130.0"] → "[120.5,130.0]"
 * A blank price is written as `""` so it stays distinguishable from an empty list.
 */
export function serializePrices(prices: string[]): string {
  return `[${prices.map((p) => (p.trim() === "" ? '""' : p)).join(",")}]`;
}

/** Overwrite the aggregate CSV with one `Name,Prices` row per product. */
export function writeGroupedProducts(groupedPath: string, products: GroupedProduct[]): void {
  fs.mkdirSync(path.dirname(groupedPath), { recursive: true });
  const lines = [
    toCsvLine(GROUPED_HEADER),
    ...products.map((p) => toCsvLine([p.name, serializePrices(p.prices)])),
  ];
  fs.writeFileSync(groupedPath, lines.join("\n") + "\n", "utf-8");
}

/**
 * Read the aggregate CSV back. Prices stay in their serialized list form;
 * the chart renderer parses them.
 */
export function readGroupedProducts(groupedPath: string): Array<{ name: string; prices: string }> {
  return readCsvTable(groupedPath, GROUPED_HEADER).map(([name, prices]) => ({ name, prices }));
}

/** Rebuild the aggregate file from the full ledger. */
export function aggregateLedger(ledgerPath: string, groupedPath: string): GroupedProduct[] {
  const products = groupByName(readLedger(ledgerPath));
  writeGroupedProducts(groupedPath, products);
  return products;
}
