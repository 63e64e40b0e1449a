import * as cheerio from "cheerio";
import type { ExtractionRules, ScrapedRow } from "../types";

type RowField = keyof ScrapedRow;

const ROW_FIELDS: RowField[] = ["name", "price", "brand"];

/** A product container that lacked an expected descendant, or had a blank name or price */
export interface SkippedContainer {
  index: number;
  missing: RowField[];
}

export interface ExtractionResult {
  rows: ScrapedRow[];
  skipped: SkippedContainer[];
}

/**
 * Normalize listing price text: trim and drop thousands-separator commas.
 * "1,234.50" → "1234.50"
 */
export function normalizePriceText(raw: string): string {
  return raw.trim().replace(/,/g, "");
}

/**
 * Extract one row per product container matched by `rules.container`.
 * A container missing its name, price or brand element, or whose name or
 * price is blank, is reported in `skipped` and does not stop extraction of
 * the remaining containers.
 */
export function extractRows(
  $: cheerio.CheerioAPI,
  rules: ExtractionRules
): ExtractionResult {
  const rows: ScrapedRow[] = [];
  const skipped: SkippedContainer[] = [];

  $(rules.container).each((index, el) => {
    const $el = $(el);
    const found = {
      name: $el.find(rules.name).first(),
      price: $el.find(rules.price).first(),
      brand: $el.find(rules.brand).first(),
    };

    const row: ScrapedRow = {
      name: found.name.text().trim(),
      price: normalizePriceText(found.price.text()),
      brand: found.brand.text().trim(),
    };

    // An element that is present but blank counts as missing; brand may be blank
    const missing = ROW_FIELDS.filter(
      (field) => found[field].length === 0 || (field !== "brand" && row[field] === "")
    );
    if (missing.length > 0) {
      skipped.push({ index, missing });
      return;
    }

    rows.push(row);
  });

  return { rows, skipped };
}

/** Load raw HTML and extract product rows from it. */
export function extractRowsFromHtml(
  html: string,
  rules: ExtractionRules
): ExtractionResult {
  return extractRows(cheerio.load(html), rules);
}
