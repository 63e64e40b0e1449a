import type { AxiosInstance } from "axios";
import type { Logger } from "pino";
import { FetchError } from "../core/errors";
import { getErrorMessage, getErrorStatus, withRetry } from "../core/utils";
import type { ExtractionRules, ListingResult, ScrapedRow } from "../types";
import { extractRowsFromHtml } from "./extractor";

export interface FetcherDeps {
  http: AxiosInstance;
  rules: ExtractionRules;
  logger: Logger;
  /** Extra attempts after a failed request (default 0) */
  retries?: number;
  retryDelayMs?: number;
}

async function fetchHtml(url: string, http: AxiosInstance): Promise<string> {
  const response = await http.get<string>(url, { responseType: "text" });
  if (response.status < 200 || response.status >= 300) {
    throw new FetchError(url, response.status, response.statusText);
  }
  return response.data;
}

/**
 * Fetch one listing page and extract its product rows.
 * Request and status failures become `{ success: false }`; nothing is thrown for them.
 */
export async function fetchListing(
  url: string,
  deps: FetcherDeps
): Promise<ListingResult> {
  let html: string;
  try {
    html = await withRetry(
      () => fetchHtml(url, deps.http),
      deps.retries ?? 0,
      deps.retryDelayMs ?? 1000
    );
  } catch (err) {
    return {
      success: false,
      error: {
        url,
        status_code: getErrorStatus(err),
        error_message: getErrorMessage(err),
      },
    };
  }

  const { rows, skipped } = extractRowsFromHtml(html, deps.rules);
  for (const s of skipped) {
    deps.logger.warn(
      { url, container: s.index, missing: s.missing },
      "Skipped malformed product container"
    );
  }

  return { success: true, url, rows };
}

/**
 * Scrape product rows from a listing page.
 * A failed request is logged once and yields no rows, so the run can move on.
 */
export async function scrapePrices(
  url: string,
  deps: FetcherDeps
): Promise<ScrapedRow[]> {
  const result = await fetchListing(url, deps);
  if (!result.success) {
    deps.logger.error(
      { url, status: result.error.status_code },
      `Error scraping ${url}: ${result.error.error_message}`
    );
    return [];
  }
  return result.rows;
}
