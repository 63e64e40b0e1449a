/** One product row extracted from a listing page, before it is dated */
export interface ScrapedRow {
  name: string;
  /** Decimal number as text, thousands separators removed */
  price: string;
  brand: string;
}

/** A dated price observation: one row of the ledger CSV */
export interface PriceObservation extends ScrapedRow {
  /** Calendar date, YYYY-MM-DD */
  date: string;
}

/** All prices ever observed for one product name, in ledger row order */
export interface GroupedProduct {
  name: string;
  prices: string[];
}

/** CSS selectors describing where product data lives in a listing page */
export interface ExtractionRules {
  version: number;
  site?: string;
  container: string;
  name: string;
  price: string;
  brand: string;
}

/** URL list and chart filters for one run */
export interface Targets {
  urls: string[];
  filters: string[];
}

/** Record for a URL that failed to fetch */
export interface FetchFailure {
  url: string;
  status_code: number | null;
  error_message: string;
}

/** Result of fetching a single listing page: discriminated union */
export type ListingResult =
  | { success: true; url: string; rows: ScrapedRow[] }
  | { success: false; error: FetchFailure };

export interface ChartSeries {
  name: string;
  values: number[];
}

/** One rendered chart: the filter, the series drawn, and where the PNG went */
export interface ChartSpec {
  filter: string;
  series: ChartSeries[];
  imagePath: string;
}

/** Statistics printed after a pipeline run completes */
export interface PipelineSummary {
  urls: number;
  rows_fetched: number;
  rows_written: number;
  products: number;
  charts: string[];
  gallery_path: string;
  elapsed_time: string;
  finished_at: string;
}
