import type { AxiosInstance } from "axios";
import type { Logger } from "pino";
import { type AppConfig, loadExtractionRules, loadTargets } from "./config";
import { renderCharts, type Rasterizer } from "./chart/renderer";
import { readUrlsFromFile } from "./core/file-reader";
import { formatDuration } from "./core/utils";
import { buildGallery } from "./gallery/builder";
import { aggregateLedger, readGroupedProducts } from "./ledger/aggregator";
import { compactLedger, writeLedger } from "./ledger/writer";
import { scrapePrices } from "./product/fetcher";
import type { PipelineSummary } from "./types";

export interface PipelineDeps {
  http: AxiosInstance;
  logger: Logger;
  today?: () => string;
  rasterize?: Rasterizer;
  /** Progress narration; defaults to console.log */
  print?: (line: string) => void;
}

/**
 * Run every stage once, in order: fetch and append to the ledger, optionally
 * compact it, aggregate, chart each filter and publish the gallery.
 */
export async function runPipeline(
  config: AppConfig,
  deps: PipelineDeps
): Promise<PipelineSummary> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const startTime = Date.now();

  const targets = loadTargets(config.targetsFile);
  const rules = loadExtractionRules(config.rulesFile);
  const urls = config.urlsFile ? readUrlsFromFile(config.urlsFile, config.urlColumn) : targets.urls;

  // ── Step 1: Scrape into the ledger ────────────────────────────────
  print(`Step 1: Scraping ${urls.length} listing pages (rules v${rules.version})...`);
  const ledger = await writeLedger(urls, config.ledgerFile, {
    scrape: (url) =>
      scrapePrices(url, {
        http: deps.http,
        rules,
        logger: deps.logger,
        retries: config.httpRetries,
        retryDelayMs: config.retryDelayMs,
      }),
    today: deps.today,
    onUrlDone: (completed, total, url, rows) => {
      print(`   [${completed}/${total}]  ${rows.length} rows  ${url}`);
    },
  });
  print(`   ${ledger.written} new rows appended to ${ledger.ledgerPath}`);

  if (config.compactLedger) {
    const { before, after } = compactLedger(config.ledgerFile);
    print(`   Compacted ledger: ${before} → ${after} rows`);
  }

  // ── Step 2: Aggregate ─────────────────────────────────────────────
  print("\nStep 2: Grouping prices by product...");
  const grouped = aggregateLedger(config.ledgerFile, config.groupedFile);
  print(`   ${config.groupedFile} (${grouped.length} products)`);

  // ── Step 3: Charts ────────────────────────────────────────────────
  print(`\nStep 3: Rendering ${targets.filters.length} charts...`);
  const charts = await renderCharts(targets.filters, readGroupedProducts(config.groupedFile), {
    outputDir: config.outputDir,
    fontFamily: config.chartFontFamily,
    yLabel: config.chartYLabel,
    rasterize: deps.rasterize,
  });
  for (const chart of charts) {
    print(`   ${chart.imagePath} (${chart.series.length} products)`);
  }

  // ── Step 4: Gallery ───────────────────────────────────────────────
  print("\nStep 4: Building gallery...");
  const gallery = buildGallery(config.outputDir, config.galleryFile);
  print(`   ${gallery.galleryPath} (${gallery.images.length} images)`);

  const summary: PipelineSummary = {
    urls: urls.length,
    rows_fetched: ledger.fetched,
    rows_written: ledger.written,
    products: grouped.length,
    charts: charts.map((c) => c.imagePath),
    gallery_path: gallery.galleryPath,
    elapsed_time: formatDuration(Date.now() - startTime),
    finished_at: new Date().toISOString(),
  };
  deps.logger.info(summary, "Pipeline finished");
  return summary;
}
