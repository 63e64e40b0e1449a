#!/usr/bin/env node
import { loadConfig, loadEnvFiles } from "./config";
import { createHttpClient } from "./core/utils";
import { createLogger } from "./logger";
import { runPipeline } from "./pipeline";

async function main(): Promise<void> {
  loadEnvFiles();
  const config = loadConfig();
  const logger = createLogger(config.logLevel, config.logFile);

  console.log("Listing Price Tracker v1.0\n");

  try {
    const summary = await runPipeline(config, {
      http: createHttpClient(config.httpTimeoutMs),
      logger,
    });
    console.log(`\nDone in ${summary.elapsed_time}`);
    console.log(`   Rows:     ${summary.rows_written}/${summary.rows_fetched} written`);
    console.log(`   Products: ${summary.products}`);
    console.log(`   Charts:   ${summary.charts.length}`);
    console.log(`   Gallery:  ${summary.gallery_path}`);
  } catch (err) {
    logger.fatal({ err }, "Pipeline failed");
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${msg}`);
  process.exitCode = 1;
});
