import { config as loadEnv } from "dotenv";
import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ConfigError } from "./core/errors";
import type { ExtractionRules, Targets } from "./types";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  OUTPUT_DIR: z.string().min(1).default("./results"),
  LEDGER_FILE: z.string().optional(),
  GROUPED_FILE: z.string().optional(),
  GALLERY_FILE: z.string().min(1).default("./plot_gallery.html"),
  LOG_FILE: z.string().min(1).default("./scraper.log"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  HTTP_RETRIES: z.coerce.number().int().min(0).default(0),
  RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  TARGETS_FILE: z.string().min(1).default("./config/targets.json"),
  URLS_FILE: z.string().optional(),
  URL_COLUMN: z.string().optional(),
  RULES_FILE: z.string().min(1).default("./config/extraction-rules.json"),
  CHART_FONT_FAMILY: z.string().min(1).default("Sarabun, sans-serif"),
  CHART_Y_LABEL: z.string().min(1).default("Price (Baht)"),
  COMPACT_LEDGER: booleanFlag,
});

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

/** Resolved run configuration; every path is absolute */
export interface AppConfig {
  outputDir: string;
  ledgerFile: string;
  groupedFile: string;
  galleryFile: string;
  logFile: string;
  logLevel: LogLevel;
  httpTimeoutMs: number;
  httpRetries: number;
  retryDelayMs: number;
  targetsFile: string;
  urlsFile: string | null;
  urlColumn: string | undefined;
  rulesFile: string;
  chartFontFamily: string;
  chartYLabel: string;
  compactLedger: boolean;
}

const targetsSchema = z.object({
  urls: z.array(z.string().url()),
  filters: z.array(z.string().min(1)),
});

const rulesSchema = z.object({
  version: z.number().int().positive(),
  site: z.string().optional(),
  container: z.string().min(1),
  name: z.string().min(1),
  price: z.string().min(1),
  brand: z.string().min(1),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function readJsonFile(filePath: string, label: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`${label} file not found: ${filePath}`);
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${label} file ${filePath} is not valid JSON: ${msg}`);
  }
}

/**
 * Load `.env` then `.env.local` from `cwd`, when they exist.
 * Later files override earlier ones.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  for (const name of [".env", ".env.local"]) {
    const envPath = path.resolve(cwd, name);
    if (fs.existsSync(envPath)) {
      loadEnv({ path: envPath, override: true });
    }
  }
}

/**
 * Validate environment variables and resolve every path against `cwd`.
 * @throws ConfigError listing each invalid variable
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(parsed.error)}`);
  }
  const e = parsed.data;
  const outputDir = path.resolve(cwd, e.OUTPUT_DIR);

  return {
    outputDir,
    ledgerFile: e.LEDGER_FILE
      ? path.resolve(cwd, e.LEDGER_FILE)
      : path.join(outputDir, "product_price.csv"),
    groupedFile: e.GROUPED_FILE
      ? path.resolve(cwd, e.GROUPED_FILE)
      : path.join(outputDir, "grouped_product_prices.csv"),
    galleryFile: path.resolve(cwd, e.GALLERY_FILE),
    logFile: path.resolve(cwd, e.LOG_FILE),
    logLevel: e.LOG_LEVEL,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    httpRetries: e.HTTP_RETRIES,
    retryDelayMs: e.RETRY_DELAY_MS,
    targetsFile: path.resolve(cwd, e.TARGETS_FILE),
    urlsFile: e.URLS_FILE ? path.resolve(cwd, e.URLS_FILE) : null,
    urlColumn: e.URL_COLUMN,
    rulesFile: path.resolve(cwd, e.RULES_FILE),
    chartFontFamily: e.CHART_FONT_FAMILY,
    chartYLabel: e.CHART_Y_LABEL,
    compactLedger: e.COMPACT_LEDGER,
  };
}

/** Read and validate the URL and filter lists. */
export function loadTargets(filePath: string): Targets {
  const result = targetsSchema.safeParse(readJsonFile(filePath, "Targets"));
  if (!result.success) {
    throw new ConfigError(`Invalid targets in ${filePath}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/** Read and validate the versioned extraction rules for the listing site. */
export function loadExtractionRules(filePath: string): ExtractionRules {
  const result = rulesSchema.safeParse(readJsonFile(filePath, "Extraction rules"));
  if (!result.success) {
    throw new ConfigError(
      `Invalid extraction rules in ${filePath}: ${describeIssues(result.error)}`
    );
  }
  return result.data;
}
