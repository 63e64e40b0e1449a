import * as fs from "fs";
import * as path from "path";
import sharp from "sharp";
import type { ChartSeries, ChartSpec } from "../types";
import { parsePriceList } from "./prices";
import { buildChartSvg } from "./svg";

/** A product row as read back from the aggregate CSV */
export interface SerializedProduct {
  name: string;
  prices: string;
}

export type Rasterizer = (svg: string, outPath: string) => Promise<void>;

export interface ChartOptions {
  outputDir: string;
  fontFamily?: string;
  yLabel?: string;
  rasterize?: Rasterizer;
}

/** Convert an SVG document to a PNG file with sharp. */
export const rasterizeSvg: Rasterizer = async (svg, outPath) => {
  await sharp(Buffer.from(svg)).png().toFile(outPath);
};

/** Case-sensitive substring match on the product name. */
export function selectProducts<T extends { name: string }>(products: T[], filter: string): T[] {
  return products.filter((p) => p.name.includes(filter));
}

/**
 * Build the chart series for one filter.
 * @throws PriceParseError naming the product whose price list is malformed
 */
export function buildSeries(products: SerializedProduct[], filter: string): ChartSeries[] {
  return selectProducts(products, filter).map((p) => ({
    name: p.name,
    values: parsePriceList(p.prices, p.name),
  }));
}

/** `<outputDir>/<filter>_plot.png`; path separators in the filter become "_". */
export function chartImagePath(outputDir: string, filter: string): string {
  return path.join(outputDir, `${filter.replace(/[\\/]/g, "_")}_plot.png`);
}

/**
 * Render one PNG chart per filter, one at a time.
 * A filter that matches nothing still gets an empty chart.
 */
export async function renderCharts(
  filters: string[],
  products: SerializedProduct[],
  options: ChartOptions
): Promise<ChartSpec[]> {
  const rasterize = options.rasterize ?? rasterizeSvg;
  fs.mkdirSync(options.outputDir, { recursive: true });

  const specs: ChartSpec[] = [];
  for (const filter of filters) {
    const series = buildSeries(products, filter);
    const svg = buildChartSvg(series, {
      title: `Price Variation Over Time - ${filter}`,
      xLabel: "Time Points",
      yLabel: options.yLabel ?? "Price (Baht)",
      fontFamily: options.fontFamily ?? "sans-serif",
    });
    const imagePath = chartImagePath(options.outputDir, filter);
    await rasterize(svg, imagePath);
    specs.push({ filter, series, imagePath });
  }
  return specs;
}
