import fs from "fs";
import path from "path";
import { describe, it, expect } from "vitest";
import {
  buildSeries,
  chartImagePath,
  rasterizeSvg,
  renderCharts,
  selectProducts,
  type Rasterizer,
} from "../../src/chart/renderer";
import { buildChartSvg } from "../../src/chart/svg";
import { PriceParseError } from "../../src/core/errors";
import { makeTempDir } from "../helpers/fixture-loader";

const PRODUCTS = [
  { name: "Pork Belly", prices: "[150]" },
  { name: "Wagyu Sirloin", prices: "[1000,1100]" },
];

function recordingRasterizer(): { rasterize: Rasterizer; calls: Array<{ svg: string; outPath: string }> } {
  const calls: Array<{ svg: string; outPath: string }> = [];
  return {
    calls,
    rasterize: async (svg, outPath) => {
      calls.push({ svg, outPath });
    },
  };
}

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe("selectProducts", () => {
  it("should match substrings case-sensitively", () => {
    expect(selectProducts(PRODUCTS, "Wagyu").map((p) => p.name)).toEqual(["Wagyu Sirloin"]);
    expect(selectProducts(PRODUCTS, "wagyu")).toEqual([]);
  });
});

describe("buildSeries", () => {
  it("should parse the price list of every matching product", () => {
    expect(buildSeries(PRODUCTS, "Wagyu")).toEqual([
      { name: "Wagyu Sirloin", values: [1000, 1100] },
    ]);
  });

  it("should fail loudly on a malformed price list", () => {
    expect(() => buildSeries([{ name: "Wagyu Cube", prices: "[1000,abc]" }], "Wagyu")).toThrow(
      PriceParseError
    );
  });
});

describe("chartImagePath", () => {
  it("should name the image after the filter", () => {
    expect(chartImagePath("/out", "สันนอก")).toBe(path.join("/out", "สันนอก_plot.png"));
  });

  it("should not let a filter escape the output directory", () => {
    expect(chartImagePath("/out", "../a/b")).toBe(path.join("/out", ".._a_b_plot.png"));
  });
});

describe("renderCharts", () => {
  it("should draw only the products matching the filter", async () => {
    const dir = makeTempDir("charts");
    const { rasterize, calls } = recordingRasterizer();

    const specs = await renderCharts(["Wagyu"], PRODUCTS, { outputDir: dir, rasterize });

    expect(specs).toEqual([
      {
        filter: "Wagyu",
        series: [{ name: "Wagyu Sirloin", values: [1000, 1100] }],
        imagePath: path.join(dir, "Wagyu_plot.png"),
      },
    ]);
    const { svg, outPath } = calls[0];
    expect(outPath).toBe(path.join(dir, "Wagyu_plot.png"));
    expect(count(svg, "<polyline")).toBe(1);
    expect(svg).toContain('data-name="Wagyu Sirloin"');
    expect(svg).not.toContain("Pork Belly");
    expect(svg).toContain(">1000.00</text>");
    expect(svg).toContain(">1100.00</text>");
    expect(svg).toContain(">Price Variation Over Time - Wagyu</text>");
  });

  it("should still render a chart for a filter with no matches", async () => {
    const dir = makeTempDir("charts");
    const { rasterize, calls } = recordingRasterizer();

    const specs = await renderCharts(["Lamb", "Pork"], PRODUCTS, { outputDir: dir, rasterize });

    expect(specs.map((s) => s.series.length)).toEqual([0, 1]);
    expect(calls.map((c) => path.basename(c.outPath))).toEqual(["Lamb_plot.png", "Pork_plot.png"]);
    expect(count(calls[0].svg, "<polyline")).toBe(0);
    expect(calls[0].svg).not.toContain('class="legend"');
  });

  it("should stop on malformed price data", async () => {
    const { rasterize } = recordingRasterizer();

    await expect(
      renderCharts(["Wagyu"], [{ name: "Wagyu Cube", prices: "[1,0OO]" }], {
        outputDir: makeTempDir("charts"),
        rasterize,
      })
    ).rejects.toThrow('Invalid price "0OO" for product "Wagyu Cube"');
  });

  it("should write a PNG with the default rasterizer", async () => {
    const dir = makeTempDir("charts");

    const [spec] = await renderCharts(["Wagyu"], PRODUCTS, { outputDir: dir });

    const header = fs.readFileSync(spec.imagePath).subarray(0, 8);
    expect([...header]).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
  });
});

describe("buildChartSvg", () => {
  const options = { title: "T", xLabel: "Time Points", yLabel: "Price (Baht)", fontFamily: "Sarabun" };

  it("should cycle colours after twenty series", () => {
    const series = Array.from({ length: 21 }, (_, i) => ({ name: `P${i}`, values: [i + 1] }));

    const svg = buildChartSvg(series, options);

    expect(count(svg, 'stroke="#1f77b4" stroke-width="2"/>')).toBe(4);
  });

  it("should escape product names", () => {
    const svg = buildChartSvg([{ name: "Salt & <Pepper>", values: [1] }], options);

    expect(svg).toContain(">Salt &amp; &lt;Pepper&gt;</text>");
  });

  it("should be rasterizable", async () => {
    const out = path.join(makeTempDir("svg"), "chart.png");

    await rasterizeSvg(buildChartSvg([{ name: "A", values: [1, 2, 3] }], options), out);

    expect(fs.statSync(out).size).toBeGreaterThan(0);
  });
});
