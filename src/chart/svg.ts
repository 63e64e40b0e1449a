import { escapeMarkup } from "../core/utils";
import type { ChartSeries } from "../types";

export interface SvgChartOptions {
  title: string;
  xLabel: string;
  yLabel: string;
  fontFamily: string;
}

const WIDTH = 1300;
const HEIGHT = 1500;
const MARGIN = { top: 80, right: 40, bottom: 110, left: 110 };

/** 20-colour categorical palette; series past the 20th reuse colours */
export const PALETTE = [
  "#1f77b4", "#aec7e8", "#ff7f0e", "#ffbb78", "#2ca02c",
  "#98df8a", "#d62728", "#ff9896", "#9467bd", "#c5b0d5",
  "#8c564b", "#c49c94", "#e377c2", "#f7b6d2", "#7f7f7f",
  "#c7c7c7", "#bcbd22", "#dbdb8d", "#17becf", "#9edae5",
];

interface Domain {
  xMax: number;
  yLo: number;
  yHi: number;
  yStep: number;
}

/** Round a raw tick step up to 1, 2 or 5 times a power of ten. */
function niceStep(raw: number): number {
  const exponent = Math.floor(Math.log10(raw));
  const fraction = raw / 10 ** exponent;
  const nice = fraction <= 1 ? 1 : fraction <= 2 ? 2 : fraction <= 5 ? 5 : 10;
  return nice * 10 ** exponent;
}

function computeDomain(series: ChartSeries[]): Domain {
  const values = series.flatMap((s) => s.values);
  const longest = Math.max(0, ...series.map((s) => s.values.length));
  const xMax = Math.max(longest - 1, 1);

  // y = 0 is always in range so the reference line is visible
  let yLo = Math.min(0, ...values);
  let yHi = Math.max(0, ...values);
  if (yHi === yLo) yHi = yLo + 1;
  const pad = (yHi - yLo) * 0.05;
  yHi += pad;
  if (yLo < 0) yLo -= pad;

  return { xMax, yLo, yHi, yStep: niceStep((yHi - yLo) / 8) };
}

function formatTick(value: number, step: number): string {
  const decimals = step >= 1 ? 0 : Math.min(6, -Math.floor(Math.log10(step)));
  return value.toFixed(decimals);
}

/**
 * Draw an index-based line chart: one polyline per series, x = position in the
 * price sequence, every point annotated with its value to two decimals.
 */
export function buildChartSvg(series: ChartSeries[], options: SvgChartOptions): string {
  const { xMax, yLo, yHi, yStep } = computeDomain(series);
  const plotW = WIDTH - MARGIN.left - MARGIN.right;
  const plotH = HEIGHT - MARGIN.top - MARGIN.bottom;
  const left = MARGIN.left;
  const top = MARGIN.top;
  const bottom = top + plotH;

  const sx = (i: number): number => left + (i / xMax) * plotW;
  const sy = (v: number): number => top + (1 - (v - yLo) / (yHi - yLo)) * plotH;
  const fmt = (n: number): string => n.toFixed(1);

  const parts: string[] = [];
  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="${escapeMarkup(options.fontFamily)}">`,
    `<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`,
    `<rect x="${left}" y="${top}" width="${plotW}" height="${plotH}" fill="#f5f5f5"/>`
  );

  // ── Grid and ticks ────────────────────────────────────────────────
  const firstTick = Math.ceil(yLo / yStep);
  for (let k = firstTick; k * yStep <= yHi; k++) {
    const v = Number((k * yStep).toFixed(10));
    const y = fmt(sy(v));
    parts.push(
      `<line class="grid" x1="${left}" y1="${y}" x2="${left + plotW}" y2="${y}" stroke="#b0b0b0" stroke-dasharray="6 4" stroke-opacity="0.7"/>`,
      `<text x="${left - 10}" y="${y}" text-anchor="end" dominant-baseline="middle" font-size="14">${formatTick(v, yStep)}</text>`
    );
  }

  const xStep = Math.max(1, Math.ceil((xMax + 1) / 25));
  for (let i = 0; i <= xMax; i += xStep) {
    const x = fmt(sx(i));
    const labelY = bottom + 24;
    parts.push(
      `<line class="grid" x1="${x}" y1="${top}" x2="${x}" y2="${bottom}" stroke="#b0b0b0" stroke-dasharray="6 4" stroke-opacity="0.7"/>`,
      `<text x="${x}" y="${labelY}" text-anchor="end" font-size="14" transform="rotate(-45 ${x} ${labelY})">${i}</text>`
    );
  }

  parts.push(
    `<line x1="${left}" y1="${fmt(sy(0))}" x2="${left + plotW}" y2="${fmt(sy(0))}" stroke="#000000" stroke-width="0.5"/>`,
    `<rect x="${left}" y="${top}" width="${plotW}" height="${plotH}" fill="none" stroke="#000000" stroke-width="1"/>`
  );

  // ── Series ────────────────────────────────────────────────────────
  series.forEach((s, idx) => {
    const color = PALETTE[idx % PALETTE.length];
    const points = s.values.map((v, i) => `${fmt(sx(i))},${fmt(sy(v))}`).join(" ");
    parts.push(
      `<g class="series" data-name="${escapeMarkup(s.name)}">`,
      `<polyline points="${points}" fill="none" stroke="${color}" stroke-width="2"/>`
    );
    s.values.forEach((v, i) => {
      const x = fmt(sx(i));
      const y = sy(v);
      parts.push(
        `<circle cx="${x}" cy="${fmt(y)}" r="4" fill="${color}"/>`,
        `<text x="${x}" y="${fmt(y - 10)}" text-anchor="middle" font-size="13">${v.toFixed(2)}</text>`
      );
    });
    parts.push("</g>");
  });

  // ── Legend (upper left) ───────────────────────────────────────────
  if (series.length > 0) {
    const longestName = Math.max(...series.map((s) => s.name.length));
    const boxW = Math.min(plotW - 20, 60 + longestName * 7);
    const boxH = 12 + series.length * 20;
    const lx = left + 10;
    const ly = top + 10;
    parts.push(
      `<g class="legend">`,
      `<rect x="${lx}" y="${ly}" width="${boxW}" height="${boxH}" fill="#ffffff" fill-opacity="0.8" stroke="#cccccc"/>`
    );
    series.forEach((s, idx) => {
      const color = PALETTE[idx % PALETTE.length];
      const rowY = ly + 16 + idx * 20;
      parts.push(
        `<line x1="${lx + 8}" y1="${rowY}" x2="${lx + 32}" y2="${rowY}" stroke="${color}" stroke-width="2"/>`,
        `<text x="${lx + 40}" y="${rowY}" dominant-baseline="middle" font-size="10">${escapeMarkup(s.name)}</text>`
      );
    });
    parts.push("</g>");
  }

  // ── Labels ────────────────────────────────────────────────────────
  parts.push(
    `<text x="${WIDTH / 2}" y="${top / 2}" text-anchor="middle" font-size="22">${escapeMarkup(options.title)}</text>`,
    `<text x="${left + plotW / 2}" y="${HEIGHT - 20}" text-anchor="middle" font-size="16">${escapeMarkup(options.xLabel)}</text>`,
    `<text x="30" y="${top + plotH / 2}" text-anchor="middle" font-size="16" transform="rotate(-90 30 ${top + plotH / 2})">${escapeMarkup(options.yLabel)}</text>`,
    "</svg>"
  );

  return parts.join("\n");
}
