/**
 * Line chart SVG builder
 *
 * Pure string rendering: time on x, value on y, optional shaded bands and
 * dashed guide lines. Rasterised to PNG by ChartRenderer.
 */

import { RenderError } from '../../common/errors.js';
import type { Series } from '../feargreed/contracts/feargreed.types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface ChartOverlay {
  label?: string;
  color: string;
  series: Series;
  strokeWidth?: number;
}

export interface ChartBand {
  label: string;
  from: number;
  to: number;
  color: string;
}

export interface ChartSpec {
  title: string;
  overlays: ChartOverlay[];
  width: number;
  height: number;
  /** Fixed bounds, or 'auto' to fit the data with padding */
  yAxis: { min: number; max: number } | 'auto';
  xLabel: string;
  yLabel: string;
  monthInterval: number;
  bands?: readonly ChartBand[];
  guides?: readonly number[];
  legend?: boolean;
}

interface Frame {
  left: number;
  top: number;
  width: number;
  height: number;
}

const MARGIN = { top: 56, right: 30, bottom: 96, left: 72 };
const FONT = 'DejaVu Sans, Arial, Helvetica, sans-serif';
const DAY_MS = 86_400_000;

// ═══════════════════════════════════════════════════════════════
// SCALES & TICKS
// ═══════════════════════════════════════════════════════════════

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function formatDay(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/** First-of-month (UTC) instants within [minMs, maxMs], every `interval` months */
export function monthTicks(minMs: number, maxMs: number, interval: number): number[] {
  const step = Math.max(1, Math.floor(interval));
  const start = new Date(minMs);
  let year = start.getUTCFullYear();
  let month = start.getUTCMonth();
  if (Date.UTC(year, month, 1) < minMs) month += 1;

  const ticks: number[] = [];
  for (let t = Date.UTC(year, month, 1); t <= maxMs; t = Date.UTC(year, month, 1)) {
    ticks.push(t);
    month += step;
    year += Math.floor(month / 12);
    month %= 12;
  }
  return ticks;
}

/** Evenly spaced "nice" ticks (1/2/5 x 10^n) covering [min, max] */
export function niceTicks(min: number, max: number, target = 5): number[] {
  if (max <= min) return [min];
  const rough = (max - min) / target;
  const magnitude = 10 ** Math.floor(Math.log10(rough));
  const residual = rough / magnitude;
  const step = (residual > 5 ? 10 : residual > 2 ? 5 : residual > 1 ? 2 : 1) * magnitude;

  const ticks: number[] = [];
  for (let v = Math.ceil(min / step) * step; v <= max + step * 1e-9; v += step) {
    ticks.push(Number(v.toFixed(10)));
  }
  return ticks;
}

function formatTick(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toPrecision(6)));
}

function yDomain(spec: ChartSpec, values: number[]): { min: number; max: number } {
  if (spec.yAxis !== 'auto') return spec.yAxis;
  let min = Math.min(...values);
  let max = Math.max(...values);
  if (min === max) {
    min -= 1;
    max += 1;
  }
  const pad = (max - min) * 0.05;
  return { min: min - pad, max: max + pad };
}

// ═══════════════════════════════════════════════════════════════
// BUILDER
// ═══════════════════════════════════════════════════════════════

export function buildLineChartSvg(spec: ChartSpec): string {
  const overlays = spec.overlays.filter((o) => o.series.length > 0);
  if (overlays.length === 0) {
    throw new RenderError(`Nothing to plot for '${spec.title}': series is empty`);
  }

  const times = overlays.flatMap((o) => o.series.map((p) => p.timestamp.getTime()));
  const values = overlays.flatMap((o) => o.series.map((p) => p.value));

  let xMin = Math.min(...times);
  let xMax = Math.max(...times);
  if (xMin === xMax) {
    xMin -= DAY_MS;
    xMax += DAY_MS;
  }
  const y = yDomain(spec, values);

  const frame: Frame = {
    left: MARGIN.left,
    top: MARGIN.top,
    width: spec.width - MARGIN.left - MARGIN.right,
    height: spec.height - MARGIN.top - MARGIN.bottom,
  };
  const sx = (ms: number) => frame.left + ((ms - xMin) / (xMax - xMin)) * frame.width;
  const sy = (v: number) => frame.top + (1 - (v - y.min) / (y.max - y.min)) * frame.height;
  const clampY = (v: number) => Math.min(Math.max(v, y.min), y.max);
  const r = (n: number) => n.toFixed(2);

  const parts: string[] = [];
  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${spec.width}" height="${spec.height}" viewBox="0 0 ${spec.width} ${spec.height}" font-family="${FONT}">`,
    `<rect x="0" y="0" width="${spec.width}" height="${spec.height}" fill="#ffffff"/>`,
    `<rect x="${frame.left}" y="${frame.top}" width="${frame.width}" height="${frame.height}" fill="#eaeaf2"/>`
  );

  for (const band of spec.bands ?? []) {
    const top = sy(clampY(band.to));
    const bottom = sy(clampY(band.from));
    parts.push(
      `<rect class="band" x="${frame.left}" y="${r(top)}" width="${frame.width}" height="${r(bottom - top)}" fill="${band.color}" fill-opacity="0.3"/>`
    );
  }

  // grid + y ticks
  for (const tick of niceTicks(y.min, y.max)) {
    const py = r(sy(tick));
    parts.push(
      `<line x1="${frame.left}" y1="${py}" x2="${frame.left + frame.width}" y2="${py}" stroke="#ffffff" stroke-width="1"/>`,
      `<text x="${frame.left - 8}" y="${py}" font-size="12" text-anchor="end" dominant-baseline="middle" fill="#333333">${formatTick(tick)}</text>`
    );
  }

  // grid + x ticks
  const baseline = frame.top + frame.height;
  for (const tick of monthTicks(xMin, xMax, spec.monthInterval)) {
    const px = r(sx(tick));
    parts.push(
      `<line x1="${px}" y1="${frame.top}" x2="${px}" y2="${baseline}" stroke="#ffffff" stroke-width="1"/>`,
      `<text class="x-tick" x="${px}" y="${baseline + 16}" font-size="11" text-anchor="end" fill="#333333" transform="rotate(-30 ${px} ${baseline + 16})">${formatDay(tick)}</text>`
    );
  }

  for (const guide of spec.guides ?? []) {
    if (guide < y.min || guide > y.max) continue;
    const py = r(sy(guide));
    parts.push(
      `<line class="guide" x1="${frame.left}" y1="${py}" x2="${frame.left + frame.width}" y2="${py}" stroke="#808080" stroke-width="0.8" stroke-dasharray="6 4"/>`
    );
  }

  for (const overlay of overlays) {
    const d = overlay.series
      .map((p, i) => `${i === 0 ? 'M' : 'L'}${r(sx(p.timestamp.getTime()))},${r(sy(clampY(p.value)))}`)
      .join(' ');
    parts.push(
      `<path class="series" d="${d}" fill="none" stroke="${overlay.color}" stroke-width="${overlay.strokeWidth ?? 2}" stroke-linejoin="round"/>`
    );
  }

  parts.push(
    `<text x="${spec.width / 2}" y="32" font-size="18" text-anchor="middle" fill="#111111">${escapeXml(spec.title)}</text>`,
    `<text x="${frame.left + frame.width / 2}" y="${spec.height - 12}" font-size="13" text-anchor="middle" fill="#111111">${escapeXml(spec.xLabel)}</text>`,
    `<text x="18" y="${frame.top + frame.height / 2}" font-size="13" text-anchor="middle" fill="#111111" transform="rotate(-90 18 ${frame.top + frame.height / 2})">${escapeXml(spec.yLabel)}</text>`
  );

  if (spec.legend) {
    parts.push(legend(frame, overlays, spec.bands ?? []));
  }

  parts.push('</svg>');
  return parts.join('\n');
}

function legend(frame: Frame, overlays: ChartOverlay[], bands: readonly ChartBand[]): string {
  const entries = [
    ...overlays.filter((o) => o.label).map((o) => ({ label: o.label ?? '', color: o.color, kind: 'line' as const })),
    ...bands.map((b) => ({ label: b.label, color: b.color, kind: 'band' as const })),
  ];
  if (entries.length === 0) return '';

  const rowHeight = 18;
  const x = frame.left + 10;
  const y = frame.top + 10;
  const rows = entries.map((entry, i) => {
    const cy = y + 12 + i * rowHeight;
    const swatch =
      entry.kind === 'line'
        ? `<line x1="${x + 8}" y1="${cy}" x2="${x + 30}" y2="${cy}" stroke="${entry.color}" stroke-width="2"/>`
        : `<rect x="${x + 8}" y="${cy - 6}" width="22" height="12" fill="${entry.color}" fill-opacity="0.3"/>`;
    return `${swatch}<text x="${x + 38}" y="${cy}" font-size="12" dominant-baseline="middle" fill="#111111">${escapeXml(entry.label)}</text>`;
  });

  return [
    `<g class="legend">`,
    `<rect x="${x}" y="${y}" width="210" height="${entries.length * rowHeight + 8}" fill="#ffffff" fill-opacity="0.8" stroke="#cccccc"/>`,
    ...rows,
    `</g>`,
  ].join('\n');
}
