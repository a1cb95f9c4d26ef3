/**
 * Series Normalizer
 *
 * RawPoint[] -> Series, in this order:
 *   1. epoch-ms -> Date (invalid dates dropped)
 *   2. stable ascending sort
 *   3. numeric coercion (failures dropped)
 *   4. retention window: timestamp >= startOfUtcDay(now) - windowDays
 *
 * Pure and idempotent for a fixed `now`. An empty result is valid output.
 */

import type { Logger } from '../../../common/logger.js';
import type { NormalizeOptions, RawPoint, Series, SeriesPoint } from '../contracts/feargreed.types.js';

export const DEFAULT_WINDOW_DAYS = 365;

const DAY_MS = 86_400_000;

/** Mirrors a lenient numeric parse: finite numbers and fully numeric strings only */
export function coerceValue(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function retentionCutoff(now: Date, windowDays: number): Date {
  const dayStart = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return new Date(dayStart - windowDays * DAY_MS);
}

export function normalizeSeries(
  points: readonly RawPoint[],
  options: NormalizeOptions = {},
  logger?: Logger
): Series {
  const windowDays = options.windowDays ?? DEFAULT_WINDOW_DAYS;
  const cutoffMs = retentionCutoff(options.now ?? new Date(), windowDays).getTime();

  const dated: Array<{ timestamp: Date; value: unknown }> = [];
  let dropped = 0;
  for (const p of points) {
    const timestamp = new Date(p.timestampMs);
    if (Number.isNaN(timestamp.getTime())) {
      dropped++;
      logger?.warn({ timestampMs: p.timestampMs }, '[Normalizer] Dropping point with invalid timestamp');
      continue;
    }
    dated.push({ timestamp, value: p.value });
  }
  dated.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

  const series: SeriesPoint[] = [];
  for (const point of dated) {
    const value = coerceValue(point.value);
    if (value === null) {
      dropped++;
      logger?.debug({ timestamp: point.timestamp.toISOString(), value: point.value }, '[Normalizer] Dropping non-numeric value');
      continue;
    }
    if (point.timestamp.getTime() < cutoffMs) continue;
    series.push({ timestamp: point.timestamp, value });
  }

  logger?.debug(
    { input: points.length, output: series.length, dropped, cutoff: new Date(cutoffMs).toISOString() },
    '[Normalizer] Series normalized'
  );
  return series;
}

export function toRawPoints(series: Series): RawPoint[] {
  return series.map((p) => ({ timestampMs: p.timestamp.getTime(), value: p.value }));
}
