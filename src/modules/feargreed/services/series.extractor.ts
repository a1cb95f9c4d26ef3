/**
 * Series Extractor
 *
 * Locates `document[key].data` and turns each `{x, y}` element into a RawPoint.
 * Container problems are typed failures; element problems are logged and skipped.
 */

import { EmptyError, MissingKeyError, ShapeError, type ExtractError } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import { fail, ok, type Result } from '../../../common/result.js';
import type { RawPoint } from '../contracts/feargreed.types.js';
import { describeValue, documentSchema, seriesContainerSchema } from '../contracts/feargreed.schema.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Largest |epoch-ms| a Date can hold */
export const MAX_TIMESTAMP_MS = 8.64e15;

function toTimestampMs(x: unknown): number | null {
  const n = typeof x === 'number' ? x : typeof x === 'string' && x.trim() !== '' ? Number(x) : NaN;
  return Number.isFinite(n) && Math.abs(n) <= MAX_TIMESTAMP_MS ? n : null;
}

export function extractSeries(
  document: unknown,
  key: string,
  logger: Logger
): Result<RawPoint[], ExtractError> {
  const doc = documentSchema.safeParse(document);
  if (!doc.success) {
    const received = describeValue(document);
    logger.error({ key, received }, '[Extractor] Document is not an object');
    return fail(new ShapeError(key, 'document is not an object', received));
  }

  if (!(key in doc.data)) {
    logger.error({ key, keys: Object.keys(doc.data) }, '[Extractor] Missing key');
    return fail(new MissingKeyError(key));
  }

  const container = seriesContainerSchema.safeParse(doc.data[key]);
  if (!container.success) {
    const received = describeValue(doc.data[key]);
    logger.error({ key, received }, "[Extractor] Expected an object holding a 'data' array");
    return fail(new ShapeError(key, "expected an object holding a 'data' array", received));
  }

  const items = container.data.data;
  if (items.length === 0) {
    logger.error({ key }, '[Extractor] Data array is empty');
    return fail(new EmptyError(key, 'data array is empty'));
  }

  const points: RawPoint[] = [];
  for (const item of items) {
    if (!isRecord(item) || !('x' in item) || !('y' in item)) {
      logger.warn({ key, item: describeValue(item) }, '[Extractor] Skipping element without x/y');
      continue;
    }
    const timestampMs = toTimestampMs(item.x);
    if (timestampMs === null) {
      logger.warn({ key, item: describeValue(item) }, '[Extractor] Skipping element with non-numeric or out-of-range x');
      continue;
    }
    points.push({ timestampMs, value: item.y });
  }

  if (points.length === 0) {
    logger.error({ key, total: items.length }, '[Extractor] No usable elements');
    return fail(new EmptyError(key, 'no element had both x and y'));
  }

  logger.debug({ key, total: items.length, extracted: points.length }, '[Extractor] Extracted raw points');
  return ok(points);
}
