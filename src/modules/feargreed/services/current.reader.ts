/**
 * Current-Value Reader
 *
 * Pulls `fear_and_greed.score` / `.rating` (plus the optional previous-period
 * scores) out of the graphdata document. No date handling.
 */

import { MissingFieldError, MissingKeyError, type ReadError } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import { fail, ok, type Result } from '../../../common/result.js';
import { CURRENT_KEY, type CurrentReading, type PreviousReadings } from '../contracts/feargreed.types.js';
import { currentContainerSchema, describeValue, documentSchema } from '../contracts/feargreed.schema.js';
import { coerceValue } from './series.normalizer.js';

const PREVIOUS_FIELDS = {
  previous_close: 'previousClose',
  previous_1_week: 'previous1Week',
  previous_1_month: 'previous1Month',
  previous_1_year: 'previous1Year',
} as const satisfies Record<string, keyof PreviousReadings>;

export function readCurrent(document: unknown, logger: Logger): Result<CurrentReading, ReadError> {
  const doc = documentSchema.safeParse(document);
  if (!doc.success || !(CURRENT_KEY in doc.data)) {
    logger.error({ key: CURRENT_KEY }, '[Current] Missing key');
    return fail(new MissingKeyError(CURRENT_KEY));
  }

  const container = currentContainerSchema.safeParse(doc.data[CURRENT_KEY]);
  if (!container.success) {
    logger.error({ key: CURRENT_KEY, received: describeValue(doc.data[CURRENT_KEY]) }, '[Current] Not an object');
    return fail(new MissingFieldError(CURRENT_KEY, 'score'));
  }
  const current = container.data;

  const rawScore = current.score;
  const rawRating = current.rating;

  if (rawScore === undefined || rawScore === null) {
    logger.error({ received: describeValue(current) }, '[Current] Missing score');
    return fail(new MissingFieldError(CURRENT_KEY, 'score'));
  }
  if (rawRating === undefined || rawRating === null) {
    logger.error({ received: describeValue(current) }, '[Current] Missing rating');
    return fail(new MissingFieldError(CURRENT_KEY, 'rating'));
  }

  const score = coerceValue(rawScore);
  if (score === null) {
    logger.error({ score: describeValue(rawScore) }, '[Current] Score is not numeric');
    return fail(new MissingFieldError(CURRENT_KEY, 'score', 'not a finite number'));
  }
  if (typeof rawRating !== 'string') {
    logger.error({ rating: describeValue(rawRating) }, '[Current] Rating is not a string');
    return fail(new MissingFieldError(CURRENT_KEY, 'rating', 'not a string'));
  }

  const previous: PreviousReadings = {};
  for (const [field, name] of Object.entries(PREVIOUS_FIELDS)) {
    const value = coerceValue(current[field]);
    if (value !== null) previous[name] = value;
  }

  const reading: CurrentReading = {
    score,
    rating: rawRating,
    previous,
    ...(typeof current.timestamp === 'string' ? { timestamp: current.timestamp } : {}),
  };

  logger.info({ score, rating: rawRating }, '[Current] Reading extracted');
  return ok(reading);
}
