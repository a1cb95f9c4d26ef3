import { MEDIA_GROUP_LIMIT } from './telegram.types.js';

/** Split into consecutive groups of at most `size` (order preserved) */
export function chunk<T>(items: readonly T[], size: number = MEDIA_GROUP_LIMIT): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
