import { beforeEach, describe, expect, it, vi } from 'vitest';
import { EmptyError, MissingKeyError, ShapeError } from '../../../common/errors.js';
import { extractSeries } from '../services/series.extractor.js';

describe('extractSeries', () => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  const KEY = 'fear_and_greed_historical';

  it('emits one raw point per {x, y} element', () => {
    const result = extractSeries(
      { [KEY]: { timestamp: 1, score: 50, data: [{ x: 1000, y: 10 }, { x: 2000, y: '20', rating: 'fear' }] } },
      KEY,
      logger
    );

    expect(result).toEqual({
      ok: true,
      value: [
        { timestampMs: 1000, value: 10 },
        { timestampMs: 2000, value: '20' },
      ],
    });
  });

  it('omits exactly the element missing y', () => {
    const result = extractSeries(
      { [KEY]: { data: [{ x: 1, y: 10 }, { x: 2 }, { x: 3, y: 30 }] } },
      KEY,
      logger
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual([
      { timestampMs: 1, value: 10 },
      { timestampMs: 3, value: 30 },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('keeps elements whose y is null (dropped later by the normalizer)', () => {
    const result = extractSeries({ [KEY]: { data: [{ x: 1, y: null }] } }, KEY, logger);
    expect(result).toEqual({ ok: true, value: [{ timestampMs: 1, value: null }] });
  });

  it('skips non-object elements and elements with a non-numeric x', () => {
    const result = extractSeries(
      { [KEY]: { data: [42, null, [1, 2], { x: 'soon', y: 1 }, { x: '5000', y: 5 }] } },
      KEY,
      logger
    );

    expect(result).toEqual({ ok: true, value: [{ timestampMs: 5000, value: 5 }] });
    expect(logger.warn).toHaveBeenCalledTimes(4);
  });

  it('skips an x outside the range a Date can hold', () => {
    const result = extractSeries(
      { [KEY]: { data: [{ x: 1e17, y: null }, { x: -1e16, y: 5 }, { x: Date.UTC(2024, 4, 1), y: 1 }] } },
      KEY,
      logger
    );

    expect(result).toEqual({ ok: true, value: [{ timestampMs: Date.UTC(2024, 4, 1), value: 1 }] });
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('returns MissingKeyError when the key is absent', () => {
    const result = extractSeries({ fear_and_greed: { score: 1, rating: 'fear' } }, KEY, logger);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(MissingKeyError);
    expect(result.error.key).toBe(KEY);
  });

  it('returns EmptyError for an empty data array', () => {
    const result = extractSeries({ [KEY]: { data: [] } }, KEY, logger);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(EmptyError);
  });

  it('returns EmptyError when no element survives', () => {
    const result = extractSeries({ [KEY]: { data: [{ x: 1 }, { y: 2 }] } }, KEY, logger);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(EmptyError);
    expect(result.error.message).toBe(`Series '${KEY}' is empty: no element had both x and y`);
  });

  it.each([
    ['a bare array', [{ x: 1, y: 2 }]],
    ['an object without data', { points: [] }],
    ['data that is not an array', { data: { x: 1, y: 2 } }],
    ['null', null],
  ])('returns ShapeError when the value is %s', (_label, value) => {
    const result = extractSeries({ [KEY]: value }, KEY, logger);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ShapeError);
    expect(result.error.code).toBe('SHAPE_ERROR');
  });

  it('returns ShapeError when the document itself is not an object', () => {
    const result = extractSeries('not json object', KEY, logger);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ShapeError);
  });
});
