import { beforeEach, describe, expect, it, vi } from 'vitest';
import { EmptyError, MissingFieldError, MissingKeyError, NetworkError, type FetchError } from '../../../common/errors.js';
import { fail, ok, type Result } from '../../../common/result.js';
import { FearGreedService } from '../services/feargreed.service.js';

const FETCHED_AT = new Date('2024-06-01T12:00:00.000Z');

function graphDocument(): Record<string, unknown> {
  return {
    fear_and_greed: { score: 42.5, rating: 'fear', previous_close: 44 },
    fear_and_greed_historical: {
      data: [
        { x: Date.UTC(2024, 4, 2), y: 40 },
        { x: Date.UTC(2024, 4, 1), y: 38 },
        { x: Date.UTC(2022, 0, 1), y: 70 },
      ],
    },
    market_momentum_sp500: { data: [{ x: Date.UTC(2024, 4, 1), y: 5012.3 }] },
    put_call_options: { data: [] },
  };
}

describe('FearGreedService', () => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };

  const fetchGraphData = vi.fn(async (): Promise<Result<unknown, FetchError>> => ok(graphDocument()));

  let service: FearGreedService;

  beforeEach(() => {
    vi.clearAllMocks();
    service = new FearGreedService({
      provider: { fetchGraphData },
      windowDays: 365,
      logger,
      clock: () => FETCHED_AT,
    });
  });

  describe('getOverview', () => {
    it('should return the current reading with the normalized history', async () => {
      const result = await service.getOverview();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.current).toEqual({ score: 42.5, rating: 'fear', previous: { previousClose: 44 } });
      expect(result.value.history.ok).toBe(true);
      if (!result.value.history.ok) return;
      expect(result.value.history.value.map((p) => p.value)).toEqual([38, 40]);
      expect(fetchGraphData).toHaveBeenCalledTimes(1);
    });

    it('should carry a history failure without failing the overview', async () => {
      const doc = graphDocument();
      delete doc.fear_and_greed_historical;
      fetchGraphData.mockResolvedValueOnce(ok(doc));

      const result = await service.getOverview();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.current.score).toBe(42.5);
      expect(result.value.history.ok).toBe(false);
      if (result.value.history.ok) return;
      expect(result.value.history.error).toBeInstanceOf(MissingKeyError);
    });

    it('should fail when the current reading is unusable', async () => {
      fetchGraphData.mockResolvedValueOnce(ok({ fear_and_greed: { rating: 'fear' } }));

      const result = await service.getOverview();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(MissingFieldError);
    });

    it('should propagate a fetch failure', async () => {
      fetchGraphData.mockResolvedValueOnce(fail(new NetworkError('socket hang up')));

      const result = await service.getOverview();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(NetworkError);
    });
  });

  describe('getComponents', () => {
    it('should resolve each requested key from a single fetch', async () => {
      const result = await service.getComponents(['market_momentum_sp500', 'put_call_options', 'junk_bond_demand']);

      expect(fetchGraphData).toHaveBeenCalledTimes(1);
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      const [momentum, putCall, junk] = result.value;
      expect(momentum.key).toBe('market_momentum_sp500');
      expect(momentum.result.ok).toBe(true);
      if (momentum.result.ok) {
        expect(momentum.result.value.info.title).toBe('Market Momentum (S&P 500)');
        expect(momentum.result.value.series.map((p) => p.value)).toEqual([5012.3]);
      }

      expect(putCall.result.ok).toBe(false);
      if (!putCall.result.ok) expect(putCall.result.error).toBeInstanceOf(EmptyError);

      expect(junk.result.ok).toBe(false);
      if (!junk.result.ok) expect(junk.result.error).toBeInstanceOf(MissingKeyError);
    });

    it('should default to all seven components', async () => {
      const result = await service.getComponents();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((o) => o.key)).toEqual([
        'market_momentum_sp500',
        'stock_price_strength',
        'stock_price_breadth',
        'put_call_options',
        'market_volatility_vix',
        'junk_bond_demand',
        'safe_haven_demand',
      ]);
    });

    it('should return the fetch error when the document cannot be fetched', async () => {
      fetchGraphData.mockResolvedValueOnce(fail(new NetworkError('timeout')));

      const result = await service.getComponents();

      expect(result.ok).toBe(false);
    });
  });
});
