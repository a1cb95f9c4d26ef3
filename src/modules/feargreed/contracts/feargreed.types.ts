/**
 * FEAR & GREED: Canonical Types
 *
 * Everything here is rebuilt from scratch on each fetch; nothing is cached.
 */

// ═══════════════════════════════════════════════════════════════
// TIME SERIES
// ═══════════════════════════════════════════════════════════════

/** One `{x, y}` element as found in the payload; `value` is not yet validated */
export interface RawPoint {
  timestampMs: number;
  value: unknown;
}

export interface SeriesPoint {
  timestamp: Date;
  value: number; // always finite
}

/** Ascending by timestamp, already cut to the retention window. May be empty. */
export type Series = readonly SeriesPoint[];

export interface NormalizeOptions {
  windowDays?: number;
  now?: Date;
}

// ═══════════════════════════════════════════════════════════════
// CURRENT READING
// ═══════════════════════════════════════════════════════════════

export type PreviousReadings = Partial<Record<'previousClose' | 'previous1Week' | 'previous1Month' | 'previous1Year', number>>;

export interface CurrentReading {
  score: number;
  rating: string; // e.g. "extreme_fear", "greed"
  timestamp?: string;
  previous: PreviousReadings;
}

// ═══════════════════════════════════════════════════════════════
// COMPONENTS
// ═══════════════════════════════════════════════════════════════

export const HISTORICAL_KEY = 'fear_and_greed_historical';
export const CURRENT_KEY = 'fear_and_greed';

export const COMPONENT_KEYS = [
  'market_momentum_sp500',
  'stock_price_strength',
  'stock_price_breadth',
  'put_call_options',
  'market_volatility_vix',
  'junk_bond_demand',
  'safe_haven_demand',
] as const;

export type ComponentKey = (typeof COMPONENT_KEYS)[number];

export interface ComponentInfo {
  title: string;
  color: string;
}

export interface ComponentSeries {
  key: ComponentKey;
  info: ComponentInfo;
  series: Series;
}
