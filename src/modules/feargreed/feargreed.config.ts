/**
 * Static Fear & Greed configuration: request identity, components, sentiment zones.
 */

import type { ComponentInfo, ComponentKey } from './contracts/feargreed.types.js';

export const REQUEST_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36',
  Accept: 'application/json',
};

export const COMPONENTS_INFO: Readonly<Record<ComponentKey, ComponentInfo>> = {
  market_momentum_sp500: { title: 'Market Momentum (S&P 500)', color: '#1f77b4' },
  stock_price_strength: { title: 'Stock Price Strength', color: '#2ca02c' },
  stock_price_breadth: { title: 'Stock Price Breadth', color: '#d62728' },
  put_call_options: { title: 'Put/Call Options', color: '#9467bd' },
  market_volatility_vix: { title: 'Market Volatility (VIX)', color: '#8c564b' },
  junk_bond_demand: { title: 'Junk Bond Demand', color: '#7f7f7f' },
  safe_haven_demand: { title: 'Safe Haven Demand', color: '#bcbd22' },
};

export interface SentimentZone {
  label: string;
  from: number;
  to: number;
  color: string;
}

// Bands drawn behind the composite index chart
export const SENTIMENT_ZONES: readonly SentimentZone[] = [
  { label: 'Extreme Fear (0-25)', from: 0, to: 25, color: '#d62728' },
  { label: 'Fear (25-45)', from: 25, to: 45, color: '#ff7f0e' },
  { label: 'Neutral (45-55)', from: 45, to: 55, color: '#bcbd22' },
  { label: 'Greed (55-75)', from: 55, to: 75, color: '#2ca02c' },
  { label: 'Extreme Greed (75-100)', from: 75, to: 100, color: '#17becf' },
];

export const INDEX_LINE_COLOR = '#1f77b4';
export const INDEX_CHART_TITLE = 'CNN Fear & Greed Index (Last 12 Months)';
