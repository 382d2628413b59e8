/**
 * Market Data Types
 */

/**
 * Top-of-book ticker as delivered by the market-data feed.
 * Any field may be missing or carry garbage; consumers must validate.
 */
export interface TickerSnapshot {
  bid?: number | null;
  ask?: number | null;
  last?: number | null;
  price?: number | null;
}

export interface OhlcvBar {
  ts: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Market-data collaborator. Both calls resolve to null when the feed has nothing.
 */
export interface MarketDataProvider {
  getTicker(symbol: string): Promise<TickerSnapshot | null>;
  getOhlcv(symbol: string, limit: number): Promise<OhlcvBar[] | null>;
}

export type MarkTier = 'mid' | 'last' | 'price';

export interface ResolvedMark {
  price: number;
  tier: MarkTier;
}

/**
 * Inclusive plausibility range for an instrument's price
 */
export interface PriceBand {
  min: number;
  max: number;
}

export type MarkMap = Record<string, number>;
