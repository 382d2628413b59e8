import { MarketDataProvider, OhlcvBar } from '../types/market-data';
import { errorMessage } from '../types/errors';

/**
 * Default ATR lookback
 */
export const DEFAULT_ATR_PERIOD = 14;

/**
 * Minimum number of bars requested from the feed for an ATR estimate
 */
const MIN_OHLCV_LIMIT = 50;

type Series = ReadonlyArray<number | null | undefined>;

/**
 * One OHLC row that survived missing-value filtering
 */
export interface PriceBar {
  high: number;
  low: number;
  close: number;
}

function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Zip high/low/close series into bars, dropping any row with a missing value.
 * Series of unequal length are truncated to the shortest.
 */
export function toPriceBars(high: Series, low: Series, close: Series): PriceBar[] {
  const length = Math.min(high.length, low.length, close.length);
  const bars: PriceBar[] = [];

  for (let i = 0; i < length; i++) {
    const h = high[i];
    const l = low[i];
    const c = close[i];
    if (isFiniteNumber(h) && isFiniteNumber(l) && isFiniteNumber(c)) {
      bars.push({ high: h, low: l, close: c });
    }
  }

  return bars;
}

/**
 * True range per bar. The first bar has no previous close, so its true range
 * is its high-low range.
 */
export function calculateTrueRanges(bars: readonly PriceBar[]): number[] {
  return bars.map((bar, i) => {
    const highLow = bar.high - bar.low;
    if (i === 0) {
      return highLow;
    }
    const prevClose = bars[i - 1].close;
    return Math.max(highLow, Math.abs(bar.high - prevClose), Math.abs(bar.low - prevClose));
  });
}

/**
 * Estimate Average True Range
 *
 * With at least `period` bars the true ranges are smoothed with Wilder's
 * moving average (alpha = 1/period, seeded with the first true range). With
 * fewer bars the arithmetic mean is used instead.
 *
 * @returns A positive ATR, or null when fewer than 2 valid bars remain or the
 * result is not a positive number
 */
export function estimateAtr(
  high: Series,
  low: Series,
  close: Series,
  period: number = DEFAULT_ATR_PERIOD
): number | null {
  try {
    if (!Number.isInteger(period) || period < 1) {
      return null;
    }

    const bars = toPriceBars(high, low, close);
    if (bars.length < 2) {
      return null;
    }

    const trueRanges = calculateTrueRanges(bars);
    let atr: number;

    if (trueRanges.length < period) {
      atr = trueRanges.reduce((acc, tr) => acc + tr, 0) / trueRanges.length;
    } else {
      const alpha = 1 / period;
      atr = trueRanges[0];
      for (let i = 1; i < trueRanges.length; i++) {
        atr = (1 - alpha) * atr + alpha * trueRanges[i];
      }
    }

    return Number.isFinite(atr) && atr > 0 ? atr : null;
  } catch (error) {
    console.debug('ATR estimation failed', { error: errorMessage(error) });
    return null;
  }
}

/**
 * Estimate ATR directly from OHLCV bars
 */
export function estimateAtrFromBars(bars: readonly OhlcvBar[], period: number = DEFAULT_ATR_PERIOD): number | null {
  return estimateAtr(
    bars.map(bar => bar.high),
    bars.map(bar => bar.low),
    bars.map(bar => bar.close),
    period
  );
}

/**
 * Volatility estimates owned by one service instance, keyed by (symbol, period)
 */
export class VolatilityCache {
  private readonly entries = new Map<string, Map<number, number>>();

  get(symbol: string, period: number): number | null {
    return this.entries.get(symbol)?.get(period) ?? null;
  }

  set(symbol: string, period: number, value: number): void {
    let byPeriod = this.entries.get(symbol);
    if (!byPeriod) {
      byPeriod = new Map();
      this.entries.set(symbol, byPeriod);
    }
    byPeriod.set(period, value);
  }

  /**
   * Drop every period cached for a symbol
   */
  invalidate(symbol: string): void {
    this.entries.delete(symbol);
  }

  invalidateAll(): void {
    this.entries.clear();
  }

  get size(): number {
    let count = 0;
    for (const byPeriod of this.entries.values()) {
      count += byPeriod.size;
    }
    return count;
  }
}

/**
 * Volatility Service - fetches OHLCV history from the market-data feed and
 * caches positive ATR estimates per (symbol, period)
 */
export class VolatilityService {
  readonly cache = new VolatilityCache();

  constructor(private readonly marketData: MarketDataProvider) {}

  /**
   * Get the ATR for a symbol, from cache when available
   *
   * @returns A positive ATR, or null when history is unavailable or insufficient
   */
  async getAtr(symbol: string, period: number = DEFAULT_ATR_PERIOD): Promise<number | null> {
    const cached = this.cache.get(symbol, period);
    if (cached !== null) {
      return cached;
    }

    let bars: OhlcvBar[] | null;
    try {
      bars = await this.marketData.getOhlcv(symbol, Math.max(period * 3, MIN_OHLCV_LIMIT));
    } catch (error) {
      console.warn('OHLCV fetch failed, no volatility estimate', { symbol, period, error: errorMessage(error) });
      return null;
    }

    if (!bars || bars.length === 0) {
      console.debug('No OHLCV history for volatility estimate', { symbol, period });
      return null;
    }

    const atr = estimateAtrFromBars(bars, period);
    if (atr !== null) {
      this.cache.set(symbol, period, atr);
    }
    return atr;
  }

  invalidate(symbol: string): void {
    this.cache.invalidate(symbol);
  }

  invalidateAll(): void {
    this.cache.invalidateAll();
  }
}
