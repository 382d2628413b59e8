/**
 * Mark Price Resolver
 *
 * Turns a noisy ticker into one validated valuation price. Tiers are tried in
 * order (mid of bid/ask, last trade, generic price) and the first candidate
 * is then checked against the symbol's sanity band. Anything that fails
 * resolves to null; a stale or zero price is never returned.
 */

import {
  MarkMap,
  MarketDataProvider,
  PriceBand,
  ResolvedMark,
  TickerSnapshot
} from '../types/market-data';
import { errorMessage } from '../types/errors';

export const DEFAULT_PRICE_BAND: PriceBand = { min: 0.01, max: 1_000_000 };

export interface MarkPriceResolverOptions {
  /** Per-symbol plausibility ranges */
  bands?: Record<string, PriceBand>;
  /** Range applied to symbols without their own band */
  defaultBand?: PriceBand;
}

function isPositive(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Select a candidate price from a ticker without validating it
 */
export function selectCandidate(ticker: TickerSnapshot): ResolvedMark | null {
  if (isPositive(ticker.bid) && isPositive(ticker.ask)) {
    return { price: (ticker.bid + ticker.ask) / 2, tier: 'mid' };
  }
  if (isPositive(ticker.last)) {
    return { price: ticker.last, tier: 'last' };
  }
  if (isPositive(ticker.price)) {
    return { price: ticker.price, tier: 'price' };
  }
  return null;
}

export class MarkPriceResolver {
  private readonly bands: Map<string, PriceBand>;
  private readonly defaultBand: PriceBand;

  constructor(options: MarkPriceResolverOptions = {}) {
    this.bands = new Map(Object.entries(options.bands ?? {}));
    this.defaultBand = options.defaultBand ?? DEFAULT_PRICE_BAND;
  }

  /**
   * Plausibility range for a symbol
   */
  bandFor(symbol: string): PriceBand {
    return this.bands.get(symbol) ?? this.defaultBand;
  }

  /**
   * Check that a price is usable as a mark for the symbol
   */
  validate(symbol: string, price: number | null | undefined): price is number {
    if (!isPositive(price)) {
      return false;
    }

    const band = this.bandFor(symbol);
    if (price < band.min || price > band.max) {
      console.warn('Mark price outside sanity band', { symbol, price, min: band.min, max: band.max });
      return false;
    }

    return true;
  }

  /**
   * Resolve a validated mark and report which tier produced it
   *
   * @returns The mark and its tier, or null when no tier yields a valid price
   */
  resolveDetailed(symbol: string, ticker: TickerSnapshot | null | undefined): ResolvedMark | null {
    if (!ticker) {
      console.debug('No ticker for mark price', { symbol });
      return null;
    }

    const candidate = selectCandidate(ticker);
    if (!candidate) {
      console.debug('No mark price tier satisfied', { symbol });
      return null;
    }

    if (!this.validate(symbol, candidate.price)) {
      return null;
    }

    console.debug('Mark price resolved', { symbol, tier: candidate.tier, price: candidate.price });
    return candidate;
  }

  /**
   * Resolve a validated mark price
   *
   * @returns The price, or null when unavailable
   */
  resolve(symbol: string, ticker: TickerSnapshot | null | undefined): number | null {
    return this.resolveDetailed(symbol, ticker)?.price ?? null;
  }

  /**
   * Fetch tickers and resolve marks for several symbols. Symbols whose ticker
   * cannot be fetched or resolved are left out of the result.
   */
  async resolveMarks(symbols: Iterable<string>, provider: MarketDataProvider): Promise<MarkMap> {
    const marks: MarkMap = {};

    for (const symbol of new Set(symbols)) {
      let ticker: TickerSnapshot | null;
      try {
        ticker = await provider.getTicker(symbol);
      } catch (error) {
        console.warn('Ticker fetch failed, no mark available', { symbol, error: errorMessage(error) });
        continue;
      }

      const price = this.resolve(symbol, ticker);
      if (price !== null) {
        marks[symbol] = price;
      }
    }

    return marks;
  }
}
