import * as fc from 'fast-check';
import { MarkPriceResolver, selectCandidate } from './mark-price';
import { StubMarketData } from '../test/market-data';
import { tickerArb } from '../test/generators';

describe('MarkPriceResolver', () => {
  beforeEach(() => {
    jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('selectCandidate', () => {
    it('should prefer the bid/ask mid', () => {
      expect(selectCandidate({ bid: 100, ask: 102, last: 150 })).toEqual({ price: 101, tier: 'mid' });
    });

    it('should fall back to last when either side of the book is unusable', () => {
      expect(selectCandidate({ bid: -1, ask: 5, last: 105 })).toEqual({ price: 105, tier: 'last' });
      expect(selectCandidate({ bid: 100, ask: null, last: 105 })).toEqual({ price: 105, tier: 'last' });
    });

    it('should fall back to the generic price last of all', () => {
      expect(selectCandidate({ bid: -1, ask: 5, last: 0, price: 7 })).toEqual({ price: 7, tier: 'price' });
    });

    it('should return null when no tier yields a positive price', () => {
      expect(selectCandidate({})).toBeNull();
      expect(selectCandidate({ bid: Number.NaN, ask: 1, last: Number.POSITIVE_INFINITY, price: -3 })).toBeNull();
    });
  });

  describe('resolve', () => {
    const resolver = new MarkPriceResolver();

    it('should resolve the examples', () => {
      expect(resolver.resolve('BTC-USD', { bid: 100, ask: 102 })).toBe(101);
      expect(resolver.resolve('BTC-USD', { last: 105 })).toBe(105);
      expect(resolver.resolve('BTC-USD', {})).toBeNull();
    });

    it('should return null without a ticker', () => {
      expect(resolver.resolve('BTC-USD', null)).toBeNull();
      expect(resolver.resolve('BTC-USD', undefined)).toBeNull();
    });

    it('should reject prices outside the default band', () => {
      expect(resolver.resolve('BTC-USD', { last: 0.001 })).toBeNull();
      expect(resolver.resolve('BTC-USD', { last: 2_000_000 })).toBeNull();
      expect(console.warn).toHaveBeenCalledWith('Mark price outside sanity band', {
        symbol: 'BTC-USD',
        price: 2_000_000,
        min: 0.01,
        max: 1_000_000
      });
    });

    it('should accept prices on the band edges', () => {
      expect(resolver.resolve('BTC-USD', { last: 0.01 })).toBe(0.01);
      expect(resolver.resolve('BTC-USD', { last: 1_000_000 })).toBe(1_000_000);
    });

    it('should not fall through to a lower tier when the selected candidate is out of band', () => {
      const banded = new MarkPriceResolver({ bands: { 'ETH-USD': { min: 1000, max: 5000 } } });

      expect(banded.resolve('ETH-USD', { bid: 10, ask: 20, last: 3000 })).toBeNull();
      expect(banded.resolve('ETH-USD', { last: 3000 })).toBe(3000);
      expect(banded.resolve('SOL-USD', { last: 20 })).toBe(20);
    });

    it('should report the tier that produced the mark', () => {
      expect(resolver.resolveDetailed('BTC-USD', { price: 42 })).toEqual({ price: 42, tier: 'price' });
    });

    it('should only ever return null or a positive in-band price', () => {
      fc.assert(
        fc.property(tickerArb(), ticker => {
          const mark = resolver.resolve('BTC-USD', ticker);
          if (mark !== null) {
            expect(Number.isFinite(mark)).toBe(true);
            expect(mark).toBeGreaterThanOrEqual(0.01);
            expect(mark).toBeLessThanOrEqual(1_000_000);
          }
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('resolveMarks', () => {
    it('should skip symbols that fail to fetch or resolve', async () => {
      const market = new StubMarketData()
        .setTicker('AAA-USD', { bid: 9, ask: 11 })
        .setTicker('BBB-USD', {})
        .setLast('CCC-USD', 3);
      market.failing.add('CCC-USD');

      const marks = await new MarkPriceResolver().resolveMarks(
        ['AAA-USD', 'BBB-USD', 'CCC-USD', 'DDD-USD', 'AAA-USD'],
        market
      );

      expect(marks).toEqual({ 'AAA-USD': 10 });
    });
  });
});
