import * as fc from 'fast-check';
import { SessionMetricsService } from './session-metrics';
import { fillSideArb, priceArb, symbolArb } from '../test/generators';
import { FillRecord } from '../types/portfolio';

function fillRecord(overrides: Partial<FillRecord> = {}): FillRecord {
  return {
    sessionId: 'session-1',
    sequence: 1,
    fillId: 'fill-1',
    symbol: 'AAA-USD',
    side: 'BUY',
    quantity: 1,
    price: 100,
    fee: 0.1,
    notional: 100,
    realizedPnl: 0,
    strategy: null,
    executedAt: '2026-01-01T10:00:00.000Z',
    ...overrides
  };
}

const fillRecordArb = (): fc.Arbitrary<FillRecord> =>
  fc.record({
    sessionId: fc.constant('session-1'),
    sequence: fc.nat(),
    fillId: fc.uuid(),
    symbol: symbolArb(),
    side: fillSideArb(),
    quantity: fc.double({ min: 0.001, max: 50, noNaN: true, noDefaultInfinity: true }),
    price: priceArb(1, 1000),
    fee: fc.double({ min: 0, max: 5, noNaN: true, noDefaultInfinity: true }),
    notional: priceArb(1, 1000),
    realizedPnl: fc.double({ min: -100, max: 100, noNaN: true, noDefaultInfinity: true }),
    strategy: fc.option(fc.constantFrom('momentum', 'breakout'), { nil: null }),
    executedAt: fc.constant('2026-01-01T10:00:00.000Z')
  });

describe('SessionMetricsService', () => {
  describe('calculate', () => {
    it('should return zeros for an empty log', () => {
      expect(SessionMetricsService.calculate([])).toEqual({
        totalTrades: 0,
        totalVolume: 0,
        totalFees: 0,
        totalNotional: 0,
        totalRealizedPnl: 0,
        buyTrades: 0,
        sellTrades: 0,
        symbolsTraded: [],
        strategiesUsed: []
      });
    });

    it('should count sides and collect distinct symbols and strategies', () => {
      const metrics = SessionMetricsService.calculate([
        fillRecord({ symbol: 'CCC-USD', strategy: 'momentum' }),
        fillRecord({ sequence: 2, side: 'SELL', quantity: 2, fee: 0.25, notional: 220, realizedPnl: 15 }),
        fillRecord({ sequence: 3, symbol: 'CCC-USD', side: 'SELL', strategy: 'breakout', fee: 0.5 })
      ]);

      expect(metrics.totalTrades).toBe(3);
      expect(metrics.buyTrades).toBe(1);
      expect(metrics.sellTrades).toBe(2);
      expect(metrics.totalVolume).toBe(4);
      expect(metrics.totalFees).toBeCloseTo(0.85, 10);
      expect(metrics.totalNotional).toBe(420);
      expect(metrics.totalRealizedPnl).toBe(15);
      expect(metrics.symbolsTraded).toEqual(['AAA-USD', 'CCC-USD']);
      expect(metrics.strategiesUsed).toEqual(['breakout', 'momentum']);
    });

    it('should split every trade into exactly one side', () => {
      fc.assert(
        fc.property(fc.array(fillRecordArb(), { maxLength: 30 }), fills => {
          const metrics = SessionMetricsService.calculate(fills);

          expect(metrics.buyTrades + metrics.sellTrades).toBe(fills.length);
          expect(metrics.totalVolume).toBeGreaterThanOrEqual(0);
          expect(metrics.symbolsTraded.length).toBeLessThanOrEqual(fills.length);
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('filterByDate', () => {
    it('should keep fills from the given UTC date only', () => {
      const fills = [
        fillRecord({ executedAt: '2026-01-01T23:59:59.999Z' }),
        fillRecord({ sequence: 2, executedAt: '2026-01-02T00:00:00.000Z' })
      ];

      expect(SessionMetricsService.filterByDate(fills, '2026-01-02').map(fill => fill.sequence)).toEqual([2]);
      expect(SessionMetricsService.filterByDate(fills, '2026-01-03')).toEqual([]);
    });
  });
});
