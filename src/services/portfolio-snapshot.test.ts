import * as fc from 'fast-check';
import {
  createEmptySnapshot,
  createSnapshot,
  formatEquitySummary,
  formatPositionSummary,
  isNegligible
} from './portfolio-snapshot';
import { Position } from '../types/portfolio';
import { positionArb, priceArb } from '../test/generators';

const AT = new Date('2026-01-01T12:00:00.000Z');

function position(symbol: string, quantity: number, averageCost: number): Position {
  return { symbol, quantity, averageCost, openedAt: AT.toISOString(), updatedAt: AT.toISOString() };
}

const STATE = {
  cash: 1000,
  positions: {
    'AAA-USD': position('AAA-USD', 2, 100),
    'BBB-USD': position('BBB-USD', -1, 50),
    'CCC-USD': position('CCC-USD', 1e-9, 5),
    'DDD-USD': position('DDD-USD', 3, 10)
  }
};

const MARKS = { 'AAA-USD': 110, 'BBB-USD': 40, 'CCC-USD': 5, 'EEE-USD': 7 };

describe('PortfolioSnapshot', () => {
  describe('createSnapshot', () => {
    const snapshot = createSnapshot(STATE, MARKS, AT);

    it('should drop negligible positions and keep unpriced ones', () => {
      expect(Object.keys(snapshot.positions)).toEqual(['AAA-USD', 'BBB-USD', 'DDD-USD']);
      expect(snapshot.positionCount).toBe(3);
      expect(snapshot.pricedPositions).toBe(2);
    });

    it('should value priced positions at their marks', () => {
      expect(snapshot.equity).toBe(1180);
      expect(snapshot.totalPositionValue).toBe(180);
      expect(snapshot.longValue).toBe(220);
      expect(snapshot.shortValue).toBe(-40);
      expect(snapshot.unrealizedPnl).toBe(30);
      expect(snapshot.positionValues).toEqual({ 'AAA-USD': 220, 'BBB-USD': -40, 'DDD-USD': 0 });
      expect(snapshot.positionPnl).toEqual({ 'AAA-USD': 20, 'BBB-USD': 10, 'DDD-USD': 0 });
    });

    it('should only record the marks it used', () => {
      expect(snapshot.marks).toEqual({ 'AAA-USD': 110, 'BBB-USD': 40 });
      expect(snapshot.timestamp).toBe('2026-01-01T12:00:00.000Z');
    });

    it('should be deeply frozen', () => {
      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.positions)).toBe(true);
      expect(Object.isFrozen(snapshot.positions['AAA-USD'])).toBe(true);
      expect(Object.isFrozen(snapshot.marks)).toBe(true);
    });

    it('should not share position objects with the ledger state', () => {
      expect(snapshot.positions['AAA-USD']).not.toBe(STATE.positions['AAA-USD']);
      expect(Object.isFrozen(STATE.positions['AAA-USD'])).toBe(false);
    });

    it('should ignore non-positive or non-finite marks', () => {
      const broken = createSnapshot(STATE, { 'AAA-USD': 0, 'BBB-USD': Number.NaN }, AT);

      expect(broken.pricedPositions).toBe(0);
      expect(broken.equity).toBe(1000);
    });

    it('should equal cash plus cost basis plus unrealized P&L when every position is priced', () => {
      fc.assert(
        fc.property(
          fc.double({ min: -1e6, max: 1e6, noNaN: true }),
          fc.array(positionArb(), { maxLength: 3 }),
          priceArb(1, 1000),
          (cash, positions, mark) => {
            const bySymbol: Record<string, Position> = {};
            const marks: Record<string, number> = {};
            for (const held of positions) {
              bySymbol[held.symbol] = held;
              marks[held.symbol] = mark;
            }

            const result = createSnapshot({ cash, positions: bySymbol }, marks, AT);
            const costBasis = Object.values(bySymbol).reduce((sum, held) => sum + held.quantity * held.averageCost, 0);

            expect(result.pricedPositions).toBe(result.positionCount);
            expect(result.equity).toBeCloseTo(cash + costBasis + result.unrealizedPnl, 6);
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('isNegligible', () => {
    it('should compare the absolute quantity with the threshold', () => {
      expect(isNegligible(-5e-9)).toBe(true);
      expect(isNegligible(1e-8)).toBe(false);
      expect(isNegligible(0.5, 1)).toBe(true);
    });
  });

  describe('formatters', () => {
    it('should format each position', () => {
      expect(formatPositionSummary(createSnapshot(STATE, MARKS, AT))).toBe(
        'AAA-USD: qty=2.000000 @ $110.0000 avg_cost=$100.0000 value=$220.00 pnl=$20.00; ' +
          'BBB-USD: qty=-1.000000 @ $40.0000 avg_cost=$50.0000 value=$-40.00 pnl=$10.00; ' +
          'DDD-USD: qty=3.000000 @ $0.0000 avg_cost=$10.0000 value=$0.00 pnl=$0.00'
      );
    });

    it('should format the equity line', () => {
      expect(formatEquitySummary(createSnapshot(STATE, MARKS, AT))).toBe(
        'equity=$1180.00 cash=$1000.00 long_val=$220.00 short_val=$-40.00 positions=3'
      );
    });

    it('should report an empty portfolio', () => {
      const empty = createEmptySnapshot(500, AT);

      expect(formatPositionSummary(empty)).toBe('No positions');
      expect(formatEquitySummary(empty)).toBe(
        'equity=$500.00 cash=$500.00 long_val=$0.00 short_val=$0.00 positions=0'
      );
    });
  });
});
