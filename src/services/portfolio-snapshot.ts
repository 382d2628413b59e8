/**
 * Portfolio Snapshot - immutable read model derived from ledger state and marks.
 * Reporting and UI collaborators read this instead of the ledger itself.
 */

import { MarkMap } from '../types/market-data';
import { LedgerState, Position } from '../types/portfolio';
import { PortfolioSnapshot } from '../types/snapshot';

export const DEFAULT_NEGLIGIBLE_QUANTITY = 1e-8;

function isUsableMark(mark: number | undefined): mark is number {
  return typeof mark === 'number' && Number.isFinite(mark) && mark > 0;
}

/**
 * True when a quantity is too small to count as an open position
 */
export function isNegligible(quantity: number, negligibleQuantity: number = DEFAULT_NEGLIGIBLE_QUANTITY): boolean {
  return Math.abs(quantity) < negligibleQuantity;
}

/**
 * Build a snapshot. Negligible positions are dropped; positions without a
 * usable mark stay in the snapshot but contribute zero value and P&L.
 */
export function createSnapshot(
  state: Pick<LedgerState, 'cash' | 'positions'>,
  marks: MarkMap,
  timestamp: Date = new Date(),
  negligibleQuantity: number = DEFAULT_NEGLIGIBLE_QUANTITY
): PortfolioSnapshot {
  const positions: Record<string, Readonly<Position>> = {};
  const usedMarks: MarkMap = {};
  const positionValues: Record<string, number> = {};
  const positionPnl: Record<string, number> = {};

  let totalPositionValue = 0;
  let longValue = 0;
  let shortValue = 0;
  let unrealizedPnl = 0;
  let pricedPositions = 0;

  for (const [symbol, position] of Object.entries(state.positions)) {
    if (isNegligible(position.quantity, negligibleQuantity)) {
      continue;
    }
    positions[symbol] = Object.freeze({ ...position });

    const mark = marks[symbol];
    if (!isUsableMark(mark)) {
      positionValues[symbol] = 0;
      positionPnl[symbol] = 0;
      continue;
    }

    const value = position.quantity * mark;
    const pnl = (mark - position.averageCost) * position.quantity;

    usedMarks[symbol] = mark;
    positionValues[symbol] = value;
    positionPnl[symbol] = pnl;
    totalPositionValue += value;
    unrealizedPnl += pnl;
    pricedPositions++;

    if (position.quantity > 0) {
      longValue += value;
    } else {
      shortValue += value;
    }
  }

  return Object.freeze({
    timestamp: timestamp.toISOString(),
    cash: state.cash,
    positions: Object.freeze(positions),
    marks: Object.freeze(usedMarks),
    equity: state.cash + totalPositionValue,
    unrealizedPnl,
    pricedPositions,
    positionCount: Object.keys(positions).length,
    totalPositionValue,
    longValue,
    shortValue,
    positionValues: Object.freeze(positionValues),
    positionPnl: Object.freeze(positionPnl)
  });
}

/**
 * Snapshot of a session that holds nothing but cash
 */
export function createEmptySnapshot(initialCash: number, timestamp: Date = new Date()): PortfolioSnapshot {
  return createSnapshot({ cash: initialCash, positions: {} }, {}, timestamp);
}

/**
 * One line per position, joined by "; "
 */
export function formatPositionSummary(snapshot: PortfolioSnapshot): string {
  const symbols = Object.keys(snapshot.positions);
  if (symbols.length === 0) {
    return 'No positions';
  }

  return symbols
    .map(symbol => {
      const position = snapshot.positions[symbol];
      const mark = snapshot.marks[symbol] ?? 0;
      const value = snapshot.positionValues[symbol] ?? 0;
      const pnl = snapshot.positionPnl[symbol] ?? 0;
      return (
        `${symbol}: qty=${position.quantity.toFixed(6)} @ $${mark.toFixed(4)} ` +
        `avg_cost=$${position.averageCost.toFixed(4)} value=$${value.toFixed(2)} pnl=$${pnl.toFixed(2)}`
      );
    })
    .join('; ');
}

export function formatEquitySummary(snapshot: PortfolioSnapshot): string {
  return (
    `equity=$${snapshot.equity.toFixed(2)} cash=$${snapshot.cash.toFixed(2)} ` +
    `long_val=$${snapshot.longValue.toFixed(2)} short_val=$${snapshot.shortValue.toFixed(2)} ` +
    `positions=${snapshot.positionCount}`
  );
}
