/**
 * Portfolio Snapshot Types
 */

import { MarkMap } from './market-data';
import { Position } from './portfolio';

/**
 * Immutable read model derived from ledger state and marks
 */
export interface PortfolioSnapshot {
  readonly timestamp: string;
  readonly cash: number;
  readonly positions: Readonly<Record<string, Readonly<Position>>>;
  readonly marks: Readonly<MarkMap>;
  readonly equity: number;
  readonly unrealizedPnl: number;
  readonly pricedPositions: number;
  readonly positionCount: number;
  readonly totalPositionValue: number;
  readonly longValue: number;
  readonly shortValue: number;
  readonly positionValues: Readonly<Record<string, number>>;
  readonly positionPnl: Readonly<Record<string, number>>;
}
