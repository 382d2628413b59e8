/**
 * Portfolio Ledger
 *
 * Sole owner of the account's cash, positions, fees and realized P&L for one
 * session. Every mutation goes through a serial queue, is computed on local
 * copies, persisted, and only then committed to memory, so readers never see
 * a fill the store has not accepted.
 *
 * Lifecycle: UNINITIALIZED -> BOOTSTRAPPED -> ACTIVE, re-entered through
 * loadOrInitialize on every restart.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CashEquityReason,
  CashEquityRecord,
  Fill,
  FillRecord,
  FillResult,
  LedgerConfig,
  LedgerPhase,
  LedgerState,
  LoadOutcome,
  LoadResult,
  PortfolioStore,
  Position,
  SessionMetrics
} from '../types/portfolio';
import { MarkMap, MarketDataProvider } from '../types/market-data';
import { PortfolioSnapshot } from '../types/snapshot';
import {
  ConfigurationError,
  InsufficientCashError,
  InvariantViolationError,
  LedgerStateError,
  PersistenceError,
  errorMessage
} from '../types/errors';
import { resolveLedgerConfig } from '../config';
import { MarkPriceResolver } from './mark-price';
import { createSnapshot, isNegligible } from './portfolio-snapshot';
import { SessionMetricsService } from './session-metrics';
import { SerialQueue } from '../utils/serial-queue';

export interface PortfolioLedgerOptions {
  sessionId: string;
  store: PortfolioStore;
  marketData: MarketDataProvider;
  resolver?: MarkPriceResolver;
  config?: Partial<LedgerConfig>;
  clock?: () => Date;
}

/**
 * Outcome of applying a signed quantity to an existing position
 */
export interface PositionChange {
  position: Position | null;
  realizedPnl: number;
}

/**
 * Start-of-session writes that have not reached the store yet. A null
 * sequence means the newest stored sequence is still unknown.
 */
interface PendingStart {
  reason: CashEquityReason;
  clearPositions: boolean;
  knownSequence: number | null;
}

interface Valuation {
  equity: number;
  unrealizedPnl: number;
  allPriced: boolean;
}

function isFinitePositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Apply a signed fill quantity to a position
 *
 * Same-direction adds re-average the cost. Opposite-direction fills realize
 * P&L on the closed quantity at the old average cost; a fill that flips the
 * position opens the remainder at the fill price. A negligible result closes
 * the position.
 */
export function applyToPosition(
  existing: Position | null,
  symbol: string,
  signedQuantity: number,
  price: number,
  timestamp: string,
  negligibleQuantity: number
): PositionChange {
  const previousQuantity = existing && !isNegligible(existing.quantity, negligibleQuantity) ? existing.quantity : 0;

  if (previousQuantity === 0 || Math.sign(previousQuantity) === Math.sign(signedQuantity)) {
    const newQuantity = previousQuantity + signedQuantity;
    if (isNegligible(newQuantity, negligibleQuantity)) {
      return { position: null, realizedPnl: 0 };
    }

    const previousCost = existing && previousQuantity !== 0 ? previousQuantity * existing.averageCost : 0;
    return {
      position: {
        symbol,
        quantity: newQuantity,
        averageCost: (previousCost + signedQuantity * price) / newQuantity,
        openedAt: existing && previousQuantity !== 0 ? existing.openedAt : timestamp,
        updatedAt: timestamp
      },
      realizedPnl: 0
    };
  }

  // Reducing, closing or flipping an existing position
  const averageCost = existing ? existing.averageCost : price;
  const closedQuantity = Math.min(Math.abs(signedQuantity), Math.abs(previousQuantity));
  const realizedPnl = closedQuantity * (price - averageCost) * Math.sign(previousQuantity);
  const newQuantity = previousQuantity + signedQuantity;

  if (isNegligible(newQuantity, negligibleQuantity)) {
    return { position: null, realizedPnl };
  }

  const flipped = Math.sign(newQuantity) !== Math.sign(previousQuantity);
  return {
    position: {
      symbol,
      quantity: newQuantity,
      averageCost: flipped ? price : averageCost,
      openedAt: flipped || !existing ? timestamp : existing.openedAt,
      updatedAt: timestamp
    },
    realizedPnl
  };
}

/**
 * Rebuild positions by replaying a fill log in sequence order
 */
export function replayFills(fills: readonly FillRecord[], negligibleQuantity: number): Map<string, Position> {
  const positions = new Map<string, Position>();
  const ordered = [...fills].sort((a, b) => a.sequence - b.sequence);

  for (const fill of ordered) {
    const change = applyToPosition(
      positions.get(fill.symbol) ?? null,
      fill.symbol,
      fill.side === 'BUY' ? fill.quantity : -fill.quantity,
      fill.price,
      fill.executedAt,
      negligibleQuantity
    );
    if (change.position) {
      positions.set(fill.symbol, change.position);
    } else {
      positions.delete(fill.symbol);
    }
  }

  return positions;
}

export class PortfolioLedger {
  readonly sessionId: string;
  readonly config: LedgerConfig;

  private readonly store: PortfolioStore;
  private readonly marketData: MarketDataProvider;
  private readonly resolver: MarkPriceResolver;
  private readonly clock: () => Date;
  private readonly queue = new SerialQueue();

  private ledgerPhase: LedgerPhase = 'UNINITIALIZED';
  private cash = 0;
  private totalFees = 0;
  private totalRealizedPnl = 0;
  private positions = new Map<string, Position>();
  private lastSequence = 0;
  private pendingStart: PendingStart | null = null;

  /**
   * @throws ConfigurationError when the ledger config fails validation
   */
  constructor(options: PortfolioLedgerOptions) {
    if (!options.sessionId) {
      throw new ConfigurationError('sessionId is required', ['sessionId']);
    }
    this.sessionId = options.sessionId;
    this.store = options.store;
    this.marketData = options.marketData;
    this.resolver = options.resolver ?? new MarkPriceResolver();
    this.config = resolveLedgerConfig(options.config);
    this.clock = options.clock ?? (() => new Date());
  }

  get phase(): LedgerPhase {
    return this.ledgerPhase;
  }

  // ==================== Lifecycle ====================

  /**
   * Load the session's persisted state, or start it fresh
   *
   * - no stored record: bootstrap from target capital
   * - stored value differs from target by more than the capital change
   *   threshold: clear positions and reset to target capital
   * - otherwise resume stored cash, fees and positions, valuing them at
   *   live marks
   *
   * Store failures never prevent start-up: the ledger bootstraps from target
   * capital in memory and reports a degraded outcome. Start-of-session writes
   * that fail (clearing stale positions, the start record) are retried before
   * the next write, which is refused until they succeed.
   *
   * @throws ConfigurationError when the target capital is not positive
   */
  loadOrInitialize(targetCapital: number): Promise<LoadResult> {
    return this.queue.run(() => this.load(targetCapital));
  }

  private async load(targetCapital: number): Promise<LoadResult> {
    if (!isFinitePositive(targetCapital)) {
      throw new ConfigurationError(`Invalid target capital: ${targetCapital}`, ['targetCapital']);
    }

    let stored: CashEquityRecord | null;
    let storedPositions: Position[];
    try {
      stored = await this.store.getLatestCashEquity(this.sessionId);
      storedPositions = await this.store.getPositions(this.sessionId);
      if (stored) {
        this.assertWellFormed(stored);
      }
    } catch (error) {
      console.error('Portfolio state unreadable, starting from target capital', {
        sessionId: this.sessionId,
        targetCapital,
        error: errorMessage(error)
      });
      return this.bootstrap(targetCapital, { reason: 'BOOTSTRAP', clearPositions: true, knownSequence: null }, 'degraded');
    }

    if (!stored) {
      return this.bootstrap(
        targetCapital,
        { reason: 'BOOTSTRAP', clearPositions: storedPositions.length > 0, knownSequence: 0 },
        'bootstrapped'
      );
    }

    const reference = Math.max(stored.cashBalance, stored.totalEquity);
    const capitalChangeRatio = reference > 0
      ? Math.abs(targetCapital - reference) / reference
      : Number.POSITIVE_INFINITY;

    if (capitalChangeRatio > this.config.capitalChangeThreshold) {
      console.warn('Capital change exceeds threshold, clearing positions and resetting session', {
        sessionId: this.sessionId,
        targetCapital,
        storedCash: stored.cashBalance,
        storedEquity: stored.totalEquity,
        capitalChangeRatio,
        threshold: this.config.capitalChangeThreshold,
        clearedPositions: storedPositions.length
      });
      return this.bootstrap(
        targetCapital,
        { reason: 'CAPITAL_RESET', clearPositions: true, knownSequence: stored.sequence },
        'reset'
      );
    }

    return this.resume(stored, storedPositions);
  }

  private assertWellFormed(record: CashEquityRecord): void {
    const figures = [record.cashBalance, record.totalEquity, record.totalFees, record.totalRealizedPnl, record.sequence];
    if (!figures.every(Number.isFinite)) {
      throw new PersistenceError('getLatestCashEquity', 'malformed cash/equity record');
    }
  }

  private async bootstrap(targetCapital: number, start: PendingStart, outcome: LoadOutcome): Promise<LoadResult> {
    this.cash = targetCapital;
    this.totalFees = 0;
    this.totalRealizedPnl = 0;
    this.positions = new Map();
    this.lastSequence = start.knownSequence ?? 0;
    this.pendingStart = { ...start };
    this.ledgerPhase = 'BOOTSTRAPPED';

    let finalOutcome = outcome;
    try {
      await this.completeStart();
    } catch (error) {
      finalOutcome = 'degraded';
      console.error('Failed to persist session start, writes blocked until it succeeds', {
        sessionId: this.sessionId,
        reason: start.reason,
        error: errorMessage(error)
      });
    }

    this.ledgerPhase = 'ACTIVE';
    console.log('Portfolio session started', {
      sessionId: this.sessionId,
      outcome: finalOutcome,
      reason: start.reason,
      cash: targetCapital
    });

    return { outcome: finalOutcome, cash: targetCapital, equity: targetCapital, positions: [] };
  }

  /**
   * Persist the pending start: learn the newest stored sequence, clear stale
   * positions, then append the start record. Steps that succeed are not
   * repeated on retry.
   */
  private async completeStart(): Promise<void> {
    const pending = this.pendingStart;
    if (!pending) {
      return;
    }

    if (pending.knownSequence === null) {
      const latest = await this.store.getLatestCashEquity(this.sessionId);
      pending.knownSequence = latest && Number.isFinite(latest.sequence) ? latest.sequence : 0;
      this.lastSequence = Math.max(this.lastSequence, pending.knownSequence);
    }

    if (pending.clearPositions) {
      await this.store.clearAllPositions(this.sessionId);
      pending.clearPositions = false;
    }

    const record = this.buildRecord(pending.reason, this.cash, this.cash, 0, 0, 0);
    await this.store.appendCashEquity(record);
    this.lastSequence = record.sequence;
    this.pendingStart = null;
  }

  /**
   * @throws PersistenceError when the session start still cannot be persisted
   */
  private async ensureStarted(operation: string): Promise<void> {
    if (!this.pendingStart) {
      return;
    }
    try {
      await this.completeStart();
    } catch (error) {
      console.error('Session start still not persisted, write refused', {
        sessionId: this.sessionId,
        operation,
        error: errorMessage(error)
      });
      throw new PersistenceError(operation, `session start not persisted: ${errorMessage(error)}`, error);
    }
    console.log('Session start persisted', { sessionId: this.sessionId, sequence: this.lastSequence });
  }

  private async resume(stored: CashEquityRecord, storedPositions: Position[]): Promise<LoadResult> {
    const positions = new Map<string, Position>();
    for (const position of storedPositions) {
      if (!isNegligible(position.quantity, this.config.negligibleQuantity)) {
        positions.set(position.symbol, { ...position });
      }
    }

    this.cash = stored.cashBalance;
    this.totalFees = stored.totalFees;
    this.totalRealizedPnl = stored.totalRealizedPnl;
    this.positions = positions;
    this.lastSequence = stored.sequence;
    this.pendingStart = null;
    this.ledgerPhase = 'BOOTSTRAPPED';

    const marks = await this.resolver.resolveMarks(positions.keys(), this.marketData);
    const valuation = this.value(this.cash, positions, marks);

    this.ledgerPhase = 'ACTIVE';
    console.log('Portfolio session resumed', {
      sessionId: this.sessionId,
      cash: this.cash,
      equity: valuation.equity,
      storedEquity: stored.totalEquity,
      positions: positions.size,
      allPriced: valuation.allPriced
    });

    return {
      outcome: 'resumed',
      cash: this.cash,
      equity: valuation.equity,
      positions: Array.from(positions.values(), position => ({ ...position }))
    };
  }

  // ==================== Mutations ====================

  /**
   * Apply an executed fill
   *
   * Cash moves by the fill notional (debited on BUY, credited on SELL) minus
   * the fee. The position is re-averaged, reduced, closed or flipped, and a
   * FILL record valued at current marks is appended. Nothing is committed in
   * memory unless the store accepts the position change, the fill log entry
   * and the record.
   *
   * @throws LedgerStateError when the ledger is not ACTIVE
   * @throws ConfigurationError for a malformed fill
   * @throws InsufficientCashError when overdraft is disabled and cash would go negative
   * @throws InvariantViolationError when equity fails to reconcile
   * @throws PersistenceError when the store rejects the change; the fill is not applied
   */
  applyFill(fill: Fill): Promise<FillResult> {
    return this.queue.run(() => this.commitFill(fill));
  }

  private async commitFill(fill: Fill): Promise<FillResult> {
    this.requireActive('apply fill');
    this.validateFill(fill);
    await this.ensureStarted('applyFill');

    const now = this.clock().toISOString();
    const signedQuantity = fill.side === 'BUY' ? fill.quantity : -fill.quantity;
    const notional = fill.quantity * fill.price;
    const cashAfter = fill.side === 'BUY'
      ? this.cash - notional - fill.fee
      : this.cash + notional - fill.fee;

    if (!this.config.allowNegativeCash && fill.side === 'BUY' && cashAfter < 0) {
      throw new InsufficientCashError(notional + fill.fee, this.cash);
    }

    const previous = this.positions.get(fill.symbol) ?? null;
    const change = applyToPosition(
      previous,
      fill.symbol,
      signedQuantity,
      fill.price,
      now,
      this.config.negligibleQuantity
    );

    const positionsAfter = new Map(this.positions);
    if (change.position) {
      positionsAfter.set(fill.symbol, change.position);
    } else {
      positionsAfter.delete(fill.symbol);
    }

    const marks = await this.resolver.resolveMarks(
      new Set([...this.positions.keys(), fill.symbol]),
      this.marketData
    );
    if (marks[fill.symbol] === undefined) {
      marks[fill.symbol] = fill.price;
    }

    const valuation = this.value(cashAfter, positionsAfter, marks);
    const feesAfter = this.totalFees + fill.fee;
    const realizedAfter = this.totalRealizedPnl + change.realizedPnl;

    this.reconcileFill(fill, signedQuantity, marks, valuation);

    const record = this.buildRecord(
      'FILL',
      cashAfter,
      valuation.equity,
      feesAfter,
      realizedAfter,
      valuation.unrealizedPnl
    );
    const fillRecord: FillRecord = {
      sessionId: this.sessionId,
      sequence: record.sequence,
      fillId: uuidv4(),
      symbol: fill.symbol,
      side: fill.side,
      quantity: fill.quantity,
      price: fill.price,
      fee: fill.fee,
      notional,
      realizedPnl: change.realizedPnl,
      strategy: fill.strategy ?? null,
      executedAt: now
    };
    await this.persistFill(previous, change.position, fillRecord, record);

    // Commit
    this.cash = cashAfter;
    this.totalFees = feesAfter;
    this.totalRealizedPnl = realizedAfter;
    this.positions = positionsAfter;
    this.lastSequence = record.sequence;

    console.log('Fill applied', {
      sessionId: this.sessionId,
      symbol: fill.symbol,
      side: fill.side,
      quantity: fill.quantity,
      price: fill.price,
      fee: fill.fee,
      realizedPnl: change.realizedPnl,
      cash: cashAfter,
      equity: valuation.equity
    });

    return {
      fill: fillRecord,
      position: change.position ? { ...change.position } : null,
      realizedPnl: change.realizedPnl,
      cash: cashAfter,
      equity: valuation.equity,
      record
    };
  }

  private validateFill(fill: Fill): void {
    const invalid: string[] = [];
    if (!fill.symbol) invalid.push('symbol');
    if (fill.side !== 'BUY' && fill.side !== 'SELL') invalid.push('side');
    if (!isFinitePositive(fill.quantity)) invalid.push('quantity');
    if (!isFinitePositive(fill.price)) invalid.push('price');
    if (!Number.isFinite(fill.fee) || fill.fee < 0) invalid.push('fee');

    if (invalid.length > 0) {
      throw new ConfigurationError(`Invalid fill: ${invalid.join(', ')}`, invalid);
    }
  }

  /**
   * Valued at the same marks, the fill must change equity by exactly
   * -fee + signedQuantity x (mark - fillPrice)
   */
  private reconcileFill(fill: Fill, signedQuantity: number, marks: MarkMap, after: Valuation): void {
    const before = this.value(this.cash, this.positions, marks);
    if (!before.allPriced || !after.allPriced) {
      return;
    }

    const expected = before.equity - fill.fee + signedQuantity * (marks[fill.symbol] - fill.price);
    const discrepancy = Math.abs(after.equity - expected);
    if (discrepancy > this.config.reconciliationTolerance) {
      throw new InvariantViolationError(
        `Equity failed to reconcile after ${fill.side} ${fill.quantity} ${fill.symbol}: discrepancy ${discrepancy}`,
        { equityBefore: before.equity, equityAfter: after.equity, expected, discrepancy }
      );
    }
  }

  private async persistFill(
    previous: Position | null,
    next: Position | null,
    fill: FillRecord,
    record: CashEquityRecord
  ): Promise<void> {
    const symbol = fill.symbol;
    try {
      if (next) {
        await this.store.putPosition(this.sessionId, next);
      } else if (previous) {
        await this.store.deletePosition(this.sessionId, symbol);
      }
    } catch (error) {
      console.error('Failed to persist position, fill not applied', {
        sessionId: this.sessionId,
        symbol,
        error: errorMessage(error)
      });
      throw new PersistenceError('applyFill', `position write for ${symbol}: ${errorMessage(error)}`, error);
    }

    try {
      await this.store.appendFill(fill);
    } catch (error) {
      console.error('Failed to append fill record, fill not applied', {
        sessionId: this.sessionId,
        symbol,
        sequence: fill.sequence,
        error: errorMessage(error)
      });
      await this.restorePosition(symbol, previous);
      throw new PersistenceError('applyFill', `fill append: ${errorMessage(error)}`, error);
    }

    try {
      await this.store.appendCashEquity(record);
    } catch (error) {
      console.error('Failed to append cash/equity record, fill not applied', {
        sessionId: this.sessionId,
        symbol,
        sequence: record.sequence,
        error: errorMessage(error)
      });
      await this.removeFill(fill);
      await this.restorePosition(symbol, previous);
      throw new PersistenceError('applyFill', `cash/equity append: ${errorMessage(error)}`, error);
    }
  }

  private async removeFill(fill: FillRecord): Promise<void> {
    try {
      await this.store.deleteFill(this.sessionId, fill.sequence);
    } catch (error) {
      console.error('Failed to remove fill record after rejected fill', {
        sessionId: this.sessionId,
        sequence: fill.sequence,
        error: errorMessage(error)
      });
    }
  }

  /**
   * Put the stored position back the way it was before a failed fill
   */
  private async restorePosition(symbol: string, previous: Position | null): Promise<void> {
    try {
      if (previous) {
        await this.store.putPosition(this.sessionId, previous);
      } else {
        await this.store.deletePosition(this.sessionId, symbol);
      }
    } catch (error) {
      console.error('Failed to restore stored position after rejected fill', {
        sessionId: this.sessionId,
        symbol,
        error: errorMessage(error)
      });
    }
  }

  /**
   * Value the ledger at the given marks (or freshly resolved ones) and append
   * a MARK_TO_MARKET record. Cash, positions and fees are untouched.
   *
   * @throws LedgerStateError when the ledger is not ACTIVE
   * @throws PersistenceError when the record cannot be appended
   */
  markToMarket(marks?: MarkMap): Promise<PortfolioSnapshot> {
    return this.queue.run(async () => {
      this.requireActive('mark to market');
      await this.ensureStarted('markToMarket');

      const effectiveMarks = marks ?? await this.resolveCurrentMarks();
      const snapshot = this.buildSnapshot(effectiveMarks);
      const record = this.buildRecord(
        'MARK_TO_MARKET',
        this.cash,
        snapshot.equity,
        this.totalFees,
        this.totalRealizedPnl,
        snapshot.unrealizedPnl
      );

      try {
        await this.store.appendCashEquity(record);
      } catch (error) {
        console.error('Failed to append mark-to-market record', {
          sessionId: this.sessionId,
          error: errorMessage(error)
        });
        throw new PersistenceError('markToMarket', errorMessage(error), error);
      }
      this.lastSequence = record.sequence;

      console.debug('Marked to market', {
        sessionId: this.sessionId,
        equity: snapshot.equity,
        unrealizedPnl: snapshot.unrealizedPnl,
        pricedPositions: snapshot.pricedPositions,
        positionCount: snapshot.positionCount
      });
      return snapshot;
    });
  }

  // ==================== Reads ====================

  /**
   * Snapshot at the given marks, or at freshly resolved marks
   */
  async getSnapshot(marks?: MarkMap): Promise<PortfolioSnapshot> {
    const state = this.getState();
    const effectiveMarks = marks ?? await this.resolver.resolveMarks(Object.keys(state.positions), this.marketData);
    return createSnapshot(state, effectiveMarks, this.clock(), this.config.negligibleQuantity);
  }

  /**
   * Deep copy of the ledger state
   */
  getState(): LedgerState {
    const positions: Record<string, Position> = {};
    for (const [symbol, position] of this.positions) {
      positions[symbol] = { ...position };
    }
    return {
      sessionId: this.sessionId,
      phase: this.ledgerPhase,
      cash: this.cash,
      totalFees: this.totalFees,
      totalRealizedPnl: this.totalRealizedPnl,
      positions
    };
  }

  getPosition(symbol: string): Position | null {
    const position = this.positions.get(symbol);
    return position ? { ...position } : null;
  }

  /**
   * Cash plus the mark-valued positions; unpriced positions count as zero
   */
  getEquity(marks: MarkMap): number {
    return this.value(this.cash, this.positions, marks).equity;
  }

  /**
   * Gross notional currently deployed, at marks where available and at
   * average cost otherwise. Feeds the session cap in position sizing.
   */
  getDeployedNotional(marks: MarkMap = {}): number {
    let deployed = 0;
    for (const position of this.positions.values()) {
      const mark = marks[position.symbol];
      const price = mark !== undefined && isFinitePositive(mark) ? mark : position.averageCost;
      deployed += Math.abs(position.quantity) * price;
    }
    return deployed;
  }

  /**
   * The session's persisted fill log in sequence order, optionally limited to
   * one UTC date (YYYY-MM-DD)
   *
   * @throws PersistenceError when the log cannot be read
   */
  async getSessionFills(date?: string): Promise<FillRecord[]> {
    let fills: FillRecord[];
    try {
      fills = await this.store.getFills(this.sessionId);
    } catch (error) {
      throw new PersistenceError('getSessionFills', errorMessage(error), error);
    }
    const ordered = [...fills].sort((a, b) => a.sequence - b.sequence);
    return date ? SessionMetricsService.filterByDate(ordered, date) : ordered;
  }

  async getSessionMetrics(date?: string): Promise<SessionMetrics> {
    return SessionMetricsService.calculate(await this.getSessionFills(date));
  }

  // ==================== Internals ====================

  private requireActive(operation: string): void {
    if (this.ledgerPhase !== 'ACTIVE') {
      throw new LedgerStateError(operation, this.ledgerPhase);
    }
  }

  private resolveCurrentMarks(): Promise<MarkMap> {
    return this.resolver.resolveMarks(this.positions.keys(), this.marketData);
  }

  private buildSnapshot(marks: MarkMap): PortfolioSnapshot {
    return createSnapshot(this.getState(), marks, this.clock(), this.config.negligibleQuantity);
  }

  private value(cash: number, positions: Map<string, Position>, marks: MarkMap): Valuation {
    let equity = cash;
    let unrealizedPnl = 0;
    let allPriced = true;

    for (const position of positions.values()) {
      if (isNegligible(position.quantity, this.config.negligibleQuantity)) {
        continue;
      }
      const mark = marks[position.symbol];
      if (mark === undefined || !isFinitePositive(mark)) {
        allPriced = false;
        continue;
      }
      equity += position.quantity * mark;
      unrealizedPnl += (mark - position.averageCost) * position.quantity;
    }

    return { equity, unrealizedPnl, allPriced };
  }

  private buildRecord(
    reason: CashEquityReason,
    cashBalance: number,
    totalEquity: number,
    totalFees: number,
    totalRealizedPnl: number,
    totalUnrealizedPnl: number
  ): CashEquityRecord {
    const recordedAt = this.clock();
    return {
      sessionId: this.sessionId,
      sequence: Math.max(this.lastSequence + 1, recordedAt.getTime()),
      recordId: uuidv4(),
      recordedAt: recordedAt.toISOString(),
      reason,
      cashBalance,
      totalEquity,
      totalFees,
      totalRealizedPnl,
      totalUnrealizedPnl
    };
  }
}
