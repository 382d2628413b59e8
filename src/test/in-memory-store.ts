import { CashEquityRecord, FillRecord, PortfolioStore, Position } from '../types/portfolio';

type StoreOperation = keyof PortfolioStore;

/**
 * In-process PortfolioStore for tests. Any operation can be made to fail,
 * either on every call or on the next call only.
 */
export class InMemoryPortfolioStore implements PortfolioStore {
  readonly records: CashEquityRecord[] = [];
  readonly positions = new Map<string, Map<string, Position>>();
  readonly fills: FillRecord[] = [];

  private readonly failing = new Map<StoreOperation, { error: Error; once: boolean }>();

  failOn(operation: StoreOperation, error: Error = new Error(`${operation} unavailable`), once = false): void {
    this.failing.set(operation, { error, once });
  }

  failOnceOn(operation: StoreOperation, error?: Error): void {
    this.failOn(operation, error, true);
  }

  heal(): void {
    this.failing.clear();
  }

  seedRecord(record: CashEquityRecord): void {
    this.records.push({ ...record });
  }

  seedPosition(sessionId: string, position: Position): void {
    this.sessionPositions(sessionId).set(position.symbol, { ...position });
  }

  recordsFor(sessionId: string): CashEquityRecord[] {
    return this.records
      .filter(record => record.sessionId === sessionId)
      .sort((a, b) => a.sequence - b.sequence);
  }

  async getLatestCashEquity(sessionId: string): Promise<CashEquityRecord | null> {
    this.check('getLatestCashEquity');
    const records = this.recordsFor(sessionId);
    return records.length > 0 ? { ...records[records.length - 1] } : null;
  }

  async getPositions(sessionId: string): Promise<Position[]> {
    this.check('getPositions');
    return Array.from(this.sessionPositions(sessionId).values(), position => ({ ...position }));
  }

  async appendCashEquity(record: CashEquityRecord): Promise<void> {
    this.check('appendCashEquity');
    const duplicate = this.records.some(
      existing => existing.sessionId === record.sessionId && existing.sequence === record.sequence
    );
    if (duplicate) {
      throw new Error(`Record ${record.sessionId}/${record.sequence} already exists`);
    }
    this.records.push({ ...record });
  }

  async clearAllPositions(sessionId: string): Promise<void> {
    this.check('clearAllPositions');
    this.positions.delete(sessionId);
  }

  async putPosition(sessionId: string, position: Position): Promise<void> {
    this.check('putPosition');
    this.sessionPositions(sessionId).set(position.symbol, { ...position });
  }

  async deletePosition(sessionId: string, symbol: string): Promise<void> {
    this.check('deletePosition');
    this.sessionPositions(sessionId).delete(symbol);
  }

  async getFills(sessionId: string): Promise<FillRecord[]> {
    this.check('getFills');
    return this.fills
      .filter(fill => fill.sessionId === sessionId)
      .sort((a, b) => a.sequence - b.sequence)
      .map(fill => ({ ...fill }));
  }

  async appendFill(record: FillRecord): Promise<void> {
    this.check('appendFill');
    const duplicate = this.fills.some(
      existing => existing.sessionId === record.sessionId && existing.sequence === record.sequence
    );
    if (duplicate) {
      throw new Error(`Fill ${record.sessionId}/${record.sequence} already exists`);
    }
    this.fills.push({ ...record });
  }

  async deleteFill(sessionId: string, sequence: number): Promise<void> {
    this.check('deleteFill');
    const index = this.fills.findIndex(fill => fill.sessionId === sessionId && fill.sequence === sequence);
    if (index >= 0) {
      this.fills.splice(index, 1);
    }
  }

  private sessionPositions(sessionId: string): Map<string, Position> {
    let positions = this.positions.get(sessionId);
    if (!positions) {
      positions = new Map();
      this.positions.set(sessionId, positions);
    }
    return positions;
  }

  private check(operation: StoreOperation): void {
    const failure = this.failing.get(operation);
    if (!failure) {
      return;
    }
    if (failure.once) {
      this.failing.delete(operation);
    }
    throw failure.error;
  }
}
