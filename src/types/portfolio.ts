/**
 * Portfolio Ledger Types
 */

export type FillSide = 'BUY' | 'SELL';

export type LedgerPhase = 'UNINITIALIZED' | 'BOOTSTRAPPED' | 'ACTIVE';

export type CashEquityReason = 'BOOTSTRAP' | 'CAPITAL_RESET' | 'FILL' | 'MARK_TO_MARKET';

export type LoadOutcome = 'bootstrapped' | 'reset' | 'resumed' | 'degraded';

export interface Position {
  symbol: string;
  quantity: number;       // positive = long, negative = short
  averageCost: number;
  openedAt: string;
  updatedAt: string;
}

export interface CashEquityRecord {
  sessionId: string;
  sequence: number;       // monotonic per session, newest wins
  recordId: string;
  recordedAt: string;
  reason: CashEquityReason;
  cashBalance: number;
  totalEquity: number;
  totalFees: number;
  totalRealizedPnl: number;
  totalUnrealizedPnl: number;
}

/**
 * Copy of the ledger's state handed to readers
 */
export interface LedgerState {
  sessionId: string;
  phase: LedgerPhase;
  cash: number;
  totalFees: number;
  totalRealizedPnl: number;
  positions: Record<string, Position>;
}

export interface Fill {
  symbol: string;
  side: FillSide;
  quantity: number;
  price: number;
  fee: number;
  strategy?: string;
}

/**
 * Entry in a session's append-only fill log
 */
export interface FillRecord {
  sessionId: string;
  sequence: number;       // same sequence as the FILL cash/equity record
  fillId: string;
  symbol: string;
  side: FillSide;
  quantity: number;
  price: number;
  fee: number;
  notional: number;
  realizedPnl: number;
  strategy: string | null;
  executedAt: string;
}

export interface SessionMetrics {
  totalTrades: number;
  totalVolume: number;
  totalFees: number;
  totalNotional: number;
  totalRealizedPnl: number;
  buyTrades: number;
  sellTrades: number;
  symbolsTraded: string[];
  strategiesUsed: string[];
}

export interface FillResult {
  fill: FillRecord;
  position: Position | null;
  realizedPnl: number;
  cash: number;
  equity: number;
  record: CashEquityRecord;
}

export interface LoadResult {
  outcome: LoadOutcome;
  cash: number;
  equity: number;
  positions: Position[];
}

export interface LedgerConfig {
  capitalChangeThreshold: number;
  negligibleQuantity: number;
  reconciliationTolerance: number;
  allowNegativeCash: boolean;
}

/**
 * Persistent store collaborator, scoped by session
 */
export interface PortfolioStore {
  getLatestCashEquity(sessionId: string): Promise<CashEquityRecord | null>;
  getPositions(sessionId: string): Promise<Position[]>;
  appendCashEquity(record: CashEquityRecord): Promise<void>;
  clearAllPositions(sessionId: string): Promise<void>;
  putPosition(sessionId: string, position: Position): Promise<void>;
  deletePosition(sessionId: string, symbol: string): Promise<void>;
  getFills(sessionId: string): Promise<FillRecord[]>;
  appendFill(record: FillRecord): Promise<void>;
  deleteFill(sessionId: string, sequence: number): Promise<void>;
}
