export * from './types/market-data';
export * from './types/portfolio';
export * from './types/risk';
export * from './types/snapshot';
export * from './types/errors';

export {
  DEFAULT_LEDGER_CONFIG,
  DEFAULT_RISK_PARAMETERS,
  Environment,
  loadLedgerConfig,
  loadRiskParameters,
  resolveLedgerConfig,
  resolveRiskParameters
} from './config';

export { DEFAULT_PRICE_BAND, MarkPriceResolver, MarkPriceResolverOptions, selectCandidate } from './services/mark-price';
export {
  DEFAULT_ATR_PERIOD,
  PriceBar,
  VolatilityCache,
  VolatilityService,
  calculateTrueRanges,
  estimateAtr,
  estimateAtrFromBars,
  toPriceBars
} from './services/volatility';
export { RiskEngine, StopTakeRules } from './services/risk-engine';
export {
  PortfolioLedger,
  PortfolioLedgerOptions,
  PositionChange,
  applyToPosition,
  replayFills
} from './services/portfolio-ledger';
export { SessionMetricsService } from './services/session-metrics';
export {
  DEFAULT_NEGLIGIBLE_QUANTITY,
  createEmptySnapshot,
  createSnapshot,
  formatEquitySummary,
  formatPositionSummary,
  isNegligible
} from './services/portfolio-snapshot';
export { PortfolioRepository } from './repositories/portfolio';
export { SerialQueue } from './utils/serial-queue';
