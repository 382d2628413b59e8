/**
 * Risk Engine Types
 */

/**
 * Direction chosen once from the composite score and threaded through every
 * downstream calculation.
 */
export type TradeSide = 'LONG' | 'SHORT';

export type StopTakeSource = 'strategy' | 'atr' | 'percent_fallback';

export type SizeLimit = 'risk' | 'caps';

export interface RiskParameters {
  stopAtrMultiplier: number;
  takeAtrMultiplier: number;
  percentFallbackEnabled: boolean;
  stopFallbackPercent: number;
  takeFallbackPercent: number;
  minStopDistance: number;
  minTakeDistance: number;
  riskPerTrade: number;          // fraction of equity risked per trade
  perSymbolCap: number;          // absolute notional cap
  maxPositionValuePct: number;   // fraction of equity
  sessionCapPct: number;         // fraction of equity deployable per session
  minRewardRisk: number;
}

export interface StopTakeInput {
  entryPrice: number;
  side: TradeSide;
  volatility?: number | null;
  strategyStop?: number | null;
  strategyTake?: number | null;
}

export interface StopTakeLevels {
  stopPrice: number;
  takePrice: number;
  source: StopTakeSource;
  stopDistance: number;
  takeDistance: number;
}

export interface SizingInput {
  equity: number;
  entryPrice: number;
  stopDistance: number;
  alreadyDeployed: number;
}

export interface PositionSize {
  notional: number;
  quantity: number;
  sizeFromRisk: number;
  sizeFromCaps: number;
  limitedBy: SizeLimit;
}

export interface TradePlanInput {
  symbol: string;
  compositeScore: number;
  entryPrice: number;
  equity: number;
  alreadyDeployed: number;
  volatility?: number | null;
  strategyStop?: number | null;
  strategyTake?: number | null;
}

export type TradePlan =
  | {
      status: 'accepted';
      symbol: string;
      side: TradeSide;
      entryPrice: number;
      levels: StopTakeLevels;
      size: PositionSize;
      rewardRisk: number;
    }
  | {
      status: 'rejected';
      symbol: string;
      side: TradeSide;
      reason: string;
    };
