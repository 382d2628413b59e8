/**
 * Risk Engine
 *
 * Derives stop-loss / take-profit levels and bounded position sizes. The side
 * is decided once by StopTakeRules.determineSide and passed explicitly to every other call.
 */

import {
  PositionSize,
  RiskParameters,
  SizingInput,
  StopTakeInput,
  StopTakeLevels,
  StopTakeSource,
  TradePlan,
  TradePlanInput,
  TradeSide
} from '../types/risk';
import { ConfigurationError, StopTakeOrderingError } from '../types/errors';
import { resolveRiskParameters } from '../config';

function isPositive(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Stop/take rules - side selection, level ordering and reward:risk
 */
export const StopTakeRules = {
  /**
   * Map a composite score to a side: strictly positive is LONG, everything
   * else (zero, negative, NaN) is SHORT
   */
  determineSide(compositeScore: number): TradeSide {
    return compositeScore > 0 ? 'LONG' : 'SHORT';
  },

  /**
   * Check stop/take ordering for a side: LONG needs stop < entry < take,
   * SHORT needs take < entry < stop
   */
  isOrderedForSide(side: TradeSide, entryPrice: number, stopPrice: number, takePrice: number): boolean {
    if (side === 'LONG') {
      return stopPrice < entryPrice && entryPrice < takePrice;
    }
    return takePrice < entryPrice && entryPrice < stopPrice;
  },

  /**
   * @throws StopTakeOrderingError if the levels are on the wrong side of entry
   */
  assertStopTakeOrdering(side: TradeSide, entryPrice: number, stopPrice: number, takePrice: number): void {
    if (!StopTakeRules.isOrderedForSide(side, entryPrice, stopPrice, takePrice)) {
      throw new StopTakeOrderingError(side, entryPrice, stopPrice, takePrice);
    }
  },

  /**
   * Reward per unit divided by risk per unit; 0 when the risk is not positive
   */
  riskRewardRatio(entryPrice: number, stopPrice: number, takePrice: number, side: TradeSide): number {
    const risk = side === 'LONG' ? entryPrice - stopPrice : stopPrice - entryPrice;
    const reward = side === 'LONG' ? takePrice - entryPrice : entryPrice - takePrice;
    return risk > 0 ? reward / risk : 0;
  }
};

export class RiskEngine {
  readonly params: RiskParameters;

  /**
   * @throws ConfigurationError when the merged parameters fail validation
   */
  constructor(params: Partial<RiskParameters> = {}) {
    this.params = resolveRiskParameters(params);
  }

  /**
   * Derive stop-loss and take-profit prices for an entry
   *
   * Source precedence: explicit strategy levels (both required), then ATR
   * distances, then percentage distances when the fallback is enabled.
   * Computed distances are floored at the configured minimums.
   *
   * @throws ConfigurationError when the entry is invalid or no source applies
   * @throws StopTakeOrderingError when the levels contradict the side
   */
  deriveStopTake(input: StopTakeInput): StopTakeLevels {
    const { entryPrice, side } = input;
    if (!isPositive(entryPrice)) {
      throw new ConfigurationError(`Invalid entry price: ${entryPrice}`, ['entryPrice']);
    }

    let levels: StopTakeLevels;
    if (isPositive(input.strategyStop) && isPositive(input.strategyTake)) {
      levels = {
        stopPrice: input.strategyStop,
        takePrice: input.strategyTake,
        source: 'strategy',
        stopDistance: Math.abs(entryPrice - input.strategyStop),
        takeDistance: Math.abs(input.strategyTake - entryPrice)
      };
    } else {
      const computed = this.computeDistances(entryPrice, input.volatility);
      const stopDistance = Math.max(computed.stopDistance, this.params.minStopDistance);
      const takeDistance = Math.max(computed.takeDistance, this.params.minTakeDistance);

      levels = {
        stopPrice: side === 'LONG' ? entryPrice - stopDistance : entryPrice + stopDistance,
        takePrice: side === 'LONG' ? entryPrice + takeDistance : entryPrice - takeDistance,
        source: computed.source,
        stopDistance,
        takeDistance
      };
    }

    StopTakeRules.assertStopTakeOrdering(side, entryPrice, levels.stopPrice, levels.takePrice);

    if (levels.stopPrice <= 0 || levels.takePrice <= 0) {
      throw new ConfigurationError(
        `Distances exceed entry price ${entryPrice}: stop=${levels.stopPrice}, take=${levels.takePrice}`,
        side === 'LONG' ? ['stopDistance'] : ['takeDistance']
      );
    }

    console.debug('Stop/take derived', { side, entryPrice, ...levels });
    return levels;
  }

  private computeDistances(
    entryPrice: number,
    volatility: number | null | undefined
  ): { stopDistance: number; takeDistance: number; source: StopTakeSource } {
    if (isPositive(volatility)) {
      return {
        stopDistance: volatility * this.params.stopAtrMultiplier,
        takeDistance: volatility * this.params.takeAtrMultiplier,
        source: 'atr'
      };
    }

    if (this.params.percentFallbackEnabled) {
      return {
        stopDistance: entryPrice * this.params.stopFallbackPercent,
        takeDistance: entryPrice * this.params.takeFallbackPercent,
        source: 'percent_fallback'
      };
    }

    throw new ConfigurationError(
      'No stop/take derivable: no strategy levels, no volatility estimate and percent fallback disabled',
      ['volatility', 'percentFallbackEnabled']
    );
  }

  /**
   * True when the levels are ordered for the side, positive, and meet the
   * minimum reward:risk ratio
   */
  validateStopTake(entryPrice: number, stopPrice: number, takePrice: number, side: TradeSide): boolean {
    if (!isPositive(entryPrice) || !isPositive(stopPrice) || !isPositive(takePrice)) {
      return false;
    }
    if (!StopTakeRules.isOrderedForSide(side, entryPrice, stopPrice, takePrice)) {
      return false;
    }
    return StopTakeRules.riskRewardRatio(entryPrice, stopPrice, takePrice, side) >= this.params.minRewardRisk;
  }

  /**
   * Size a position in notional terms
   *
   * The risk budget (equity x riskPerTrade) divided by the stop distance as a
   * fraction of entry gives the notional that loses exactly the budget at the
   * stop. That is capped by the per-symbol cap, the max position value and the
   * session headroom left after what is already deployed.
   *
   * @throws ConfigurationError when the stop distance or entry price is not positive
   */
  sizePosition(input: SizingInput): PositionSize {
    const { equity, entryPrice, stopDistance, alreadyDeployed } = input;
    if (!isPositive(entryPrice)) {
      throw new ConfigurationError(`Invalid entry price: ${entryPrice}`, ['entryPrice']);
    }
    if (!isPositive(stopDistance)) {
      throw new ConfigurationError(`Invalid stop distance: ${stopDistance}`, ['stopDistance']);
    }

    const riskAmount = equity * this.params.riskPerTrade;
    const sizeFromRisk = riskAmount / (stopDistance / entryPrice);
    const sizeFromCaps = Math.min(
      this.params.perSymbolCap,
      equity * this.params.maxPositionValuePct,
      Math.max(0, equity * this.params.sessionCapPct - alreadyDeployed)
    );

    const notional = Math.max(0, Math.min(sizeFromRisk, sizeFromCaps));

    return {
      notional,
      quantity: notional / entryPrice,
      sizeFromRisk,
      sizeFromCaps,
      limitedBy: sizeFromRisk <= sizeFromCaps ? 'risk' : 'caps'
    };
  }

  /**
   * Compose side, levels and size into a trade plan. The plan is rejected
   * when reward:risk falls below the minimum or the size comes out at zero.
   */
  planTrade(input: TradePlanInput): TradePlan {
    const side = StopTakeRules.determineSide(input.compositeScore);
    const levels = this.deriveStopTake({
      entryPrice: input.entryPrice,
      side,
      volatility: input.volatility,
      strategyStop: input.strategyStop,
      strategyTake: input.strategyTake
    });

    const rewardRisk = StopTakeRules.riskRewardRatio(input.entryPrice, levels.stopPrice, levels.takePrice, side);
    if (rewardRisk < this.params.minRewardRisk) {
      const reason = `reward:risk ${rewardRisk.toFixed(2)} below minimum ${this.params.minRewardRisk}`;
      console.log('Trade plan rejected', { symbol: input.symbol, side, reason });
      return { status: 'rejected', symbol: input.symbol, side, reason };
    }

    const size = this.sizePosition({
      equity: input.equity,
      entryPrice: input.entryPrice,
      stopDistance: levels.stopDistance,
      alreadyDeployed: input.alreadyDeployed
    });
    if (size.quantity <= 0) {
      const reason = 'position size is zero';
      console.log('Trade plan rejected', { symbol: input.symbol, side, reason });
      return { status: 'rejected', symbol: input.symbol, side, reason };
    }

    console.log('Trade plan accepted', {
      symbol: input.symbol,
      side,
      compositeScore: input.compositeScore,
      source: levels.source,
      notional: size.notional,
      rewardRisk
    });

    return {
      status: 'accepted',
      symbol: input.symbol,
      side,
      entryPrice: input.entryPrice,
      levels,
      size,
      rewardRisk
    };
  }
}
