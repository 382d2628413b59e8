import { FillRecord, SessionMetrics } from '../types/portfolio';

/**
 * Session Metrics Service - trade statistics over a session's fill log
 */
export const SessionMetricsService = {
  /**
   * Keep the fills executed on a UTC calendar date (YYYY-MM-DD)
   */
  filterByDate(fills: readonly FillRecord[], date: string): FillRecord[] {
    return fills.filter(fill => fill.executedAt.slice(0, 10) === date);
  },

  calculate(fills: readonly FillRecord[]): SessionMetrics {
    const symbols = new Set<string>();
    const strategies = new Set<string>();
    let totalVolume = 0;
    let totalFees = 0;
    let totalNotional = 0;
    let totalRealizedPnl = 0;
    let buyTrades = 0;

    for (const fill of fills) {
      totalVolume += Math.abs(fill.quantity);
      totalFees += fill.fee;
      totalNotional += fill.notional;
      totalRealizedPnl += fill.realizedPnl;
      if (fill.side === 'BUY') {
        buyTrades++;
      }
      symbols.add(fill.symbol);
      if (fill.strategy) {
        strategies.add(fill.strategy);
      }
    }

    return {
      totalTrades: fills.length,
      totalVolume,
      totalFees,
      totalNotional,
      totalRealizedPnl,
      buyTrades,
      sellTrades: fills.length - buyTrades,
      symbolsTraded: Array.from(symbols).sort(),
      strategiesUsed: Array.from(strategies).sort()
    };
  }
};
