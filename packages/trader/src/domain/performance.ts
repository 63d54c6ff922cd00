import type { PerformanceSummary, Trade } from "../types/ledger.js";

export function summarize(trades: readonly Trade[]): PerformanceSummary {
  if (trades.length === 0) {
    return {
      tradeCount: 0,
      winCount: 0,
      lossCount: 0,
      winRate: 0,
      totalPnl: 0,
      averagePnl: null,
      bestPnl: null,
      worstPnl: null,
    };
  }

  let winCount = 0;
  let totalPnl = 0;
  let bestPnl = -Infinity;
  let worstPnl = Infinity;
  for (const t of trades) {
    if (t.pnl > 0) winCount++;
    totalPnl += t.pnl;
    bestPnl = Math.max(bestPnl, t.pnl);
    worstPnl = Math.min(worstPnl, t.pnl);
  }

  return {
    tradeCount: trades.length,
    winCount,
    // breakeven trades count as neither
    lossCount: trades.filter((t) => t.pnl < 0).length,
    winRate: winCount / trades.length,
    totalPnl,
    averagePnl: totalPnl / trades.length,
    bestPnl,
    worstPnl,
  };
}
