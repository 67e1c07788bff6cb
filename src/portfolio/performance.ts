import Decimal from 'decimal.js';

import type { ClosedPosition, PortfolioSnapshot } from '../domain/models.js';
import { percentOf, roundTo, sumMoney } from '../domain/money.js';

export type TradeHighlight = {
  positionId: string;
  ticker: string;
  realizedReturnPct: number;
  realizedReturnAbsolute: number;
};

export type PerformanceMetrics = {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRatePct: number;
  averageWinPct: number;
  averageLossPct: number;
  profitFactor: number | null;
  averageRMultiple: number;
  averageDaysHeld: number;
  totalRealizedPnL: number;
  totalRealizedPct: number;
  bestTrade: TradeHighlight | null;
  worstTrade: TradeHighlight | null;
  maxDrawdownPct: number;
};

function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }

  return sumMoney(values) / values.length;
}

function highlight(position: ClosedPosition): TradeHighlight {
  return {
    positionId: position.id,
    ticker: position.ticker,
    realizedReturnPct: position.realizedReturnPct,
    realizedReturnAbsolute: position.realizedReturnAbsolute
  };
}

/**
 * Peak-to-trough decline of `totalEquity` across the series, in percent. The
 * peak starts at the starting capital, matching the running figure each
 * snapshot records.
 */
export function maxDrawdownFromSnapshots(snapshots: PortfolioSnapshot[], startingCapital: number): number {
  let peak = startingCapital;
  let worst = 0;

  for (const snapshot of snapshots) {
    peak = Math.max(peak, snapshot.totalEquity);
    const drawdown = percentOf(new Decimal(peak).minus(snapshot.totalEquity).toNumber(), peak);
    worst = Math.max(worst, drawdown);
  }

  return worst;
}

/**
 * Trade statistics over closed positions. A trade with zero realized P&L
 * counts toward the total but is neither a win nor a loss.
 */
export function computePerformance(
  closed: ClosedPosition[],
  snapshots: PortfolioSnapshot[],
  startingCapital: number
): PerformanceMetrics {
  const wins = closed.filter((position) => position.realizedReturnAbsolute > 0);
  const losses = closed.filter((position) => position.realizedReturnAbsolute < 0);

  const grossProfit = sumMoney(wins.map((position) => position.realizedReturnAbsolute));
  const grossLoss = Math.abs(sumMoney(losses.map((position) => position.realizedReturnAbsolute)));
  const totalRealizedPnL = sumMoney(closed.map((position) => position.realizedReturnAbsolute));

  let best: ClosedPosition | null = null;
  let worst: ClosedPosition | null = null;
  for (const position of closed) {
    if (!best || position.realizedReturnPct > best.realizedReturnPct) best = position;
    if (!worst || position.realizedReturnPct < worst.realizedReturnPct) worst = position;
  }

  return {
    totalTrades: closed.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    winRatePct: roundTo(percentOf(wins.length, closed.length), 2),
    averageWinPct: roundTo(mean(wins.map((position) => position.realizedReturnPct)), 2),
    averageLossPct: roundTo(mean(losses.map((position) => position.realizedReturnPct)), 2),
    profitFactor: losses.length === 0 ? null : roundTo(grossProfit / grossLoss, 2),
    averageRMultiple: roundTo(mean(closed.map((position) => position.rMultiple)), 2),
    averageDaysHeld: roundTo(mean(closed.map((position) => position.daysHeld)), 2),
    totalRealizedPnL: roundTo(totalRealizedPnL, 2),
    totalRealizedPct: roundTo(percentOf(totalRealizedPnL, startingCapital), 2),
    bestTrade: best ? highlight(best) : null,
    worstTrade: worst ? highlight(worst) : null,
    maxDrawdownPct: roundTo(maxDrawdownFromSnapshots(snapshots, startingCapital), 2)
  };
}
