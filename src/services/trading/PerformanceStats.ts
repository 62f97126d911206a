import Decimal from 'decimal.js';
import { Trade } from '../../types/trading';
import { DecimalInput, ZERO, dec, sum } from '../../utils/money';

export interface PerformanceStats {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
  /** Gross profit over gross loss; null when there are winners but no losses. */
  profitFactor: number | null;
  totalNetPnl: number;
  totalFees: number;
  grossProfit: number;
  grossLoss: number;
  avgWin: number;
  avgLoss: number;
  largestWin: number;
  largestLoss: number;
  maxDrawdown: number;
  maxDrawdownPct: number;
  avgHoldingMs: number;
  maxConsecutiveWins: number;
  maxConsecutiveLosses: number;
  finalEquity: number;
  returnPct: number;
}

export interface EquityPoint {
  timestamp: Date;
  equity: number;
}

function mean(values: Decimal[]): Decimal {
  return values.length === 0 ? ZERO : sum(values).dividedBy(values.length);
}

/**
 * Aggregates closed trades in close order. A trade with net PnL above zero is
 * a win; everything else counts as a loss.
 */
export function calculatePerformanceStats(trades: readonly Trade[], startingEquity: DecimalInput): PerformanceStats {
  const start = dec(startingEquity);
  const ordered = [...trades].sort((a, b) => a.closedAt.getTime() - b.closedAt.getTime());

  const wins = ordered.filter((t) => t.netPnl.greaterThan(0)).map((t) => t.netPnl);
  const losses = ordered.filter((t) => !t.netPnl.greaterThan(0)).map((t) => t.netPnl);

  const grossProfit = sum(wins);
  const grossLoss = sum(losses).abs();
  const totalNet = sum(ordered.map((t) => t.netPnl));

  let profitFactor: number | null;
  if (ordered.length === 0 || grossProfit.isZero()) {
    profitFactor = 0;
  } else if (grossLoss.isZero()) {
    profitFactor = null;
  } else {
    profitFactor = grossProfit.dividedBy(grossLoss).toNumber();
  }

  // Streaks
  let maxWins = 0;
  let maxLosses = 0;
  let currentWins = 0;
  let currentLosses = 0;
  for (const trade of ordered) {
    if (trade.netPnl.greaterThan(0)) {
      currentWins++;
      currentLosses = 0;
    } else {
      currentLosses++;
      currentWins = 0;
    }
    maxWins = Math.max(maxWins, currentWins);
    maxLosses = Math.max(maxLosses, currentLosses);
  }

  // Drawdown on the closed-trade equity path
  let equity = start;
  let peak = start;
  let maxDrawdown = ZERO;
  let maxDrawdownPct = ZERO;
  for (const trade of ordered) {
    equity = equity.plus(trade.netPnl);
    if (equity.greaterThan(peak)) peak = equity;
    const drawdown = peak.minus(equity);
    if (drawdown.greaterThan(maxDrawdown)) maxDrawdown = drawdown;
    const drawdownPct = peak.isZero() ? ZERO : drawdown.dividedBy(peak).times(100);
    if (drawdownPct.greaterThan(maxDrawdownPct)) maxDrawdownPct = drawdownPct;
  }

  const largestWin = wins.reduce((best, v) => (v.greaterThan(best) ? v : best), ZERO);
  const largestLoss = losses.reduce((worst, v) => (v.lessThan(worst) ? v : worst), ZERO);
  const holding = ordered.reduce((acc, t) => acc + t.holdingMs, 0);

  return {
    totalTrades: ordered.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    winRate: ordered.length === 0 ? 0 : (wins.length / ordered.length) * 100,
    profitFactor,
    totalNetPnl: totalNet.toNumber(),
    totalFees: sum(ordered.map((t) => t.fees)).toNumber(),
    grossProfit: grossProfit.toNumber(),
    grossLoss: grossLoss.toNumber(),
    avgWin: mean(wins).toNumber(),
    avgLoss: mean(losses).toNumber(),
    largestWin: largestWin.toNumber(),
    largestLoss: largestLoss.toNumber(),
    maxDrawdown: maxDrawdown.toNumber(),
    maxDrawdownPct: maxDrawdownPct.toNumber(),
    avgHoldingMs: ordered.length === 0 ? 0 : holding / ordered.length,
    maxConsecutiveWins: maxWins,
    maxConsecutiveLosses: maxLosses,
    finalEquity: start.plus(totalNet).toNumber(),
    returnPct: start.isZero() ? 0 : totalNet.dividedBy(start).times(100).toNumber(),
  };
}
