import type { TradeRecord, BacktestReport, EquityPoint } from '../types/index.js';

/**
 * 거래 목록 + 자본 곡선 → 백테스트 지표
 * 손익 0 거래는 손실로 집계 (일일 집계와 동일)
 */
export function buildReport(
  trades: TradeRecord[],
  equityCurve: EquityPoint[],
  startEquity: number,
  endEquity: number,
): BacktestReport {
  const wins = trades.filter((t) => t.pnl > 0);
  const losses = trades.filter((t) => t.pnl <= 0);

  const totalPnl = trades.reduce((s, t) => s + t.pnl, 0);
  const totalReturn = startEquity > 0 ? ((endEquity - startEquity) / startEquity) * 100 : 0;

  const grossProfit = wins.reduce((s, t) => s + t.pnl, 0);
  const grossLoss = Math.abs(losses.reduce((s, t) => s + t.pnl, 0));

  return {
    totalTrades: trades.length,
    winCount: wins.length,
    lossCount: losses.length,
    winRate: trades.length > 0 ? wins.length / trades.length : 0,
    totalPnl,
    totalReturn,
    maxDrawdown: calcMaxDrawdown(equityCurve),
    profitFactor: grossLoss > 0 ? grossProfit / grossLoss : grossProfit > 0 ? Infinity : 0,
    expectancy: trades.length > 0 ? totalPnl / trades.length : 0,
    avgWin: wins.length > 0 ? grossProfit / wins.length : 0,
    avgLoss: losses.length > 0 ? grossLoss / losses.length : 0,
    maxConsecutiveLosses: calcMaxConsecutiveLosses(trades),
    startEquity,
    endEquity,
    trades,
    equityCurve,
  };
}

export function calcMaxDrawdown(curve: readonly EquityPoint[]): number {
  const first = curve[0];
  if (!first) return 0;
  let peak = first.equity;
  let maxDd = 0;

  for (const point of curve) {
    if (point.equity > peak) peak = point.equity;
    const dd = peak > 0 ? (peak - point.equity) / peak : 0;
    if (dd > maxDd) maxDd = dd;
  }

  return maxDd * 100;
}

export function calcMaxConsecutiveLosses(trades: readonly TradeRecord[]): number {
  let max = 0;
  let current = 0;
  for (const t of trades) {
    if (t.pnl <= 0) {
      current++;
      if (current > max) max = current;
    } else {
      current = 0;
    }
  }
  return max;
}
