import type { BacktestReport } from '../types/index.js';

/**
 * 콘솔 테이블 출력
 */
export function formatReport(report: BacktestReport): string {
  const lines: string[] = [];

  lines.push('');
  lines.push('═══════════════════════════════════════════');
  lines.push('          BACKTEST REPORT');
  lines.push('═══════════════════════════════════════════');
  lines.push('');

  lines.push(formatSection('Performance', [
    ['Total Return', `${report.totalReturn.toFixed(2)}%`],
    ['Max Drawdown', `${report.maxDrawdown.toFixed(2)}%`],
    ['Profit Factor', report.profitFactor === Infinity ? 'INF' : report.profitFactor.toFixed(2)],
  ]));

  lines.push(formatSection('Trades', [
    ['Total Trades', String(report.totalTrades)],
    ['Win Rate', `${(report.winRate * 100).toFixed(1)}%`],
    ['Wins / Losses', `${report.winCount} / ${report.lossCount}`],
    ['Avg Win', formatQuote(report.avgWin)],
    ['Avg Loss', formatQuote(-report.avgLoss)],
    ['Expectancy', formatQuote(report.expectancy)],
    ['Max Consec. Losses', String(report.maxConsecutiveLosses)],
  ]));

  lines.push(formatSection('Capital', [
    ['Start Equity', formatQuote(report.startEquity)],
    ['End Equity', formatQuote(report.endEquity)],
    ['Total PnL', formatQuote(report.totalPnl)],
  ]));

  return lines.join('\n');
}

function formatSection(title: string, rows: [string, string][]): string {
  const lines: string[] = [];
  lines.push(`── ${title} ${'─'.repeat(38 - title.length)}`);
  for (const [key, value] of rows) {
    lines.push(`  ${key.padEnd(22)} ${value}`);
  }
  lines.push('');
  return lines.join('\n');
}

export function formatQuote(value: number): string {
  const sign = value < 0 ? '-' : '';
  return `${sign}${Math.abs(value).toFixed(2)} USDT`;
}

/**
 * 트레이드 목록 출력
 */
export function formatTrades(report: BacktestReport): string {
  if (report.trades.length === 0) return 'No trades.';

  const lines: string[] = [];
  lines.push('  #   Side  Entry Date        Exit Date         Entry Price  Exit Price   PnL          Reason');
  lines.push('  ─── ───── ───────────────── ───────────────── ──────────── ──────────── ──────────── ──────────────');

  report.trades.forEach((t, i) => {
    const num = String(i + 1).padStart(3);
    const side = t.side.padEnd(5);
    const ep = t.entryPrice.toFixed(1).padStart(12);
    const xp = t.exitPrice.toFixed(1).padStart(12);
    const pnl = `${t.pnl >= 0 ? '+' : ''}${t.pnl.toFixed(2)}`.padStart(12);
    lines.push(`  ${num} ${side} ${formatDate(t.entryTime)} ${formatDate(t.exitTime)} ${ep} ${xp} ${pnl} ${t.reason}`);
  });

  return lines.join('\n');
}

function formatDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 16).replace('T', ' ');
}
