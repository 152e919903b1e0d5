export interface TradeRecord {
  readonly entryTime: number;
  readonly exitTime: number;
  readonly side: string;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly qty: number;
  readonly pnl: number;           // quote
  readonly legs: number;
  readonly reason: string;
  readonly classification: string;
}

export interface BacktestReport {
  readonly totalTrades: number;
  readonly winCount: number;
  readonly lossCount: number;
  readonly winRate: number;         // 0~1
  readonly totalPnl: number;        // quote
  readonly totalReturn: number;     // %
  readonly maxDrawdown: number;     // % (양수)
  readonly profitFactor: number;
  readonly expectancy: number;
  readonly avgWin: number;
  readonly avgLoss: number;         // 양수
  readonly maxConsecutiveLosses: number;
  readonly startEquity: number;
  readonly endEquity: number;
  readonly trades: TradeRecord[];
  readonly equityCurve: EquityPoint[];
}

export interface EquityPoint {
  readonly timestamp: number;
  readonly equity: number;
}
