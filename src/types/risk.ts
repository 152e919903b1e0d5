export interface MarketMeta {
  readonly tickSize: number;
  readonly qtyStep: number;
  readonly minQty: number;
  /** 계약 1개당 기초자산 수량 (선물 계약 단위) */
  readonly contractSize: number;
}

export interface PositionSizing {
  /** 주문 수량 (거래소 수량 단위). 0이면 이번 틱 진입 안 함 */
  readonly qty: number;
  readonly notional: number;
  readonly margin: number;
  readonly reason?: string;
}

export interface LadderTier {
  readonly minEquity: number;
  readonly legNotional: number;
  readonly maxLegs: number;
}

export interface RiskCheck {
  readonly allowed: boolean;
  readonly reason?: string;
}

export interface DailyStats {
  readonly date: string;        // YYYY-MM-DD (거래 타임존 기준)
  tradesToday: number;
  lossStreak: number;
  halted: boolean;
  wins: number;
  losses: number;
  realizedPnl: number;
  trades: DailyTradeRecord[];
}

export interface DailyTradeRecord {
  readonly time: string;        // HH:mm:ss
  readonly side: string;
  readonly entry: number;
  readonly exit: number;
  readonly qty: number;
  readonly pnl: number;
  readonly reason: string;
}
