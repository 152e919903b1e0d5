import type { ClosedTrade, TradeRecord, TradingEvent } from '../types/index.js';

export function toTradeRecord(trade: ClosedTrade): TradeRecord {
  return {
    entryTime: trade.openedAt,
    exitTime: trade.closedAt,
    side: trade.side,
    entryPrice: trade.entryPrice,
    exitPrice: trade.exitPrice,
    qty: trade.quantity,
    pnl: trade.pnl,
    legs: trade.legCount,
    reason: trade.trigger,
    classification: trade.classification,
  };
}

/**
 * 이벤트 로그에서 TradeRecord[] 변환 (청산 이벤트 기준)
 */
export function buildTradeLog(events: readonly TradingEvent[]): TradeRecord[] {
  const trades: TradeRecord[] = [];
  for (const event of events) {
    if (event.type === 'POSITION_CLOSED') {
      trades.push(toTradeRecord(event.trade));
    }
  }
  return trades;
}
