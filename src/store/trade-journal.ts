import type Database from 'better-sqlite3';
import type { TradingMode } from '../config.js';
import type { ClosedTrade } from '../types/index.js';
import type { EventBus } from '../engine/event-bus.js';

/**
 * 확정 청산 내역 저장 (trades 테이블)
 */
export class TradeJournal {
  private readonly db: Database.Database;
  private readonly mode: TradingMode;

  constructor(db: Database.Database, mode: TradingMode) {
    this.db = db;
    this.mode = mode;
  }

  attach(bus: EventBus): void {
    bus.on('POSITION_CLOSED', (event) => {
      if (event.type === 'POSITION_CLOSED') this.record(event.trade);
    });
  }

  record(trade: ClosedTrade): void {
    this.db.prepare(`
      INSERT INTO trades (mode, side, opened_at, closed_at, entry_price, exit_price, qty, legs, pnl, exit_trigger, classification, trailing_step)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      this.mode,
      trade.side,
      trade.openedAt,
      trade.closedAt,
      trade.entryPrice,
      trade.exitPrice,
      trade.quantity,
      trade.legCount,
      trade.pnl,
      trade.trigger,
      trade.classification,
      trade.trailingStep,
    );
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS n FROM trades').get() as { n: number } | undefined;
    return row?.n ?? 0;
  }
}
