import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { DailyStats } from '../types/index.js';

/**
 * 일일 집계 저장소: 날짜 키. load 시 없으면 null (새 날)
 */
export interface DailyStatStore {
  load(date: string): DailyStats | null;
  save(stats: DailyStats): void;
}

const tradeRecordSchema = z.object({
  time: z.string(),
  side: z.string(),
  entry: z.number(),
  exit: z.number(),
  qty: z.number(),
  pnl: z.number(),
  reason: z.string(),
});

const rowSchema = z.object({
  date: z.string(),
  trades_today: z.number().int(),
  loss_streak: z.number().int(),
  halted: z.number().int(),
  wins: z.number().int(),
  losses: z.number().int(),
  realized_pnl: z.number(),
  trades_json: z.string(),
});

export class SqliteDailyStatStore implements DailyStatStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  load(date: string): DailyStats | null {
    const raw: unknown = this.db.prepare('SELECT * FROM daily_stats WHERE date = ?').get(date);
    if (raw === undefined) return null;

    const row = rowSchema.parse(raw);
    const trades = z.array(tradeRecordSchema).parse(JSON.parse(row.trades_json));
    return {
      date: row.date,
      tradesToday: row.trades_today,
      lossStreak: row.loss_streak,
      halted: row.halted === 1,
      wins: row.wins,
      losses: row.losses,
      realizedPnl: row.realized_pnl,
      trades,
    };
  }

  save(stats: DailyStats): void {
    this.db.prepare(`
      INSERT INTO daily_stats (date, trades_today, loss_streak, halted, wins, losses, realized_pnl, trades_json, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(date) DO UPDATE SET
        trades_today = excluded.trades_today,
        loss_streak  = excluded.loss_streak,
        halted       = excluded.halted,
        wins         = excluded.wins,
        losses       = excluded.losses,
        realized_pnl = excluded.realized_pnl,
        trades_json  = excluded.trades_json,
        updated_at   = excluded.updated_at
    `).run(
      stats.date,
      stats.tradesToday,
      stats.lossStreak,
      stats.halted ? 1 : 0,
      stats.wins,
      stats.losses,
      stats.realizedPnl,
      JSON.stringify(stats.trades),
      Date.now(),
    );
  }
}

/** 백테스트/테스트용 */
export class MemoryDailyStatStore implements DailyStatStore {
  private readonly days = new Map<string, DailyStats>();

  load(date: string): DailyStats | null {
    const s = this.days.get(date);
    return s ? { ...s, trades: [...s.trades] } : null;
  }

  save(stats: DailyStats): void {
    this.days.set(stats.date, { ...stats, trades: [...stats.trades] });
  }
}
