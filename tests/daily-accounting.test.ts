import { describe, it, expect } from 'vitest';
import { DailyAccounting, newDayStats, type ExitRecord } from '../src/risk/daily-accounting.js';
import { MemoryDailyStatStore, SqliteDailyStatStore } from '../src/store/daily-stat-store.js';
import { openDb } from '../src/db/database.js';

const DAY1 = Date.UTC(2024, 0, 1, 10, 15, 30);
const DAY2 = Date.UTC(2024, 0, 2, 0, 0, 5);

function exit(pnl: number): ExitRecord {
  return { side: 'long', entry: 100, exit: 100 + pnl, qty: 1, pnl, reason: 'STOP' };
}

describe('DailyAccounting', () => {
  it('should halt after the loss streak limit', () => {
    const acc = new DailyAccounting({ lossStreakHalt: 3, timeZone: 'UTC' }, DAY1);
    expect(acc.recordExit(exit(-1), DAY1)).toBe(false);
    expect(acc.recordExit(exit(-1), DAY1)).toBe(false);
    expect(acc.recordExit(exit(-1), DAY1)).toBe(true);

    expect(acc.isHalted).toBe(true);
    expect(acc.checkEntry(DAY1)).toEqual({ allowed: false, reason: 'Halted: loss streak 3/3' });
  });

  it('should reset the streak on a win', () => {
    const acc = new DailyAccounting({ lossStreakHalt: 3, timeZone: 'UTC' }, DAY1);
    acc.recordExit(exit(-2), DAY1);
    acc.recordExit(exit(5), DAY1);

    const s = acc.snapshot();
    expect(s.lossStreak).toBe(0);
    expect(s.wins).toBe(1);
    expect(s.losses).toBe(1);
    expect(s.realizedPnl).toBe(3);
  });

  it('should count a breakeven exit as a loss', () => {
    const acc = new DailyAccounting({ lossStreakHalt: 3, timeZone: 'UTC' }, DAY1);
    acc.recordExit(exit(0), DAY1);
    expect(acc.snapshot().losses).toBe(1);
    expect(acc.snapshot().lossStreak).toBe(1);
  });

  it('should record trades with the local time', () => {
    const acc = new DailyAccounting({ lossStreakHalt: 3, timeZone: 'UTC' }, DAY1);
    acc.recordEntry(DAY1);
    acc.recordExit(exit(4), DAY1);

    const s = acc.snapshot();
    expect(s.tradesToday).toBe(1);
    expect(s.trades).toEqual([{ time: '10:15:30', side: 'long', entry: 100, exit: 104, qty: 1, pnl: 4, reason: 'STOP' }]);
  });

  it('should roll over to a fresh day and lift the halt', () => {
    const acc = new DailyAccounting({ lossStreakHalt: 1, timeZone: 'UTC' }, DAY1);
    acc.recordEntry(DAY1);
    acc.recordExit(exit(-1), DAY1);
    expect(acc.isHalted).toBe(true);

    expect(acc.rollIfNewDay(DAY1)).toBeNull();
    const previous = acc.rollIfNewDay(DAY2);
    expect(previous?.date).toBe('2024-01-01');
    expect(previous?.tradesToday).toBe(1);
    expect(acc.snapshot()).toEqual(newDayStats('2024-01-02'));
    expect(acc.checkEntry(DAY2)).toEqual({ allowed: true });
  });

  it('should roll over at local midnight of the trading time zone', () => {
    // 2024-01-01 23:00 / 2024-01-02 00:00 (UTC+9)
    const acc = new DailyAccounting({ lossStreakHalt: 3, timeZone: 'Asia/Seoul' }, Date.UTC(2024, 0, 1, 14));
    expect(acc.snapshot().date).toBe('2024-01-01');
    expect(acc.rollIfNewDay(Date.UTC(2024, 0, 1, 15))?.date).toBe('2024-01-01');
    expect(acc.snapshot().date).toBe('2024-01-02');
  });

  it('should resume the same day from the store', () => {
    const store = new MemoryDailyStatStore();
    const first = new DailyAccounting({ lossStreakHalt: 3, timeZone: 'UTC' }, DAY1, store);
    first.recordEntry(DAY1);
    first.recordExit(exit(-1), DAY1);

    const restarted = new DailyAccounting({ lossStreakHalt: 3, timeZone: 'UTC' }, DAY1 + 60_000, store);
    expect(restarted.snapshot().tradesToday).toBe(1);
    expect(restarted.snapshot().lossStreak).toBe(1);
  });
});

describe('SqliteDailyStatStore', () => {
  it('should persist and reload a day', () => {
    const store = new SqliteDailyStatStore(openDb(':memory:'));
    const stats = {
      ...newDayStats('2024-01-01'),
      tradesToday: 2,
      lossStreak: 1,
      halted: true,
      losses: 1,
      realizedPnl: -12.5,
      trades: [{ time: '09:00:00', side: 'short', entry: 100, exit: 112.5, qty: 1, pnl: -12.5, reason: 'STOP' }],
    };
    store.save(stats);
    store.save({ ...stats, tradesToday: 3 });

    expect(store.load('2024-01-01')).toEqual({ ...stats, tradesToday: 3 });
    expect(store.load('2024-01-02')).toBeNull();
  });
});
