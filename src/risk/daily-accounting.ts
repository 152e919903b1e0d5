import { createChildLogger } from '../logger.js';
import type { DailyStats, RiskCheck } from '../types/index.js';
import type { DailyStatStore } from '../store/daily-stat-store.js';
import { localDate, localTime } from '../utils/time.js';

const log = createChildLogger('daily-accounting');

export interface DailyAccountingConfig {
  /** 연속 손실 몇 회에 당일 중단 */
  readonly lossStreakHalt: number;
  readonly timeZone: string;
}

export interface ExitRecord {
  readonly side: string;
  readonly entry: number;
  readonly exit: number;
  readonly qty: number;
  readonly pnl: number;
  readonly reason: string;
}

/**
 * 일일 집계
 * - 진입 확정마다 tradesToday
 * - 청산 확정마다 wins/losses, realizedPnl, lossStreak
 * - lossStreak 임계 도달 시 당일 halted (신규 진입만 차단)
 * - 타임존 기준 날짜 변경 시 롤오버
 */
export class DailyAccounting {
  private readonly cfg: DailyAccountingConfig;
  private readonly store: DailyStatStore | null;
  private stats: DailyStats;

  constructor(cfg: DailyAccountingConfig, now: number, store?: DailyStatStore | null) {
    this.cfg = cfg;
    this.store = store ?? null;
    this.stats = this.loadOrFresh(localDate(now, cfg.timeZone));
  }

  /**
   * 날짜가 바뀌었으면 새 날로 교체
   * @returns 롤오버 시 전일 집계, 아니면 null
   */
  rollIfNewDay(now: number): Readonly<DailyStats> | null {
    const today = localDate(now, this.cfg.timeZone);
    if (this.stats.date === today) return null;

    const previous = this.snapshot();
    log.info(
      {
        dailyReport: true,
        date: previous.date,
        tradesToday: previous.tradesToday,
        wins: previous.wins,
        losses: previous.losses,
        realizedPnl: previous.realizedPnl,
      },
      'Daily rollover',
    );
    this.stats = this.loadOrFresh(today);
    return previous;
  }

  checkEntry(now: number): RiskCheck {
    this.rollIfNewDay(now);
    if (this.stats.halted) {
      return { allowed: false, reason: `Halted: loss streak ${this.stats.lossStreak}/${this.cfg.lossStreakHalt}` };
    }
    return { allowed: true };
  }

  recordEntry(now: number): void {
    this.rollIfNewDay(now);
    this.stats.tradesToday++;
    this.persist();
  }

  /**
   * @returns 이번 청산으로 halted가 새로 걸렸으면 true
   */
  recordExit(rec: ExitRecord, now: number): boolean {
    this.rollIfNewDay(now);

    this.stats.realizedPnl += rec.pnl;
    if (rec.pnl > 0) {
      this.stats.wins++;
      this.stats.lossStreak = 0;
    } else {
      this.stats.losses++;
      this.stats.lossStreak++;
    }
    this.stats.trades.push({
      time: localTime(now, this.cfg.timeZone),
      side: rec.side,
      entry: rec.entry,
      exit: rec.exit,
      qty: rec.qty,
      pnl: rec.pnl,
      reason: rec.reason,
    });

    let newlyHalted = false;
    if (!this.stats.halted && this.stats.lossStreak >= this.cfg.lossStreakHalt) {
      this.stats.halted = true;
      newlyHalted = true;
      log.warn({ lossStreak: this.stats.lossStreak }, 'Loss streak limit — entries halted until rollover');
    }

    this.persist();
    return newlyHalted;
  }

  get isHalted(): boolean {
    return this.stats.halted;
  }

  snapshot(): Readonly<DailyStats> {
    return { ...this.stats, trades: [...this.stats.trades] };
  }

  private loadOrFresh(date: string): DailyStats {
    if (this.store) {
      try {
        const loaded = this.store.load(date);
        if (loaded) return loaded;
      } catch (err) {
        log.warn({ err, date }, 'Daily stats load failed — starting fresh day');
      }
    }
    return newDayStats(date);
  }

  private persist(): void {
    if (!this.store) return;
    try {
      this.store.save(this.stats);
    } catch (err) {
      log.warn({ err }, 'Daily stats save failed');
    }
  }
}

export function newDayStats(date: string): DailyStats {
  return {
    date,
    tradesToday: 0,
    lossStreak: 0,
    halted: false,
    wins: 0,
    losses: 0,
    realizedPnl: 0,
    trades: [],
  };
}
