import type Database from 'better-sqlite3';
import type { TradingMode } from '../config.js';
import type { EventBus } from '../engine/event-bus.js';
import type { TradingEvent } from '../types/index.js';

export type AuditLevel = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export interface AuditEntry {
  id: number;
  timestamp: number;
  level: string;
  module: string;
  action: string;
  detail: string | null;
  mode: string | null;
}

/**
 * SQLite audit log: 진입/청산/잠금/중단/상태 보정 기록
 */
export class AuditLog {
  private readonly db: Database.Database;
  private readonly mode: TradingMode | null;

  constructor(db: Database.Database, mode?: TradingMode) {
    this.db = db;
    this.mode = mode ?? null;
  }

  log(level: AuditLevel, module: string, action: string, detail?: string): void {
    this.db.prepare(`
      INSERT INTO audit_log (timestamp, level, module, action, detail, mode)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(Date.now(), level, module, action, detail ?? null, this.mode);
  }

  info(module: string, action: string, detail?: string): void {
    this.log('INFO', module, action, detail);
  }

  warn(module: string, action: string, detail?: string): void {
    this.log('WARN', module, action, detail);
  }

  error(module: string, action: string, detail?: string): void {
    this.log('ERROR', module, action, detail);
  }

  critical(module: string, action: string, detail?: string): void {
    this.log('CRITICAL', module, action, detail);
  }

  /** 엔진 이벤트 기록 (단계 이동은 제외) */
  attach(bus: EventBus): void {
    bus.onAny((event) => this.record(event));
  }

  record(event: TradingEvent): void {
    switch (event.type) {
      case 'POSITION_OPENED':
        this.info('engine', 'ENTRY', JSON.stringify(event.position));
        break;
      case 'POSITION_CLOSED':
        this.info('engine', 'EXIT', JSON.stringify(event.trade));
        break;
      case 'LEG_ADDED':
        this.info('engine', 'LEG_ADDED', JSON.stringify({ legCount: event.legCount, price: event.price, quantity: event.quantity }));
        break;
      case 'LOCKED':
      case 'UNLOCKED':
        this.info('engine', event.type);
        break;
      case 'HALTED':
        this.warn('accounting', 'HALTED', `lossStreak=${event.lossStreak}`);
        break;
      case 'STATE_CORRECTED':
        this.warn('engine', 'STATE_CORRECTED', event.detail);
        break;
      case 'DAY_ROLLOVER':
        this.info('accounting', 'DAY_ROLLOVER', JSON.stringify(event.stats));
        break;
      case 'STEP_ADVANCED':
        break;
    }
  }

  getRecent(limit: number = 50): AuditEntry[] {
    return this.db.prepare(`
      SELECT id, timestamp, level, module, action, detail, mode
      FROM audit_log ORDER BY id DESC LIMIT ?
    `).all(limit) as AuditEntry[];
  }
}
