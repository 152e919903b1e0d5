import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { config } from '../config.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('db');

let _db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (!_db) {
    _db = openDb(config.db.path);
    log.info({ path: config.db.path }, 'Database initialized');
  }
  return _db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

/** 경로 지정 오픈 (':memory:'는 테스트용) */
export function openDb(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }
  initSchema(db);
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS daily_stats (
      date          TEXT PRIMARY KEY,
      trades_today  INTEGER NOT NULL,
      loss_streak   INTEGER NOT NULL,
      halted        INTEGER NOT NULL,
      wins          INTEGER NOT NULL,
      losses        INTEGER NOT NULL,
      realized_pnl  REAL NOT NULL,
      trades_json   TEXT NOT NULL,
      updated_at    INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS trades (
      id             INTEGER PRIMARY KEY AUTOINCREMENT,
      mode           TEXT NOT NULL,
      side           TEXT NOT NULL,
      opened_at      INTEGER NOT NULL,
      closed_at      INTEGER NOT NULL,
      entry_price    REAL NOT NULL,
      exit_price     REAL NOT NULL,
      qty            REAL NOT NULL,
      legs           INTEGER NOT NULL,
      pnl            REAL NOT NULL,
      exit_trigger   TEXT NOT NULL,
      classification TEXT NOT NULL,
      trailing_step  INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS audit_log (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp  INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
      level      TEXT NOT NULL,
      module     TEXT NOT NULL,
      action     TEXT NOT NULL,
      detail     TEXT,
      mode       TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_trades_closed ON trades(closed_at);
    CREATE INDEX IF NOT EXISTS idx_audit_ts ON audit_log(timestamp);
  `);
}
