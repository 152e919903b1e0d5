import { describe, it, expect } from 'vitest';
import { openDb } from '../src/db/database.js';
import { AuditLog } from '../src/safety/audit-log.js';
import { TradeJournal } from '../src/store/trade-journal.js';
import { EventBus } from '../src/engine/event-bus.js';
import type { ClosedTrade } from '../src/types/index.js';

const trade: ClosedTrade = {
  side: 'short',
  entryPrice: 100,
  exitPrice: 95,
  quantity: 1,
  legCount: 1,
  pnl: 5,
  trigger: 'ENVELOPE_TARGET',
  classification: 'take_profit',
  trailingStep: 1,
  openedAt: 1000,
  closedAt: 2000,
};

function setup() {
  const db = openDb(':memory:');
  const bus = new EventBus();
  const audit = new AuditLog(db, 'PAPER');
  const journal = new TradeJournal(db, 'PAPER');
  audit.attach(bus);
  journal.attach(bus);
  return { bus, audit, journal };
}

describe('TradeJournal', () => {
  it('should store every confirmed exit', () => {
    const { bus, journal } = setup();
    bus.emit({ type: 'POSITION_CLOSED', timestamp: 2000, trade });
    bus.emit({ type: 'LOCKED', timestamp: 2000 });
    expect(journal.count()).toBe(1);
  });
});

describe('AuditLog', () => {
  it('should record engine events newest first', () => {
    const { bus, audit } = setup();
    bus.emit({ type: 'POSITION_CLOSED', timestamp: 2000, trade });
    bus.emit({ type: 'STEP_ADVANCED', timestamp: 2001, step: 1, stopPrice: 100 });
    bus.emit({ type: 'HALTED', timestamp: 2002, lossStreak: 3 });

    const recent = audit.getRecent();
    expect(recent.map((e) => e.action)).toEqual(['HALTED', 'EXIT']);
    expect(recent[0]).toMatchObject({ level: 'WARN', module: 'accounting', detail: 'lossStreak=3', mode: 'PAPER' });
    expect(JSON.parse(recent[1]?.detail ?? 'null')).toEqual(trade);
  });

  it('should limit the number of rows returned', () => {
    const { audit } = setup();
    audit.info('main', 'START');
    audit.critical('main', 'SHUTDOWN', 'signal');
    expect(audit.getRecent(1)).toHaveLength(1);
    expect(audit.getRecent(1)[0]?.level).toBe('CRITICAL');
  });
});
