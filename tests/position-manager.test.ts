import { describe, it, expect } from 'vitest';
import { EventBus } from '../src/engine/event-bus.js';
import { PositionManager, classifyExit, initialStop, type PositionManagerConfig } from '../src/engine/position-manager.js';
import type { IndicatorFrame, PriceBar, Signal } from '../src/types/index.js';

const cfg: PositionManagerConfig = {
  stopPoints: 10,
  trailingSteps: [
    { trigger: 5, offset: 0 },
    { trigger: 10, offset: 5 },
  ],
  contractSize: 1,
  envelopeTarget: true,
  closeOnTrendFlip: true,
};

function bar(high: number, low: number, last: number, ts: number = 1000): PriceBar {
  return { timestamp: ts, high, low, last };
}

function bands(upper: number, lower: number): IndicatorFrame {
  return {
    emaFast: undefined,
    emaSlow: undefined,
    emaTrend: undefined,
    atr: undefined,
    envelopeUpper: upper,
    envelopeLower: lower,
    envelopeMid: (upper + lower) / 2,
  };
}

function setup(overrides: Partial<PositionManagerConfig> = {}) {
  const bus = new EventBus();
  const pm = new PositionManager(bus, { ...cfg, ...overrides });
  return { bus, pm };
}

describe('PositionManager', () => {
  it('should place the initial stop stopPoints away', () => {
    const { pm, bus } = setup();
    const pos = pm.open({ side: 'long', entryPrice: 100, quantity: 1, margin: 10, openedAt: 0 });
    expect(pos.stopPrice).toBe(90);
    expect(pos.legCount).toBe(1);
    expect(pos.trailingStep).toBe(0);
    expect(bus.getLog().map((e) => e.type)).toEqual(['POSITION_OPENED']);
    expect(initialStop('short', 100, 10)).toBe(110);
  });

  it('should enforce one position at a time', () => {
    const { pm } = setup();
    pm.open({ side: 'long', entryPrice: 100, quantity: 1, margin: 10, openedAt: 0 });
    expect(() => pm.open({ side: 'short', entryPrice: 100, quantity: 1, margin: 10, openedAt: 0 }))
      .toThrow('Already in position');
  });

  it('should fill a stop at the stop price, not the bar extreme', () => {
    const { pm } = setup({ trailingSteps: [] });
    pm.open({ side: 'long', entryPrice: 100, quantity: 1, margin: 10, openedAt: 0 });
    const decision = pm.evaluate(bar(101, 85, 88));
    expect(decision?.trigger).toBe('STOP');
    expect(decision?.price).toBe(90);

    const trade = pm.close(90, 'STOP', 2000);
    expect(trade.pnl).toBe(-10);
    expect(trade.classification).toBe('stop_loss');
    expect(pm.hasPosition).toBe(false);
  });

  it('should advance steps before checking the stop on the same bar', () => {
    const { pm, bus } = setup();
    pm.open({ side: 'long', entryPrice: 100, quantity: 1, margin: 10, openedAt: 0 });

    // 고가 +11 → 2단계 (손절 105), 저가 99 → 105에서 1회 청산
    const decision = pm.evaluate(bar(111, 99, 104));
    expect(pm.current?.trailingStep).toBe(2);
    expect(decision).toEqual({ trigger: 'STOP', price: 105, reason: 'stop 105 hit (step 2)' });
    expect(bus.getLog().filter((e) => e.type === 'STEP_ADVANCED')).toHaveLength(2);

    const trade = pm.close(105, 'STOP', 2000);
    expect(trade.pnl).toBe(5);
    expect(trade.classification).toBe('take_profit');
  });

  it('should hold the step stop while price pulls back short of the next trigger', () => {
    const { pm } = setup();
    pm.open({ side: 'long', entryPrice: 100, quantity: 1, margin: 10, openedAt: 0 });
    pm.evaluate(bar(106, 101, 105));
    expect(pm.current?.stopPrice).toBe(100);
    pm.evaluate(bar(103, 101, 102));
    expect(pm.current?.stopPrice).toBe(100);
    expect(pm.current?.trailingStep).toBe(1);
  });

  it('should apply a later step offset exactly even when it loosens the stop', () => {
    const { pm } = setup({
      trailingSteps: [
        { trigger: 5, offset: 5 },
        { trigger: 10, offset: 0 },
      ],
    });
    pm.open({ side: 'long', entryPrice: 100, quantity: 1, margin: 10, openedAt: 0 });

    expect(pm.evaluate(bar(106, 106, 106))).toBeUndefined();
    expect(pm.current?.trailingStep).toBe(1);
    expect(pm.current?.stopPrice).toBe(105);

    expect(pm.evaluate(bar(111, 106, 110))).toBeUndefined();
    expect(pm.current?.trailingStep).toBe(2);
    expect(pm.current?.stopPrice).toBe(100);
  });

  it('should mirror the stop for shorts', () => {
    const { pm } = setup({ trailingSteps: [] });
    pm.open({ side: 'short', entryPrice: 100, quantity: 2, margin: 10, openedAt: 0 });
    const decision = pm.evaluate(bar(112, 100, 108));
    expect(decision?.price).toBe(110);
    expect(pm.close(110, 'STOP', 1).pnl).toBe(-20);
  });

  it('should take profit at the opposite envelope band', () => {
    const { pm } = setup();
    pm.open({ side: 'long', entryPrice: 100, quantity: 1, margin: 10, openedAt: 0 });
    const decision = pm.evaluate(bar(109, 101, 109), { frame: bands(108, 92) });
    expect(decision?.trigger).toBe('ENVELOPE_TARGET');
    expect(decision?.price).toBe(109);
    expect(pm.current?.stopPrice).toBe(100);
  });

  it('should close on a trend flip regardless of pnl', () => {
    const { pm } = setup();
    pm.open({ side: 'long', entryPrice: 100, quantity: 1, margin: 10, openedAt: 0 });
    const signal: Signal = { direction: 'none', variant: 'envelope_touch', trend: 'down' };
    const decision = pm.evaluate(bar(102, 99, 100), { signal });
    expect(decision?.trigger).toBe('TREND_FLIP');
    expect(decision?.price).toBe(100);
    expect(pm.close(100, 'TREND_FLIP', 1).classification).toBe('signal');
  });

  it('should hold when the trend agrees', () => {
    const { pm } = setup();
    pm.open({ side: 'long', entryPrice: 100, quantity: 1, margin: 10, openedAt: 0 });
    const signal: Signal = { direction: 'none', variant: 'envelope_touch', trend: 'up' };
    expect(pm.evaluate(bar(102, 99, 100), { signal, frame: bands(120, 80) })).toBeUndefined();
  });

  it('should close a basket on equity target and stop', () => {
    const basket = { equityAtOpen: 1000, targetFraction: 0.02, stopFraction: 0.05 };
    const { pm } = setup();
    pm.open({ side: 'long', entryPrice: 100, quantity: 1, margin: 10, openedAt: 0, basket });
    expect(pm.evaluate(bar(100, 100, 100), { equityNow: 1010 })).toBeUndefined();
    expect(pm.evaluate(bar(100, 100, 100), { equityNow: 1021 })?.trigger).toBe('BASKET_TARGET');
    expect(pm.evaluate(bar(100, 100, 100), { equityNow: 949 })?.trigger).toBe('BASKET_STOP');

    const trade = pm.close(100, 'BASKET_TARGET', 1, 1021);
    expect(trade.pnl).toBe(21);
    expect(trade.classification).toBe('take_profit');
  });

  it('should add legs on the same side and keep the first entry price', () => {
    const basket = { equityAtOpen: 1000, targetFraction: 0.02, stopFraction: 0.05 };
    const { pm, bus } = setup();
    pm.open({ side: 'long', entryPrice: 100, quantity: 1, margin: 10, openedAt: 0, basket });
    pm.addLeg('long', 96, 2, 5, 1);

    expect(pm.current?.legCount).toBe(2);
    expect(pm.current?.quantity).toBe(3);
    expect(pm.current?.entryPrice).toBe(100);
    expect(pm.current?.marginCommitted).toBe(15);
    // (102-100)×1 + (102-96)×2
    expect(pm.pnlAt(102)).toBe(14);
    expect(bus.getLog().at(-1)?.type).toBe('LEG_ADDED');
    expect(() => pm.addLeg('short', 96, 1, 5, 2)).toThrow('Leg side short does not match position side long');
  });

  it('should apply the contract size to pnl', () => {
    const { pm } = setup({ contractSize: 0.01 });
    pm.open({ side: 'long', entryPrice: 50_000, quantity: 2, margin: 10, openedAt: 0 });
    expect(pm.pnlAt(50_300)).toBeCloseTo(6, 10);
  });
});

describe('classifyExit', () => {
  it('should classify by realized pnl sign for stops', () => {
    expect(classifyExit('STOP', -1)).toBe('stop_loss');
    expect(classifyExit('STOP', 0)).toBe('stop_loss');
    expect(classifyExit('STOP', 3)).toBe('take_profit');
    expect(classifyExit('BASKET_STOP', -5)).toBe('stop_loss');
  });

  it('should treat targets as take profit and flips as signal', () => {
    expect(classifyExit('ENVELOPE_TARGET', -1)).toBe('take_profit');
    expect(classifyExit('BASKET_TARGET', 1)).toBe('take_profit');
    expect(classifyExit('TREND_FLIP', -1)).toBe('signal');
    expect(classifyExit('FORCED', 2)).toBe('signal');
  });
});
