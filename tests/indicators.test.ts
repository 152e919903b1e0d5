import { describe, it, expect } from 'vitest';
import { EMA, emaSeries } from '../src/indicators/ema.js';
import { ATR, atrSeries } from '../src/indicators/atr.js';
import { kernelEnvelope } from '../src/indicators/envelope.js';
import { IndicatorEngine, requiredBars } from '../src/indicators/engine.js';
import type { Candle, IndicatorParams } from '../src/types/index.js';

function makeCandle(o: number, h: number, l: number, c: number, ts: number = 0): Candle {
  return { timestamp: ts, open: o, high: h, low: l, close: c, volume: 100 };
}

const params: IndicatorParams = {
  emaFast: 2,
  emaSlow: 3,
  emaTrend: 0,
  atrPeriod: 2,
  envelope: { bandwidth: 1, multiplier: 1, window: 2 },
  envelopeBars: 10,
};

describe('EMA', () => {
  it('should return undefined until seeded', () => {
    const ema = new EMA(3);
    expect(ema.update(1)).toBeUndefined();
    expect(ema.update(2)).toBeUndefined();
    expect(ema.isReady).toBe(false);
  });

  it('should seed with the simple average then smooth', () => {
    expect(emaSeries([1, 2, 3, 4], 3)).toEqual([undefined, undefined, 2, 3]);
  });

  it('should equal the constant on a constant series', () => {
    const series = emaSeries([5, 5, 5, 5, 5], 2);
    expect(series.slice(1)).toEqual([5, 5, 5, 5]);
  });

  it('should reject non-positive period', () => {
    expect(() => new EMA(0)).toThrow('EMA period must be >= 1');
  });
});

describe('ATR', () => {
  it('should calculate ATR with Wilder smoothing', () => {
    const atr = new ATR(3);
    expect(atr.update(makeCandle(100, 110, 90, 100))).toBeUndefined();   // TR 20
    expect(atr.update(makeCandle(100, 115, 95, 105))).toBeUndefined();   // TR 20
    expect(atr.update(makeCandle(105, 120, 100, 110))).toBe(20);         // seed
    // TR = max(10, 5, 5) = 10 → (20*2 + 10) / 3
    expect(atr.update(makeCandle(110, 115, 105, 110))).toBeCloseTo(50 / 3, 10);
  });

  it('should use high - low for the first bar', () => {
    expect(atrSeries([makeCandle(100, 104, 99, 101)], 1)).toEqual([5]);
  });
});

describe('kernelEnvelope', () => {
  it('should weight recent closes with the gaussian kernel', () => {
    const bands = kernelEnvelope([1, 2, 3, 4], { bandwidth: 1, multiplier: 1, window: 2 });
    const w1 = Math.exp(-0.5);
    const mid = (4 + 3 * w1) / (1 + w1);
    expect(bands?.mid).toBeCloseTo(mid, 10);
    // mae = (|3 - mid| + |2 - mid|) / 2 → lower = 2.5
    expect(bands?.lower).toBeCloseTo(2.5, 10);
    expect(bands?.upper).toBeCloseTo(2 * mid - 2.5, 10);
  });

  it('should collapse to the constant on a flat series', () => {
    const bands = kernelEnvelope([100, 100, 100, 100], { bandwidth: 8, multiplier: 3, window: 3 });
    expect(bands?.mid).toBeCloseTo(100, 10);
    expect(bands?.upper).toBeCloseTo(100, 10);
    expect(bands?.lower).toBeCloseTo(100, 10);
  });

  it('should return undefined without window + 1 closes', () => {
    expect(kernelEnvelope([1, 2], { bandwidth: 1, multiplier: 1, window: 2 })).toBeUndefined();
  });

  it('should only read closes up to endIndex', () => {
    const env = { bandwidth: 2, multiplier: 2, window: 3 };
    const base = [10, 11, 12, 13, 14];
    const a = kernelEnvelope([...base, 99], env, 4);
    const b = kernelEnvelope([...base, 1], env, 4);
    expect(a).toEqual(b);
  });
});

describe('IndicatorEngine', () => {
  it('should require the longest lookback', () => {
    expect(requiredBars(params)).toBe(3);
    expect(requiredBars({ ...params, emaTrend: 50 })).toBe(50);
  });

  it('should report insufficient data', () => {
    const engine = new IndicatorEngine(params);
    const result = engine.compute([makeCandle(1, 1, 1, 1), makeCandle(1, 1, 1, 1)]);
    expect(result).toEqual({ ok: false, reason: 'insufficient_data', required: 3, available: 2 });
  });

  it('should produce one frame per closed candle', () => {
    const engine = new IndicatorEngine(params);
    const candles = [1, 2, 3, 4].map((c, i) => makeCandle(c, c, c, c, i));
    const result = engine.compute(candles);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.frames).toHaveLength(4);
    expect(result.frames[0]?.emaFast).toBeUndefined();
    expect(result.frames[1]?.emaFast).toBe(1.5);
    expect(result.frames[2]?.emaSlow).toBe(2);
    expect(result.frames[1]?.envelopeUpper).toBeUndefined();
    expect(result.frames[3]?.envelopeLower).toBeCloseTo(2.5, 10);
  });

  it('should not change past frames when a later candle is appended', () => {
    const engine = new IndicatorEngine(params);
    const candles = [5, 7, 6, 8, 9, 7].map((c, i) => makeCandle(c, c + 1, c - 1, c, i));
    const shorter = engine.compute(candles.slice(0, 5));
    const longer = engine.compute(candles);
    if (!shorter.ok || !longer.ok) throw new Error('expected frames');
    expect(longer.frames.slice(0, 5)).toEqual(shorter.frames);
  });

  it('should only compute the envelope for the recent bars', () => {
    const engine = new IndicatorEngine({ ...params, envelopeBars: 2 });
    const candles = [1, 2, 3, 4, 5].map((c, i) => makeCandle(c, c, c, c, i));
    const result = engine.compute(candles);
    if (!result.ok) throw new Error('expected frames');
    expect(result.frames[2]?.envelopeMid).toBeUndefined();
    expect(result.frames[3]?.envelopeMid).toBeDefined();
    expect(result.frames[4]?.envelopeMid).toBeDefined();
  });
});
