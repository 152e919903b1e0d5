import type { Candle, IndicatorFrame, IndicatorParams, IndicatorResult } from '../types/index.js';
import { emaSeries } from './ema.js';
import { atrSeries } from './atr.js';
import { kernelEnvelope } from './envelope.js';

/**
 * 가장 긴 lookback 기준 최소 마감봉 수
 */
export function requiredBars(params: IndicatorParams): number {
  return Math.max(
    params.emaFast,
    params.emaSlow,
    params.emaTrend,
    params.atrPeriod,
    params.envelope.window > 0 ? params.envelope.window + 1 : 0,
  );
}

/**
 * 마감봉만으로 인디케이터 프레임 계산 (index i 값은 0..i 봉에만 의존)
 * 진행 중인 봉을 넣으면 안 됨: 호출 측에서 제외
 */
export class IndicatorEngine {
  readonly params: IndicatorParams;
  readonly minBars: number;

  constructor(params: IndicatorParams) {
    this.params = params;
    this.minBars = requiredBars(params);
  }

  compute(candles: readonly Candle[]): IndicatorResult {
    if (candles.length < this.minBars) {
      return { ok: false, reason: 'insufficient_data', required: this.minBars, available: candles.length };
    }

    const closes = candles.map((c) => c.close);
    const fast = emaSeries(closes, this.params.emaFast);
    const slow = emaSeries(closes, this.params.emaSlow);
    const trend = this.params.emaTrend > 0 ? emaSeries(closes, this.params.emaTrend) : [];
    const atr = atrSeries(candles, this.params.atrPeriod);

    const envelopeFrom = candles.length - this.params.envelopeBars;
    const frames: IndicatorFrame[] = candles.map((_, i) => {
      const bands = this.params.envelope.window > 0 && i >= envelopeFrom
        ? kernelEnvelope(closes, this.params.envelope, i)
        : undefined;
      return {
        emaFast: fast[i],
        emaSlow: slow[i],
        emaTrend: trend[i],
        atr: atr[i],
        envelopeUpper: bands?.upper,
        envelopeLower: bands?.lower,
        envelopeMid: bands?.mid,
      };
    });

    return { ok: true, frames };
  }
}
