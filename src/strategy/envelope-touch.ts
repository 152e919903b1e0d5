import type { Signal } from '../types/index.js';
import type { IndicatorHistory, Strategy } from './strategy.js';
import { latestPair } from './strategy.js';
import { classifyTrend, passesRegimeFilter, type RegimeParams } from './trend.js';

export interface EnvelopeTouchParams {
  readonly trendMargin: number;
  /** null이면 횡보 필터 미사용 */
  readonly regime: RegimeParams | null;
}

const DEFAULT_PARAMS: EnvelopeTouchParams = {
  trendMargin: 0,
  regime: null,
};

/**
 * EMA 추세 + envelope 터치 전략
 *
 * 상승 추세에서 현재가 <= 하단 → long, 하락 추세에서 현재가 >= 상단 → short
 */
export class EnvelopeTouchStrategy implements Strategy {
  readonly name = 'EnvelopeTouch';
  readonly variant = 'envelope_touch' as const;
  readonly params: EnvelopeTouchParams;

  constructor(params?: Partial<EnvelopeTouchParams>) {
    this.params = { ...DEFAULT_PARAMS, ...params };
  }

  evaluate(history: IndicatorHistory, price: number): Signal {
    const pair = latestPair(history);
    if (!pair) return { direction: 'none', variant: this.variant, trend: 'none' };

    const trend = classifyTrend(pair.curr, this.params.trendMargin);
    const { envelopeUpper, envelopeLower } = pair.curr;
    if (trend === 'none' || envelopeUpper === undefined || envelopeLower === undefined) {
      return { direction: 'none', variant: this.variant, trend };
    }

    if (this.params.regime && !passesRegimeFilter(pair.prev, pair.curr, price, this.params.regime)) {
      return { direction: 'none', variant: this.variant, trend, reason: 'regime filter' };
    }

    if (trend === 'up' && price <= envelopeLower) {
      return { direction: 'long', variant: this.variant, trend, reason: `touch lower ${envelopeLower.toFixed(2)}` };
    }
    if (trend === 'down' && price >= envelopeUpper) {
      return { direction: 'short', variant: this.variant, trend, reason: `touch upper ${envelopeUpper.toFixed(2)}` };
    }
    return { direction: 'none', variant: this.variant, trend };
  }
}
