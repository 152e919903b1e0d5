import type { Signal } from '../types/index.js';
import type { IndicatorHistory, Strategy } from './strategy.js';
import { latestPair } from './strategy.js';
import { classifyTrend, detectCross } from './trend.js';

export interface CrossoverParams {
  readonly threshold: number;     // 크로스 확정 여유 폭 (가격 포인트)
  readonly trendMargin: number;
  readonly trendFilter: boolean;  // true면 emaTrend 같은 쪽일 때만
}

const DEFAULT_PARAMS: CrossoverParams = {
  threshold: 0,
  trendMargin: 0,
  trendFilter: false,
};

/**
 * EMA 크로스 전략
 *
 * 진입: fast/slow 확정 크로스 방향 (옵션: 가격이 emaTrend 같은 쪽)
 */
export class CrossoverStrategy implements Strategy {
  readonly name = 'EmaCrossover';
  readonly variant = 'crossover' as const;
  readonly params: CrossoverParams;

  constructor(params?: Partial<CrossoverParams>) {
    this.params = { ...DEFAULT_PARAMS, ...params };
  }

  evaluate(history: IndicatorHistory, price: number): Signal {
    const pair = latestPair(history);
    if (!pair) return { direction: 'none', variant: this.variant, trend: 'none' };

    const trend = classifyTrend(pair.curr, this.params.trendMargin);
    const cross = detectCross(pair.prev, pair.curr, this.params.threshold);
    if (!cross) return { direction: 'none', variant: this.variant, trend };

    if (this.params.trendFilter) {
      const emaTrend = pair.curr.emaTrend;
      const agrees = emaTrend !== undefined && (cross === 'long' ? price > emaTrend : price < emaTrend);
      if (!agrees) {
        return { direction: 'none', variant: this.variant, trend, reason: `cross ${cross} against emaTrend` };
      }
    }

    return {
      direction: cross,
      variant: this.variant,
      trend,
      reason: `EMA cross ${cross}: fast=${pair.curr.emaFast?.toFixed(2)} slow=${pair.curr.emaSlow?.toFixed(2)}`,
    };
  }
}
