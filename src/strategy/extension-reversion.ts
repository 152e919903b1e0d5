import type { Signal } from '../types/index.js';
import type { IndicatorHistory, Strategy } from './strategy.js';
import { latestPair } from './strategy.js';
import { classifyTrend, passesRegimeFilter, type RegimeParams } from './trend.js';

export interface ExtensionReversionParams {
  /** 이탈 폭 = factor × ATR */
  readonly extensionFactor: number;
  readonly trendMargin: number;
  readonly regime: RegimeParams | null;
}

const DEFAULT_PARAMS: ExtensionReversionParams = {
  extensionFactor: 1.5,
  trendMargin: 0,
  regime: null,
};

/**
 * 과이탈 복귀 전략
 *
 * 직전 마감봉 종가가 emaFast - factor×ATR 아래였다가 최신 마감봉이 emaFast 위로 복귀 → long
 * (short 대칭). 판정은 마감봉 종가 기준
 */
export class ExtensionReversionStrategy implements Strategy {
  readonly name = 'ExtensionReversion';
  readonly variant = 'extension_reversion' as const;
  readonly params: ExtensionReversionParams;

  constructor(params?: Partial<ExtensionReversionParams>) {
    this.params = { ...DEFAULT_PARAMS, ...params };
  }

  evaluate(history: IndicatorHistory, price: number): Signal {
    const pair = latestPair(history);
    if (!pair) return { direction: 'none', variant: this.variant, trend: 'none' };

    const { prev, curr, prevClose, currClose } = pair;
    const trend = classifyTrend(curr, this.params.trendMargin);
    if (prev.emaFast === undefined || prev.atr === undefined || curr.emaFast === undefined) {
      return { direction: 'none', variant: this.variant, trend };
    }

    if (this.params.regime && !passesRegimeFilter(prev, curr, price, this.params.regime)) {
      return { direction: 'none', variant: this.variant, trend, reason: 'regime filter' };
    }

    const band = this.params.extensionFactor * prev.atr;
    const long = prevClose < prev.emaFast - band && currClose > curr.emaFast;
    const short = prevClose > prev.emaFast + band && currClose < curr.emaFast;

    if (long && !short) {
      return { direction: 'long', variant: this.variant, trend, reason: `reverted above emaFast ${curr.emaFast.toFixed(2)}` };
    }
    if (short && !long) {
      return { direction: 'short', variant: this.variant, trend, reason: `reverted below emaFast ${curr.emaFast.toFixed(2)}` };
    }
    return { direction: 'none', variant: this.variant, trend };
  }
}
