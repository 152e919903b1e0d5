import type { Candle, IndicatorFrame, Signal, StrategyVariant } from '../types/index.js';

/** 마감봉과 정렬된 인디케이터 프레임 */
export interface IndicatorHistory {
  readonly candles: readonly Candle[];
  readonly frames: readonly IndicatorFrame[];
}

/**
 * 전략 공통 인터페이스: (마감봉 히스토리, 현재가) → Signal
 * 변형별 구현체를 설정으로 교체
 */
export interface Strategy {
  readonly name: string;
  readonly variant: StrategyVariant;
  evaluate(history: IndicatorHistory, price: number): Signal;
}

export interface LatestPair {
  readonly prev: IndicatorFrame;
  readonly curr: IndicatorFrame;
  readonly prevClose: number;
  readonly currClose: number;
}

/** 크로스 판정에 필요한 직전/최신 마감봉 쌍 */
export function latestPair(history: IndicatorHistory): LatestPair | undefined {
  const n = history.frames.length;
  if (n < 2 || history.candles.length !== n) return undefined;
  const prev = history.frames[n - 2];
  const curr = history.frames[n - 1];
  const prevCandle = history.candles[n - 2];
  const currCandle = history.candles[n - 1];
  if (!prev || !curr || !prevCandle || !currCandle) return undefined;
  return { prev, curr, prevClose: prevCandle.close, currClose: currCandle.close };
}
