import type { IndicatorFrame, Side, Trend } from '../types/index.js';

/**
 * EMA fast/slow 비교 추세. margin 이내면 none
 */
export function classifyTrend(frame: IndicatorFrame, margin: number = 0): Trend {
  const { emaFast, emaSlow } = frame;
  if (emaFast === undefined || emaSlow === undefined) return 'none';
  if (emaFast > emaSlow + margin) return 'up';
  if (emaFast < emaSlow - margin) return 'down';
  return 'none';
}

/**
 * 확정 크로스: 직전 틱 fast가 slow 반대편(또는 같음) → 현재 틱 threshold 넘게 돌파
 * 근접 상태가 이어질 때 재발동 방지
 */
export function detectCross(prev: IndicatorFrame, curr: IndicatorFrame, threshold: number): Side | undefined {
  if (
    prev.emaFast === undefined || prev.emaSlow === undefined ||
    curr.emaFast === undefined || curr.emaSlow === undefined
  ) {
    return undefined;
  }
  if (prev.emaFast <= prev.emaSlow && curr.emaFast > curr.emaSlow + threshold) return 'long';
  if (prev.emaFast >= prev.emaSlow && curr.emaFast < curr.emaSlow - threshold) return 'short';
  return undefined;
}

export interface RegimeParams {
  /** |fast - slow| / price 상한 */
  readonly gapCap: number;
  readonly atrMinPct: number;
  readonly atrMaxPct: number;
  /** |Δ emaTrend| / price 상한 */
  readonly slopeCap: number;
}

/**
 * 횡보 구간 필터: 평균회귀 전략은 세 조건 모두 만족할 때만 진입
 */
export function passesRegimeFilter(
  prev: IndicatorFrame,
  curr: IndicatorFrame,
  price: number,
  params: RegimeParams,
): boolean {
  if (price <= 0) return false;
  const { emaFast, emaSlow, atr, emaTrend } = curr;
  if (emaFast === undefined || emaSlow === undefined || atr === undefined) return false;
  if (emaTrend === undefined || prev.emaTrend === undefined) return false;

  const gap = Math.abs(emaFast - emaSlow) / price;
  if (gap > params.gapCap) return false;

  const atrPct = atr / price;
  if (atrPct < params.atrMinPct || atrPct > params.atrMaxPct) return false;

  const slope = Math.abs(emaTrend - prev.emaTrend) / price;
  return slope <= params.slopeCap;
}

/**
 * 사다리 추가 레그 확인: 포지션 방향으로 emaFast까지 되돌림 + fast가 여전히 추세 쪽
 * long: 직전 종가 > emaFast, 현재가 <= emaFast, emaFast > emaSlow
 */
export function detectPullback(
  side: Side,
  prev: IndicatorFrame,
  curr: IndicatorFrame,
  prevClose: number,
  price: number,
): boolean {
  if (prev.emaFast === undefined || curr.emaFast === undefined || curr.emaSlow === undefined) return false;
  if (side === 'long') {
    return curr.emaFast > curr.emaSlow && prevClose > prev.emaFast && price <= curr.emaFast;
  }
  return curr.emaFast < curr.emaSlow && prevClose < prev.emaFast && price >= curr.emaFast;
}
