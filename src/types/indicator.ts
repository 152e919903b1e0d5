/**
 * 마감봉 1개당 1프레임. 계산 불가 구간은 undefined (0/NaN 아님)
 */
export interface IndicatorFrame {
  readonly emaFast: number | undefined;
  readonly emaSlow: number | undefined;
  readonly emaTrend: number | undefined;
  readonly atr: number | undefined;
  readonly envelopeUpper: number | undefined;
  readonly envelopeLower: number | undefined;
  readonly envelopeMid: number | undefined;
}

export interface EnvelopeParams {
  readonly bandwidth: number;
  readonly multiplier: number;
  readonly window: number;
}

export interface IndicatorParams {
  readonly emaFast: number;
  readonly emaSlow: number;
  /** 0이면 미사용 */
  readonly emaTrend: number;
  readonly atrPeriod: number;
  /** window 0이면 미사용 */
  readonly envelope: EnvelopeParams;
  readonly envelopeBars: number;
}

export type IndicatorResult =
  | { readonly ok: true; readonly frames: readonly IndicatorFrame[] }
  | { readonly ok: false; readonly reason: 'insufficient_data'; readonly required: number; readonly available: number };
