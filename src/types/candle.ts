export interface Candle {
  readonly timestamp: number;   // 봉 시작 시각 Unix ms
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume?: number;
}

/**
 * 가격 피드 응답: 오래된 봉부터. lastIsForming이면 마지막 봉은 아직 마감 전
 */
export interface CandleFeed {
  readonly candles: readonly Candle[];
  readonly lastIsForming: boolean;
}

/** 한 틱에서 포지션 평가에 쓰는 가격 범위 (라이브: 현재가 1점, 백테스트: 봉 전체) */
export interface PriceBar {
  readonly timestamp: number;
  readonly high: number;
  readonly low: number;
  readonly last: number;
}
