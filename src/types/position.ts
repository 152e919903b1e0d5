import type { Side } from './signal.js';

export interface BasketLeg {
  readonly price: number;
  readonly quantity: number;
}

/**
 * 사다리 바스켓: 전 레그 일괄 청산, 손익은 자본 차이로 계산
 */
export interface Basket {
  readonly equityAtOpen: number;
  readonly targetFraction: number;
  readonly stopFraction: number;
  legs: BasketLeg[];
}

export interface Position {
  readonly side: Side;
  /** 최초 진입가: 레그 추가 시에도 변경 없음 (평단은 거래소 기준) */
  readonly entryPrice: number;
  quantity: number;
  stopPrice: number;
  trailingStep: number;
  legCount: number;
  marginCommitted: number;
  readonly openedAt: number;      // Unix ms
  readonly basket?: Basket;
}

export type PositionPhase =
  | 'FLAT'            // 대기
  | 'ENTRY_PENDING'   // 진입 주문 확인 대기
  | 'OPEN'            // 포지션 보유 (trailingStep은 Position에)
  | 'EXIT_PENDING'    // 청산 확인 대기
  | 'LOCKED';         // 손절 후 잠금: envelope 안쪽 마감 시 해제

export type ExitTrigger =
  | 'STOP'            // 손절/트레일링 스톱 (봉 역방향 극값)
  | 'ENVELOPE_TARGET'
  | 'BASKET_TARGET'
  | 'BASKET_STOP'
  | 'TREND_FLIP'
  | 'FORCED';         // 종료/백테스트 마감 시 일괄 청산

/** 실현 손익 부호 기준 분류 */
export type ExitClass = 'take_profit' | 'stop_loss' | 'signal';

export interface ExitDecision {
  readonly trigger: ExitTrigger;
  /** 판정 가격: 스톱은 스톱가 그대로 */
  readonly price: number;
  readonly reason: string;
}

export interface ClosedTrade {
  readonly side: Side;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly quantity: number;
  readonly legCount: number;
  readonly pnl: number;
  readonly trigger: ExitTrigger;
  readonly classification: ExitClass;
  readonly trailingStep: number;
  readonly openedAt: number;
  readonly closedAt: number;
}

/** 트레일링 단계: 유리한 이동폭 trigger 도달 시 손절가 = 진입가 ± offset */
export interface TrailingStep {
  readonly trigger: number;
  readonly offset: number;
}
