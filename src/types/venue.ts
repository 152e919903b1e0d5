import type { Side } from './signal.js';

export type VenueErrorKind =
  | 'transient'            // 네트워크/타임아웃/레이트리밋: 재시도 대상
  | 'insufficient_margin'  // 증거금 부족: 수량 절반으로 재주문
  | 'below_minimum'        // 최소 주문 수량 미만
  | 'rejected'             // 거래소 거절
  | 'fatal';               // 인증/설정 오류

export interface VenueError {
  readonly kind: VenueErrorKind;
  readonly message: string;
}

export type VenueResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: VenueError };

export interface VenuePosition {
  readonly side: Side;
  readonly quantity: number;
  readonly entryPrice: number;
  readonly unrealizedPnl: number;
}

export interface Equity {
  readonly free: number;
  readonly total: number;
}

export interface OrderRequest {
  readonly side: Side;       // 포지션 방향 (청산 시에도 보유 포지션 방향)
  readonly action: 'open' | 'close';
  readonly quantity: number;
  /** 판정 기준 가격 (페이퍼/백테스트 체결가) */
  readonly referencePrice: number;
  readonly reduceOnly?: boolean;
}

export interface OrderFill {
  readonly orderId: string;
  readonly price: number;
  readonly quantity: number;
  readonly fee: number;
  readonly timestamp: number;
}
