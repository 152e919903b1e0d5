import type {
  CandleFeed,
  Equity,
  MarketMeta,
  OrderFill,
  OrderRequest,
  VenueError,
  VenueErrorKind,
  VenuePosition,
  VenueResult,
} from '../types/index.js';
import { sleep } from '../utils/sleep.js';

/**
 * 거래소 협력자: 시세, 포지션, 자본, 주문
 * 모든 호출은 VenueResult로 실패를 값으로 반환 (throw 없음)
 */
export interface Venue {
  readonly name: string;
  connect(): Promise<VenueResult<void>>;
  fetchCandles(limit: number): Promise<VenueResult<CandleFeed>>;
  fetchLastPrice(): Promise<VenueResult<number>>;
  fetchPosition(): Promise<VenueResult<VenuePosition | null>>;
  fetchEquity(): Promise<VenueResult<Equity>>;
  marketMeta(): VenueResult<MarketMeta>;
  submitOrder(req: OrderRequest): Promise<VenueResult<OrderFill>>;
}

/** 시각 + 대기: 테스트에서 교체 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

/**
 * 수동 시계 (백테스트/테스트): sleep은 시간만 진행
 */
export class ManualClock implements Clock {
  private t: number;

  constructor(start: number = 0) {
    this.t = start;
  }

  now(): number {
    return this.t;
  }

  set(t: number): void {
    this.t = t;
  }

  advance(ms: number): void {
    this.t += ms;
  }

  sleep(ms: number): Promise<void> {
    this.t += ms;
    return Promise.resolve();
  }
}

export function ok<T>(value: T): VenueResult<T> {
  return { ok: true, value };
}

export function fail<T>(kind: VenueErrorKind, message: string): VenueResult<T> {
  return { ok: false, error: { kind, message } };
}

export function describeError(error: VenueError): string {
  return `${error.kind}: ${error.message}`;
}

/**
 * 협력자 호출 시간 제한: 초과 시 transient 실패
 */
export async function withTimeout<T>(
  work: Promise<VenueResult<T>>,
  timeoutMs: number,
  label: string,
): Promise<VenueResult<T>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<VenueResult<T>>((resolve) => {
    timer = setTimeout(() => resolve(fail('transient', `${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
