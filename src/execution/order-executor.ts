import { createChildLogger } from '../logger.js';
import type { MarketMeta, OrderFill, Side, VenueResult } from '../types/index.js';
import { halveQty } from '../risk/position-sizer.js';
import { describeError, fail, ok, withTimeout } from '../exchange/venue.js';
import type { Clock, Venue } from '../exchange/venue.js';

const log = createChildLogger('order-executor');

export interface ExecutorConfig {
  /** transient 실패 시 추가 시도 횟수 */
  readonly transientRetries: number;
  readonly transientBackoffMs: number;
  /** 청산 후 포지션 소멸 확인 폴링 횟수/간격 */
  readonly closeConfirmRetries: number;
  readonly closeConfirmIntervalMs: number;
  readonly ioTimeoutMs: number;
}

export interface CloseOutcome {
  readonly fill: OrderFill;
  /** 폴링 횟수 (확인까지) */
  readonly polls: number;
}

/**
 * 주문 실행 + 확인
 * - transient: 고정 백오프 재시도, 소진 시 실패 반환 (틱 포기)
 * - 증거금 부족: 수량 절반씩 최소 수량까지 재주문
 * - 청산: reduce-only 주문 후 포지션 소멸까지 폴링
 */
export class OrderExecutor {
  private readonly venue: Venue;
  private readonly meta: MarketMeta;
  private readonly config: ExecutorConfig;
  private readonly clock: Clock;

  constructor(venue: Venue, meta: MarketMeta, config: ExecutorConfig, clock: Clock) {
    this.venue = venue;
    this.meta = meta;
    this.config = config;
    this.clock = clock;
  }

  /**
   * 협력자 호출: 시간 제한 + transient 재시도
   */
  async retry<T>(label: string, fn: () => Promise<VenueResult<T>>): Promise<VenueResult<T>> {
    let attempt = 0;
    for (;;) {
      const res = await withTimeout(fn(), this.config.ioTimeoutMs, label);
      if (res.ok || res.error.kind !== 'transient' || attempt >= this.config.transientRetries) {
        if (!res.ok && res.error.kind === 'transient') {
          log.warn({ label, attempts: attempt + 1, error: res.error.message }, 'Transient failure — giving up this tick');
        }
        return res;
      }
      attempt++;
      log.debug({ label, attempt, error: res.error.message }, 'Transient failure — retrying');
      await this.clock.sleep(this.config.transientBackoffMs);
    }
  }

  /**
   * 신규 진입/레그 추가. 증거금 부족이면 절반 수량으로 재시도
   */
  async open(side: Side, quantity: number, referencePrice: number): Promise<VenueResult<OrderFill>> {
    let qty = quantity;
    for (;;) {
      const res = await this.retry('submitOrder(open)', () =>
        this.venue.submitOrder({ side, action: 'open', quantity: qty, referencePrice }),
      );
      if (res.ok || res.error.kind !== 'insufficient_margin') {
        if (!res.ok) log.warn({ side, qty, error: describeError(res.error) }, 'Entry order failed');
        return res;
      }

      const next = halveQty(qty, this.meta);
      if (next <= 0) {
        log.warn({ side, lastQty: qty, minQty: this.meta.minQty }, 'Insufficient margin down to venue minimum — entry abandoned');
        return fail('insufficient_margin', `unfillable down to min qty ${this.meta.minQty}`);
      }
      log.info({ side, from: qty, to: next }, 'Insufficient margin — halving quantity');
      qty = next;
    }
  }

  /**
   * reduce-only 청산 후 거래소 포지션 소멸 확인
   * 확인 실패 시 transient 실패 (호출 측은 이전 상태 유지)
   */
  async close(side: Side, quantity: number, referencePrice: number): Promise<VenueResult<CloseOutcome>> {
    const placed = await this.retry('submitOrder(close)', () =>
      this.venue.submitOrder({ side, action: 'close', quantity, referencePrice, reduceOnly: true }),
    );
    if (!placed.ok) {
      log.warn({ side, quantity, error: describeError(placed.error) }, 'Close order failed');
      return placed;
    }

    for (let poll = 1; poll <= this.config.closeConfirmRetries; poll++) {
      const pos = await this.retry('fetchPosition(confirm)', () => this.venue.fetchPosition());
      if (pos.ok && pos.value === null) {
        return ok({ fill: placed.value, polls: poll });
      }
      if (poll < this.config.closeConfirmRetries) {
        await this.clock.sleep(this.config.closeConfirmIntervalMs);
      }
    }

    log.warn({ side, quantity, retries: this.config.closeConfirmRetries }, 'Close not confirmed');
    return fail('transient', `close not confirmed after ${this.config.closeConfirmRetries} polls`);
  }
}
