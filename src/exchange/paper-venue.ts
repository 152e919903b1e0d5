import { createChildLogger } from '../logger.js';
import type {
  CandleFeed,
  Equity,
  MarketMeta,
  OrderFill,
  OrderRequest,
  Side,
  VenuePosition,
  VenueResult,
} from '../types/index.js';
import { fail, ok, systemClock } from './venue.js';
import type { Clock, Venue } from './venue.js';

const log = createChildLogger('paper-venue');

/** 시세 공급원 (실시간 거래소 또는 리플레이) */
export interface MarketSource {
  fetchCandles(limit: number): Promise<VenueResult<CandleFeed>>;
  fetchLastPrice(): Promise<VenueResult<number>>;
}

export interface PaperVenueConfig {
  readonly initialEquity: number;
  readonly feeRate: number;        // 0.0005 = 0.05%
  readonly slippageBps: number;    // 불리한 방향 슬리피지 bps
  readonly leverage: number;
  readonly meta: MarketMeta;
}

const DEFAULT_CONFIG: Omit<PaperVenueConfig, 'meta'> = {
  initialEquity: 1000,
  feeRate: 0.0005,
  slippageBps: 0,
  leverage: 15,
};

interface PaperPosition {
  side: Side;
  quantity: number;
  entryPrice: number;
  margin: number;
}

/**
 * 모의 거래소: 시세는 공급원에서, 주문은 기준가(+슬리피지)로 즉시 체결
 * 순포지션 1개, 격리 증거금 = 명목가 / 레버리지
 */
export class PaperVenue implements Venue {
  readonly name = 'paper';
  private readonly market: MarketSource;
  private readonly config: PaperVenueConfig;
  private readonly clock: Clock;

  private cash: number;
  private position: PaperPosition | null = null;
  private lastPrice = 0;
  private orderSeq = 0;
  private feesPaid = 0;

  constructor(
    market: MarketSource,
    config: Partial<Omit<PaperVenueConfig, 'meta'>> & { meta: MarketMeta },
    clock: Clock = systemClock,
  ) {
    this.market = market;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.clock = clock;
    this.cash = this.config.initialEquity;
  }

  connect(): Promise<VenueResult<void>> {
    log.info({ initialEquity: this.config.initialEquity, leverage: this.config.leverage }, 'Paper venue ready');
    return Promise.resolve(ok(undefined));
  }

  marketMeta(): VenueResult<MarketMeta> {
    return ok(this.config.meta);
  }

  fetchCandles(limit: number): Promise<VenueResult<CandleFeed>> {
    return this.market.fetchCandles(limit);
  }

  async fetchLastPrice(): Promise<VenueResult<number>> {
    const res = await this.market.fetchLastPrice();
    if (res.ok) this.lastPrice = res.value;
    return res;
  }

  fetchPosition(): Promise<VenueResult<VenuePosition | null>> {
    const pos = this.position;
    if (!pos) return Promise.resolve(ok(null));
    return Promise.resolve(ok({
      side: pos.side,
      quantity: pos.quantity,
      entryPrice: pos.entryPrice,
      unrealizedPnl: this.unrealized(this.lastPrice || pos.entryPrice),
    }));
  }

  fetchEquity(): Promise<VenueResult<Equity>> {
    return Promise.resolve(ok(this.equity()));
  }

  /** 현재 자본 (동기): 백테스트 자본 곡선용 */
  equity(markPrice: number = this.lastPrice): Equity {
    const unrealized = this.position ? this.unrealized(markPrice || this.position.entryPrice) : 0;
    const total = this.cash + unrealized;
    const used = this.position?.margin ?? 0;
    return { free: Math.max(0, total - used), total };
  }

  get totalFees(): number {
    return this.feesPaid;
  }

  /** 마크 가격 갱신 (백테스트 봉 진행) */
  mark(price: number): void {
    this.lastPrice = price;
  }

  submitOrder(req: OrderRequest): Promise<VenueResult<OrderFill>> {
    return Promise.resolve(req.action === 'open' ? this.open(req) : this.close(req));
  }

  private open(req: OrderRequest): VenueResult<OrderFill> {
    const { meta, leverage, feeRate } = this.config;
    if (req.quantity < meta.minQty || req.quantity <= 0) {
      return fail('below_minimum', `qty ${req.quantity} < min ${meta.minQty}`);
    }
    if (this.position && this.position.side !== req.side) {
      return fail('rejected', `opposite position open (${this.position.side})`);
    }

    const price = this.slipped(req.referencePrice, req.side === 'long');
    const notional = req.quantity * price * meta.contractSize;
    const margin = notional / leverage;
    const fee = notional * feeRate;
    const { free } = this.equity(price);
    if (margin + fee > free) {
      return fail('insufficient_margin', `margin ${margin.toFixed(2)} + fee ${fee.toFixed(2)} > free ${free.toFixed(2)}`);
    }

    this.cash -= fee;
    this.feesPaid += fee;
    this.lastPrice = price;

    const pos = this.position;
    if (pos) {
      const qty = pos.quantity + req.quantity;
      pos.entryPrice = (pos.entryPrice * pos.quantity + price * req.quantity) / qty;
      pos.quantity = qty;
      pos.margin += margin;
    } else {
      this.position = { side: req.side, quantity: req.quantity, entryPrice: price, margin };
    }

    return ok(this.fill(price, req.quantity, fee));
  }

  private close(req: OrderRequest): VenueResult<OrderFill> {
    const pos = this.position;
    if (!pos || pos.side !== req.side) {
      return fail('rejected', 'no position to reduce');
    }

    const qty = Math.min(req.quantity, pos.quantity);
    const price = this.slipped(req.referencePrice, req.side === 'short');
    const sign = pos.side === 'long' ? 1 : -1;
    const cs = this.config.meta.contractSize;
    const fee = qty * price * cs * this.config.feeRate;
    const realized = (price - pos.entryPrice) * qty * cs * sign;

    this.cash += realized - fee;
    this.feesPaid += fee;
    this.lastPrice = price;

    const remaining = pos.quantity - qty;
    if (remaining <= 1e-12) {
      this.position = null;
    } else {
      pos.margin *= remaining / pos.quantity;
      pos.quantity = remaining;
    }

    return ok(this.fill(price, qty, fee));
  }

  private slipped(price: number, buying: boolean): number {
    const slip = price * (this.config.slippageBps / 10000);
    return buying ? price + slip : price - slip;
  }

  private unrealized(markPrice: number): number {
    const pos = this.position;
    if (!pos) return 0;
    const sign = pos.side === 'long' ? 1 : -1;
    return (markPrice - pos.entryPrice) * pos.quantity * this.config.meta.contractSize * sign;
  }

  private fill(price: number, quantity: number, fee: number): OrderFill {
    this.orderSeq++;
    return { orderId: `paper-${this.orderSeq}`, price, quantity, fee, timestamp: this.clock.now() };
  }
}
