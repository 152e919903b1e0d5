import { fail, ok } from '../src/exchange/venue.js';
import type { Venue } from '../src/exchange/venue.js';
import type { MarketSource } from '../src/exchange/paper-venue.js';
import type {
  Candle,
  CandleFeed,
  Equity,
  MarketMeta,
  OrderFill,
  OrderRequest,
  VenuePosition,
  VenueResult,
} from '../src/types/index.js';

export const TF_MS = 60_000;

export function flatCandle(index: number, close: number = 100): Candle {
  return { timestamp: index * TF_MS, open: close, high: close, low: close, close, volume: 1 };
}

/**
 * 테스트용 시세: 마감봉 + (선택) 진행 중인 봉
 */
export class ScriptedMarket implements MarketSource {
  closed: Candle[] = [];
  forming: Candle | undefined;
  last = 100;
  failWith: 'transient' | undefined;
  limits: number[] = [];

  fetchCandles(limit: number): Promise<VenueResult<CandleFeed>> {
    this.limits.push(limit);
    if (this.failWith) return Promise.resolve(fail(this.failWith, 'feed down'));
    const candles = this.forming ? [...this.closed, this.forming] : [...this.closed];
    return Promise.resolve(ok({ candles, lastIsForming: this.forming !== undefined }));
  }

  fetchLastPrice(): Promise<VenueResult<number>> {
    return Promise.resolve(ok(this.last));
  }
}

/**
 * 주문/포지션 응답을 순서대로 돌려주는 거래소: 큐가 비면 성공
 */
export class ScriptedVenue implements Venue {
  readonly name = 'scripted';
  readonly orders: OrderRequest[] = [];
  readonly orderResults: Array<VenueResult<OrderFill>> = [];
  readonly positionResults: Array<VenueResult<VenuePosition | null>> = [];
  positionCalls = 0;

  constructor(private readonly meta: MarketMeta) {}

  connect(): Promise<VenueResult<void>> {
    return Promise.resolve(ok(undefined));
  }

  fetchCandles(): Promise<VenueResult<CandleFeed>> {
    return Promise.resolve(ok({ candles: [], lastIsForming: false }));
  }

  fetchLastPrice(): Promise<VenueResult<number>> {
    return Promise.resolve(ok(100));
  }

  fetchPosition(): Promise<VenueResult<VenuePosition | null>> {
    this.positionCalls++;
    return Promise.resolve(this.positionResults.shift() ?? ok(null));
  }

  fetchEquity(): Promise<VenueResult<Equity>> {
    return Promise.resolve(ok({ free: 1000, total: 1000 }));
  }

  marketMeta(): VenueResult<MarketMeta> {
    return ok(this.meta);
  }

  submitOrder(req: OrderRequest): Promise<VenueResult<OrderFill>> {
    this.orders.push(req);
    const scripted = this.orderResults.shift();
    return Promise.resolve(scripted ?? ok({
      orderId: `o-${this.orders.length}`,
      price: req.referencePrice,
      quantity: req.quantity,
      fee: 0,
      timestamp: 0,
    }));
  }
}
