import * as ccxt from 'ccxt';
import { createChildLogger } from '../../logger.js';
import type {
  CandleFeed,
  Equity,
  MarketMeta,
  OrderFill,
  OrderRequest,
  VenuePosition,
  VenueResult,
} from '../../types/index.js';
import { fail, ok, systemClock, withTimeout } from '../venue.js';
import type { Clock, Venue } from '../venue.js';
import { classifyCcxtError } from './errors.js';
import { pickPosition, toCandleFeed, toMarketMeta } from './mappers.js';

const log = createChildLogger('okx-venue');

export interface CcxtVenueConfig {
  readonly apiKey: string;
  readonly secret: string;
  readonly password: string;
  /** ccxt 통합 심볼 (예: BTC/USDT:USDT) */
  readonly symbol: string;
  readonly timeframe: string;
  readonly leverage: number;
  readonly marginMode: 'isolated' | 'cross';
  readonly sandbox: boolean;
  readonly timeoutMs: number;
}

/**
 * OKX USDT 무기한 스왑: ccxt 경유
 * - 연결 시 마켓 로드 + 레버리지/마진 모드 설정
 * - 시장가 주문: tdMode + posSide (헤지 모드), 청산은 reduceOnly
 */
export class CcxtVenue implements Venue {
  readonly name = 'okx';
  private readonly exchange: ccxt.okx;
  private readonly cfg: CcxtVenueConfig;
  private readonly clock: Clock;
  private meta: MarketMeta | undefined;
  private settleCurrency = 'USDT';

  constructor(cfg: CcxtVenueConfig, clock: Clock = systemClock) {
    this.cfg = cfg;
    this.clock = clock;
    this.exchange = new ccxt.okx({
      apiKey: cfg.apiKey,
      secret: cfg.secret,
      password: cfg.password,
      enableRateLimit: true,
      timeout: cfg.timeoutMs,
      options: { defaultType: 'swap' },
    });
    if (cfg.sandbox) {
      this.exchange.setSandboxMode(true);
    }
  }

  async connect(): Promise<VenueResult<void>> {
    const loaded = await this.call('loadMarkets', async () => {
      await this.exchange.loadMarkets();
      return this.exchange.market(this.cfg.symbol);
    });
    if (!loaded.ok) return loaded;

    const market = loaded.value;
    this.meta = toMarketMeta(market);
    this.settleCurrency = market.settle ?? 'USDT';
    if (!this.meta) {
      return fail('fatal', `market metadata incomplete for ${this.cfg.symbol}`);
    }

    // 이미 같은 값이거나 포지션 보유 중이면 거래소가 거절: 경고만
    const lev = await this.call('setLeverage', () =>
      this.exchange.setLeverage(this.cfg.leverage, this.cfg.symbol, { mgnMode: this.cfg.marginMode }),
    );
    if (!lev.ok) {
      log.warn({ error: lev.error }, 'setLeverage failed — continuing with account setting');
    }

    log.info({ symbol: this.cfg.symbol, meta: this.meta, sandbox: this.cfg.sandbox }, 'OKX venue connected');
    return ok(undefined);
  }

  marketMeta(): VenueResult<MarketMeta> {
    return this.meta ? ok(this.meta) : fail('fatal', 'market metadata not loaded (connect first)');
  }

  fetchCandles(limit: number): Promise<VenueResult<CandleFeed>> {
    return this.call('fetchOHLCV', async () => {
      const rows = await this.exchange.fetchOHLCV(this.cfg.symbol, this.cfg.timeframe, undefined, limit);
      const tfMs = this.exchange.parseTimeframe(this.cfg.timeframe) * 1000;
      return toCandleFeed(rows, tfMs, this.clock.now());
    });
  }

  async fetchLastPrice(): Promise<VenueResult<number>> {
    const res = await this.call('fetchTicker', () => this.exchange.fetchTicker(this.cfg.symbol));
    if (!res.ok) return res;
    const last = res.value.last;
    if (last === undefined || !(last > 0)) {
      return fail('transient', 'ticker has no last price');
    }
    return ok(last);
  }

  fetchPosition(): Promise<VenueResult<VenuePosition | null>> {
    return this.call('fetchPositions', async () => {
      const positions = await this.exchange.fetchPositions([this.cfg.symbol]);
      return pickPosition(positions, this.cfg.symbol);
    });
  }

  fetchEquity(): Promise<VenueResult<Equity>> {
    return this.call('fetchBalance', async () => {
      const balance = await this.exchange.fetchBalance({ type: 'swap' });
      const entry = balance[this.settleCurrency];
      return {
        free: Math.max(0, Number(entry?.free ?? 0)),
        total: Number(entry?.total ?? 0),
      };
    });
  }

  async submitOrder(req: OrderRequest): Promise<VenueResult<OrderFill>> {
    // 진입: long→buy, short→sell / 청산: 반대
    const buy = req.action === 'open' ? req.side === 'long' : req.side === 'short';
    const params: Record<string, string | boolean> = {
      tdMode: this.cfg.marginMode,
      posSide: req.side,
    };
    if (req.action === 'close' || req.reduceOnly) {
      params['reduceOnly'] = true;
    }

    const placed = await this.call('createOrder', () =>
      this.exchange.createOrder(this.cfg.symbol, 'market', buy ? 'buy' : 'sell', req.quantity, undefined, params),
    );
    if (!placed.ok) return placed;

    const order = placed.value;
    let price = order.average;
    if (price === undefined && order.id) {
      // OKX 시장가 응답에는 체결가가 없음: 1회 조회
      const fetched = await this.call('fetchOrder', () => this.exchange.fetchOrder(order.id, this.cfg.symbol));
      if (fetched.ok) price = fetched.value.average;
    }

    const fill: OrderFill = {
      orderId: order.id,
      price: price ?? req.referencePrice,
      quantity: order.filled ?? req.quantity,
      fee: order.fee?.cost ?? 0,
      timestamp: order.timestamp ?? this.clock.now(),
    };
    log.info({ action: req.action, side: req.side, fill }, 'Order filled');
    return ok(fill);
  }

  /** ccxt 호출 공통: 시간 제한 + 예외 분류 */
  private call<T>(label: string, fn: () => Promise<T>): Promise<VenueResult<T>> {
    const work = fn().then(
      (value): VenueResult<T> => ok(value),
      (err: unknown): VenueResult<T> => {
        const error = classifyCcxtError(err);
        log.warn({ label, kind: error.kind, message: error.message }, 'OKX call failed');
        return { ok: false, error };
      },
    );
    return withTimeout(work, this.cfg.timeoutMs, label);
  }
}
