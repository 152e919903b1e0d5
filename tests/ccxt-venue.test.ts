import { describe, it, expect, vi, beforeEach } from 'vitest';

const { FakeOkx } = vi.hoisted(() => {
  /** ccxt.okx 대역: 네트워크 없음 */
  class FakeOkx {
    static last: FakeOkx | undefined;
    readonly options: Record<string, unknown>;
    sandbox = false;
    orderError: Error | undefined;
    readonly orders: unknown[][] = [];
    fetchOrderCalls = 0;

    constructor(options: Record<string, unknown>) {
      this.options = options;
      FakeOkx.last = this;
    }

    setSandboxMode(enabled: boolean): void {
      this.sandbox = enabled;
    }

    loadMarkets(): Promise<void> {
      return Promise.resolve();
    }

    market(): unknown {
      return {
        settle: 'USDT',
        contractSize: 0.01,
        precision: { amount: 0.01, price: 0.1 },
        limits: { amount: { min: 0.01 } },
      };
    }

    setLeverage(): Promise<unknown> {
      return Promise.reject(new Error('leverage not modified'));
    }

    parseTimeframe(): number {
      return 60;
    }

    fetchOHLCV(): Promise<number[][]> {
      return Promise.resolve([
        [0, 1, 1, 1, 1, 1],
        [60_000, 2, 2, 2, 2, 1],
      ]);
    }

    fetchTicker(): Promise<unknown> {
      return Promise.resolve({ last: undefined });
    }

    fetchPositions(): Promise<unknown[]> {
      return Promise.resolve([{ symbol: 'BTC/USDT:USDT', side: 'long', contracts: 3, entryPrice: 100, unrealizedPnl: 1 }]);
    }

    fetchBalance(): Promise<unknown> {
      return Promise.resolve({ USDT: { free: 50, total: 80 } });
    }

    createOrder(...args: unknown[]): Promise<unknown> {
      this.orders.push(args);
      if (this.orderError) return Promise.reject(this.orderError);
      return Promise.resolve({ id: 'ord-1', average: undefined, filled: 2, fee: { cost: 0.1 }, timestamp: 123 });
    }

    fetchOrder(): Promise<unknown> {
      this.fetchOrderCalls++;
      return Promise.resolve({ id: 'ord-1', average: 101 });
    }
  }
  return { FakeOkx };
});

vi.mock('ccxt', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ccxt')>();
  return { ...actual, okx: FakeOkx };
});

const ccxt = await import('ccxt');
const { CcxtVenue } = await import('../src/exchange/okx/ccxt-venue.js');
const { ManualClock } = await import('../src/exchange/venue.js');

function makeVenue(now: number = 0) {
  const venue = new CcxtVenue(
    {
      apiKey: 'test-key',
      secret: 'test-secret',
      password: 'test-pass',
      symbol: 'BTC/USDT:USDT',
      timeframe: '1m',
      leverage: 15,
      marginMode: 'isolated',
      sandbox: true,
      timeoutMs: 5000,
    },
    new ManualClock(now),
  );
  const fake = FakeOkx.last;
  if (!fake) throw new Error('exchange not constructed');
  return { venue, fake };
}

describe('CcxtVenue', () => {
  beforeEach(() => {
    FakeOkx.last = undefined;
  });

  it('should load market metadata on connect even if leverage is rejected', async () => {
    const { venue, fake } = makeVenue();
    expect(venue.marketMeta().ok).toBe(false);

    expect(await venue.connect()).toEqual({ ok: true, value: undefined });
    expect(venue.marketMeta()).toEqual({ ok: true, value: { tickSize: 0.1, qtyStep: 0.01, minQty: 0.01, contractSize: 0.01 } });
    expect(fake.sandbox).toBe(true);
  });

  it('should close with a reduce-only market order on the position side', async () => {
    const { venue, fake } = makeVenue();
    const res = await venue.submitOrder({ side: 'short', action: 'close', quantity: 2, referencePrice: 99 });

    expect(fake.orders[0]).toEqual([
      'BTC/USDT:USDT', 'market', 'buy', 2, undefined, { tdMode: 'isolated', posSide: 'short', reduceOnly: true },
    ]);
    // 응답에 평균가가 없으면 주문 조회 1회
    expect(fake.fetchOrderCalls).toBe(1);
    expect(res).toEqual({ ok: true, value: { orderId: 'ord-1', price: 101, quantity: 2, fee: 0.1, timestamp: 123 } });
  });

  it('should open a long with a buy order', async () => {
    const { venue, fake } = makeVenue();
    await venue.submitOrder({ side: 'long', action: 'open', quantity: 1, referencePrice: 99 });
    expect(fake.orders[0]?.[2]).toBe('buy');
    expect(fake.orders[0]?.[5]).toEqual({ tdMode: 'isolated', posSide: 'long' });
  });

  it('should classify exchange errors', async () => {
    const { venue, fake } = makeVenue();
    fake.orderError = new ccxt.InsufficientFunds('51008 insufficient balance');
    const res = await venue.submitOrder({ side: 'long', action: 'open', quantity: 1, referencePrice: 99 });
    expect(res).toEqual({ ok: false, error: { kind: 'insufficient_margin', message: '51008 insufficient balance' } });
  });

  it('should mark the newest candle as forming', async () => {
    const { venue } = makeVenue(90_000);
    const feed = await venue.fetchCandles(2);
    expect(feed.ok && feed.value.lastIsForming).toBe(true);
    expect(feed.ok && feed.value.candles.length).toBe(2);
  });

  it('should read the position, equity and ticker', async () => {
    const { venue } = makeVenue();
    await venue.connect();
    expect(await venue.fetchPosition()).toEqual({
      ok: true,
      value: { side: 'long', quantity: 3, entryPrice: 100, unrealizedPnl: 1 },
    });
    expect(await venue.fetchEquity()).toEqual({ ok: true, value: { free: 50, total: 80 } });
    expect(await venue.fetchLastPrice()).toEqual({ ok: false, error: { kind: 'transient', message: 'ticker has no last price' } });
  });
});
