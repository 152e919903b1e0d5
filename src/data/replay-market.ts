import type { Candle, CandleFeed, VenueResult } from '../types/index.js';
import type { MarketSource } from '../exchange/paper-venue.js';
import { fail, ok } from '../exchange/venue.js';

/**
 * 과거 캔들 리플레이: cursor 위치의 봉을 진행 중인 봉으로 노출
 * 현재가 = 해당 봉 종가
 */
export class ReplayMarket implements MarketSource {
  private readonly candles: readonly Candle[];
  private cursor = 0;

  constructor(candles: readonly Candle[]) {
    this.candles = candles;
  }

  get length(): number {
    return this.candles.length;
  }

  get position(): number {
    return this.cursor;
  }

  get current(): Candle | undefined {
    return this.candles[this.cursor];
  }

  seek(index: number): void {
    this.cursor = Math.max(0, Math.min(index, this.candles.length - 1));
  }

  fetchCandles(limit: number): Promise<VenueResult<CandleFeed>> {
    const end = this.cursor + 1;
    const start = Math.max(0, end - limit);
    return Promise.resolve(ok({ candles: this.candles.slice(start, end), lastIsForming: true }));
  }

  fetchLastPrice(): Promise<VenueResult<number>> {
    const c = this.current;
    return Promise.resolve(c ? ok(c.close) : fail('transient', 'no candle at cursor'));
  }
}
