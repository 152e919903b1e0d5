import type { Candle, CandleFeed, MarketMeta, Side, VenuePosition } from '../../types/index.js';

/** ccxt OHLCV 행 [ts, o, h, l, c, v] */
export type OhlcvRow = ReadonlyArray<number | undefined>;

/**
 * OHLCV → CandleFeed. 값이 빠진 행은 버림.
 * 마지막 봉 종료 시각이 now 이후면 진행 중인 봉
 */
export function toCandleFeed(rows: readonly OhlcvRow[], timeframeMs: number, now: number): CandleFeed {
  const candles: Candle[] = [];
  for (const row of rows) {
    const [timestamp, open, high, low, close, volume] = row;
    if (
      timestamp === undefined || open === undefined || high === undefined ||
      low === undefined || close === undefined
    ) {
      continue;
    }
    candles.push({ timestamp, open, high, low, close, volume });
  }
  candles.sort((a, b) => a.timestamp - b.timestamp);

  const last = candles[candles.length - 1];
  const lastIsForming = last !== undefined && last.timestamp + timeframeMs > now;
  return { candles, lastIsForming };
}

export interface RawPosition {
  readonly symbol?: string;
  readonly side?: string;
  readonly contracts?: number;
  readonly entryPrice?: number;
  readonly unrealizedPnl?: number;
}

/** 해당 심볼의 0이 아닌 포지션 1개 (없으면 null) */
export function pickPosition(positions: readonly RawPosition[], symbol: string): VenuePosition | null {
  for (const p of positions) {
    if (p.symbol !== symbol) continue;
    const quantity = Math.abs(Number(p.contracts ?? 0));
    if (!(quantity > 0)) continue;
    const side: Side | undefined = p.side === 'long' ? 'long' : p.side === 'short' ? 'short' : undefined;
    if (!side) continue;
    return {
      side,
      quantity,
      entryPrice: Number(p.entryPrice ?? 0),
      unrealizedPnl: Number(p.unrealizedPnl ?? 0),
    };
  }
  return null;
}

export interface RawMarket {
  readonly contractSize?: number;
  readonly precision: { readonly amount?: number; readonly price?: number };
  readonly limits: { readonly amount?: { readonly min?: number } };
}

/**
 * 마켓 메타: OKX는 TICK_SIZE 정밀도 모드라 precision 값이 곧 스텝
 * 필수 값이 없으면 undefined (시작 시 치명 오류)
 */
export function toMarketMeta(market: RawMarket): MarketMeta | undefined {
  const qtyStep = market.precision.amount;
  const tickSize = market.precision.price;
  if (!qtyStep || !tickSize) return undefined;
  return {
    tickSize,
    qtyStep,
    minQty: market.limits.amount?.min ?? qtyStep,
    contractSize: market.contractSize ?? 1,
  };
}
