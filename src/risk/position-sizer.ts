import type { LadderTier, MarketMeta, PositionSizing } from '../types/index.js';

/** 수량 스텝의 소수 자릿수 (0.001 → 3, 1e-4 → 4) */
function stepDecimals(step: number): number {
  if (!Number.isFinite(step) || step <= 0) return 0;
  const s = step.toString();
  const exp = s.match(/e-(\d+)$/);
  if (exp?.[1]) return Number(exp[1]);
  const dot = s.indexOf('.');
  return dot === -1 ? 0 : s.length - dot - 1;
}

/**
 * 거래소 수량 스텝으로 내림. 부동소수 오차 보정 후 스텝 자릿수로 고정
 */
export function roundDownToStep(qty: number, step: number): number {
  if (!(qty > 0) || !(step > 0)) return 0;
  const units = Math.floor(qty / step + 1e-9);
  return Number((units * step).toFixed(stepDecimals(step)));
}

/**
 * 스텝 내림 + 최소 주문 수량 미만이면 0 (이번 틱 진입 안 함)
 */
export function normalizeQty(rawQty: number, meta: MarketMeta): number {
  const qty = roundDownToStep(rawQty, meta.qtyStep);
  return qty >= meta.minQty && qty > 0 ? qty : 0;
}

/** 명목가 → 계약 수량 */
export function qtyFromNotional(notional: number, price: number, meta: MarketMeta): number {
  if (notional <= 0 || price <= 0 || meta.contractSize <= 0) return 0;
  return normalizeQty(notional / (price * meta.contractSize), meta);
}

function reject(reason: string, notional: number = 0): PositionSizing {
  return { qty: 0, notional, margin: 0, reason };
}

/**
 * 리스크 비율 사이징
 *
 * 손절 거리 비율 = |entry - stop| / entry
 * 명목가 = equity × riskFraction / 손절거리비율
 * 수량 = 명목가 / (entry × contractSize)
 */
export function sizeByRiskFraction(params: {
  equity: number;
  riskFraction: number;
  entryPrice: number;
  stopPrice: number;
  leverage: number;
  meta: MarketMeta;
}): PositionSizing {
  const { equity, riskFraction, entryPrice, stopPrice, leverage, meta } = params;
  if (entryPrice <= 0 || equity <= 0) return reject('no equity or price');

  const stopDistanceFraction = Math.abs(entryPrice - stopPrice) / entryPrice;
  if (stopDistanceFraction <= 0) return reject('zero stop distance');

  const notional = (equity * riskFraction) / stopDistanceFraction;
  const qty = qtyFromNotional(notional, entryPrice, meta);
  if (qty <= 0) return reject('below venue minimum', notional);

  return { qty, notional, margin: notional / leverage };
}

/**
 * 증거금 비율 사이징: 가용 자본 × marginFraction을 증거금으로, × leverage 명목가
 */
export function sizeByMarginFraction(params: {
  freeEquity: number;
  marginFraction: number;
  leverage: number;
  price: number;
  meta: MarketMeta;
}): PositionSizing {
  const margin = Math.max(0, params.freeEquity * params.marginFraction);
  if (margin <= 0) return reject('no free margin');

  const notional = margin * params.leverage;
  const qty = qtyFromNotional(notional, params.price, params.meta);
  if (qty <= 0) return reject('below venue minimum', notional);

  return { qty, notional, margin };
}

/**
 * 현재 자본에 해당하는 사다리 구간 (minEquity <= equity 중 가장 높은 것)
 * 첫 구간 미만이면 undefined
 */
export function resolveLadderTier(tiers: readonly LadderTier[], equity: number): LadderTier | undefined {
  let found: LadderTier | undefined;
  for (const tier of tiers) {
    if (equity >= tier.minEquity) found = tier;
  }
  return found;
}

/**
 * 사다리 레그 사이징: 매 틱 현재 자본으로 구간 재평가.
 * legCount >= maxLegs이면 추가 주문 없음 (기존 레그는 그대로)
 */
export function sizeLadderLeg(params: {
  equity: number;
  price: number;
  legCount: number;
  leverage: number;
  tiers: readonly LadderTier[];
  meta: MarketMeta;
}): PositionSizing & { readonly tier?: LadderTier } {
  const tier = resolveLadderTier(params.tiers, params.equity);
  if (!tier) return reject('equity below first ladder tier');
  if (params.legCount >= tier.maxLegs) {
    return { ...reject(`max legs reached (${params.legCount}/${tier.maxLegs})`), tier };
  }

  const qty = qtyFromNotional(tier.legNotional, params.price, params.meta);
  if (qty <= 0) return { ...reject('below venue minimum', tier.legNotional), tier };

  return { qty, notional: tier.legNotional, margin: tier.legNotional / params.leverage, tier };
}

/** 증거금 부족 시 절반 수량 (스텝 내림, 최소 수량 미만이면 0) */
export function halveQty(qty: number, meta: MarketMeta): number {
  return normalizeQty(qty / 2, meta);
}
