import type { EnvelopeParams } from '../types/index.js';

export interface EnvelopeBands {
  readonly upper: number;
  readonly lower: number;
  readonly mid: number;
}

function gaussian(x: number, h: number): number {
  return Math.exp(-(x * x) / (2 * h * h));
}

/**
 * 가우시안 커널 회귀 envelope (non-repaint)
 *
 * 최신 마감봉 기준 offset i = 0..w-1 가중치 exp(-i²/2h²)로 mid 계산,
 * offset 1..w의 |close - mid| 평균 × multiplier 만큼 상하단.
 * closes는 오래된 봉 → 최신 마감봉 순서, 최소 w+1개 필요 (부족하면 undefined)
 */
export function kernelEnvelope(
  closes: readonly number[],
  params: EnvelopeParams,
  endIndex: number = closes.length - 1,
): EnvelopeBands | undefined {
  const { bandwidth, multiplier, window } = params;
  if (window < 1 || endIndex < window) return undefined;

  let weighted = 0;
  let den = 0;
  for (let i = 0; i < window; i++) {
    const w = gaussian(i, bandwidth);
    weighted += (closes[endIndex - i] ?? 0) * w;
    den += w;
  }
  const mid = weighted / den;

  let absErr = 0;
  for (let i = 1; i <= window; i++) {
    absErr += Math.abs((closes[endIndex - i] ?? 0) - mid);
  }
  const mae = (absErr / window) * multiplier;

  return { upper: mid + mae, lower: mid - mae, mid };
}
