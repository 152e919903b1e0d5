export type Side = 'long' | 'short';
export type SignalDirection = Side | 'none';
export type Trend = 'up' | 'down' | 'none';
export type StrategyVariant = 'crossover' | 'envelope_touch' | 'extension_reversion';

export interface Signal {
  readonly direction: SignalDirection;
  readonly variant: StrategyVariant;
  /** 현재 EMA 추세: 추세 반전 강제청산 판단용 */
  readonly trend: Trend;
  readonly reason?: string;      // 디버그용
}
