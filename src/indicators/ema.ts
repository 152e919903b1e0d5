/**
 * Exponential Moving Average
 * 시드 = 처음 period개 종가의 단순평균, 이후 e = v·k + e·(1-k)
 */
export class EMA {
  private readonly period: number;
  private readonly multiplier: number;
  private current: number = 0;
  private count: number = 0;
  private sum: number = 0;
  private ready: boolean = false;

  constructor(period: number) {
    if (period < 1) throw new Error('EMA period must be >= 1');
    this.period = period;
    this.multiplier = 2 / (period + 1);
  }

  update(value: number): number | undefined {
    if (!this.ready) {
      this.sum += value;
      this.count++;
      if (this.count === this.period) {
        this.current = this.sum / this.period;
        this.ready = true;
      }
    } else {
      this.current = (value - this.current) * this.multiplier + this.current;
    }
    return this.value;
  }

  /** 시드 전에는 undefined */
  get value(): number | undefined {
    return this.ready ? this.current : undefined;
  }

  get isReady(): boolean { return this.ready; }
}

export function emaSeries(values: readonly number[], period: number): Array<number | undefined> {
  const ema = new EMA(period);
  return values.map((v) => ema.update(v));
}
