import type {
  ClosedTrade,
  ExitClass,
  ExitDecision,
  ExitTrigger,
  IndicatorFrame,
  Position,
  PriceBar,
  Side,
  Signal,
  TrailingStep,
} from '../types/index.js';
import type { EventBus } from './event-bus.js';

export interface PositionManagerConfig {
  /** 초기 손절 거리 (가격 포인트) */
  readonly stopPoints: number;
  readonly trailingSteps: readonly TrailingStep[];
  readonly contractSize: number;
  /** 반대편 envelope 밴드 도달 시 익절 */
  readonly envelopeTarget: boolean;
  /** 추세 반전 시 손익 무관 청산 */
  readonly closeOnTrendFlip: boolean;
}

export interface OpenParams {
  readonly side: Side;
  readonly entryPrice: number;
  readonly quantity: number;
  readonly margin: number;
  readonly openedAt: number;
  /** 사다리 바스켓 (자본 기준 익절/손절) */
  readonly basket?: {
    readonly equityAtOpen: number;
    readonly targetFraction: number;
    readonly stopFraction: number;
  };
}

/** 청산 판정에 쓰는 틱 컨텍스트 */
export interface ExitContext {
  readonly frame?: IndicatorFrame;
  readonly signal?: Signal;
  /** 현재 총자본 (바스켓 판정) */
  readonly equityNow?: number;
}

function sideSign(side: Side): 1 | -1 {
  return side === 'long' ? 1 : -1;
}

/** 진입가 ∓ 거리 */
export function initialStop(side: Side, entryPrice: number, stopPoints: number): number {
  return side === 'long' ? entryPrice - stopPoints : entryPrice + stopPoints;
}

/**
 * 1포지션 룰 + 단계별 손절 이동 + 청산 판정
 *
 * 평가 순서: 단계 이동 → 스톱 → 바스켓 손절 → 바스켓 익절 → envelope 익절 → 추세 반전
 * 한 틱에 청산은 최대 1회
 */
export class PositionManager {
  private position: Position | null = null;
  private readonly bus: EventBus;
  private readonly config: PositionManagerConfig;

  constructor(bus: EventBus, config: PositionManagerConfig) {
    this.bus = bus;
    this.config = config;
  }

  get hasPosition(): boolean {
    return this.position !== null;
  }

  get current(): Position | null {
    if (!this.position) return null;
    const basket = this.position.basket;
    return {
      ...this.position,
      basket: basket ? { ...basket, legs: [...basket.legs] } : undefined,
    };
  }

  open(params: OpenParams): Position {
    if (this.position) {
      throw new Error('Already in position — 1 position rule violated');
    }

    this.position = {
      side: params.side,
      entryPrice: params.entryPrice,
      quantity: params.quantity,
      stopPrice: initialStop(params.side, params.entryPrice, this.config.stopPoints),
      trailingStep: 0,
      legCount: 1,
      marginCommitted: params.margin,
      openedAt: params.openedAt,
      basket: params.basket
        ? { ...params.basket, legs: [{ price: params.entryPrice, quantity: params.quantity }] }
        : undefined,
    };

    const snapshot = this.snapshotOrThrow();
    this.bus.emit({ type: 'POSITION_OPENED', timestamp: params.openedAt, position: snapshot });
    return snapshot;
  }

  /**
   * 사다리 추가 레그: 같은 방향만, 최초 진입가는 유지
   */
  addLeg(side: Side, price: number, quantity: number, margin: number, timestamp: number): void {
    const pos = this.position;
    if (!pos) throw new Error('No position to add a leg to');
    if (pos.side !== side) {
      throw new Error(`Leg side ${side} does not match position side ${pos.side}`);
    }

    pos.quantity += quantity;
    pos.legCount++;
    pos.marginCommitted += margin;
    pos.basket?.legs.push({ price, quantity });

    this.bus.emit({ type: 'LEG_ADDED', timestamp, legCount: pos.legCount, price, quantity });
  }

  /**
   * 유리한 방향 극값으로 트레일링 단계 진행. 한 봉에 여러 단계 가능 (순서대로)
   * @returns 이번 봉에서 진행한 단계 수
   */
  advanceSteps(bar: PriceBar): number {
    const pos = this.position;
    if (!pos) return 0;

    const excursion = pos.side === 'long' ? bar.high - pos.entryPrice : pos.entryPrice - bar.low;
    let advanced = 0;

    for (;;) {
      const step = this.config.trailingSteps[pos.trailingStep];
      if (!step || excursion < step.trigger) break;

      pos.trailingStep++;
      pos.stopPrice = pos.entryPrice + sideSign(pos.side) * step.offset;
      advanced++;

      this.bus.emit({
        type: 'STEP_ADVANCED',
        timestamp: bar.timestamp,
        step: pos.trailingStep,
        stopPrice: pos.stopPrice,
      });
    }

    return advanced;
  }

  /** 역방향 극값이 스톱을 건드렸는지: 체결가는 스톱가 */
  checkStop(bar: PriceBar): ExitDecision | undefined {
    const pos = this.position;
    if (!pos) return undefined;

    const breached = pos.side === 'long' ? bar.low <= pos.stopPrice : bar.high >= pos.stopPrice;
    if (!breached) return undefined;
    return { trigger: 'STOP', price: pos.stopPrice, reason: `stop ${pos.stopPrice} hit (step ${pos.trailingStep})` };
  }

  /**
   * 봉 1개 평가: 단계 이동 후 청산 조건을 순서대로 확인
   * @returns 청산 판정 (없으면 undefined)
   */
  evaluate(bar: PriceBar, ctx: ExitContext = {}): ExitDecision | undefined {
    const pos = this.position;
    if (!pos) return undefined;

    this.advanceSteps(bar);

    const stop = this.checkStop(bar);
    if (stop) return stop;

    const basket = pos.basket;
    if (basket && ctx.equityNow !== undefined) {
      const change = ctx.equityNow - basket.equityAtOpen;
      if (change <= -basket.equityAtOpen * basket.stopFraction) {
        return { trigger: 'BASKET_STOP', price: bar.last, reason: `basket equity ${change.toFixed(2)}` };
      }
      if (change >= basket.equityAtOpen * basket.targetFraction) {
        return { trigger: 'BASKET_TARGET', price: bar.last, reason: `basket equity +${change.toFixed(2)}` };
      }
    }

    const frame = ctx.frame;
    if (this.config.envelopeTarget && frame) {
      if (pos.side === 'long' && frame.envelopeUpper !== undefined && bar.last >= frame.envelopeUpper) {
        return { trigger: 'ENVELOPE_TARGET', price: bar.last, reason: 'price reached upper band' };
      }
      if (pos.side === 'short' && frame.envelopeLower !== undefined && bar.last <= frame.envelopeLower) {
        return { trigger: 'ENVELOPE_TARGET', price: bar.last, reason: 'price reached lower band' };
      }
    }

    const signal = ctx.signal;
    if (this.config.closeOnTrendFlip && signal) {
      const against = pos.side === 'long'
        ? signal.trend === 'down' || signal.direction === 'short'
        : signal.trend === 'up' || signal.direction === 'long';
      if (against) {
        return { trigger: 'TREND_FLIP', price: bar.last, reason: `trend ${signal.trend}, signal ${signal.direction}` };
      }
    }

    return undefined;
  }

  /**
   * 미실현(청산 가정) 손익. 바스켓은 레그별 합산
   */
  pnlAt(exitPrice: number): number {
    const pos = this.position;
    if (!pos) return 0;
    const sign = sideSign(pos.side);
    const cs = this.config.contractSize;
    if (pos.basket) {
      return pos.basket.legs.reduce((sum, leg) => sum + (exitPrice - leg.price) * leg.quantity * cs * sign, 0);
    }
    return (exitPrice - pos.entryPrice) * pos.quantity * cs * sign;
  }

  /**
   * 청산 확정 처리
   * 바스켓은 equityNow가 있으면 자본 차이를 실현 손익으로 사용
   */
  close(exitPrice: number, trigger: ExitTrigger, closedAt: number, equityNow?: number): ClosedTrade {
    const pos = this.position;
    if (!pos) throw new Error('No position to close');

    const pnl = pos.basket && equityNow !== undefined
      ? equityNow - pos.basket.equityAtOpen
      : this.pnlAt(exitPrice);

    const trade: ClosedTrade = {
      side: pos.side,
      entryPrice: pos.entryPrice,
      exitPrice,
      quantity: pos.quantity,
      legCount: pos.legCount,
      pnl,
      trigger,
      classification: classifyExit(trigger, pnl),
      trailingStep: pos.trailingStep,
      openedAt: pos.openedAt,
      closedAt,
    };

    this.position = null;
    this.bus.emit({ type: 'POSITION_CLOSED', timestamp: closedAt, trade });
    return trade;
  }

  /** 거래소 수량으로 보정 (부분 체결/수동 조작) */
  syncQuantity(quantity: number): void {
    if (this.position) this.position.quantity = quantity;
  }

  /** 거래소 기준 보정: 로컬 포지션 폐기 (이벤트 없음) */
  clear(): void {
    this.position = null;
  }

  private snapshotOrThrow(): Position {
    const snap = this.current;
    if (!snap) throw new Error('No position');
    return snap;
  }
}

/**
 * 청산 분류: 실현 손익 부호 기준
 * 스톱 청산이라도 이익이면 take_profit (단계 이동 후 스톱)
 */
export function classifyExit(trigger: ExitTrigger, pnl: number): ExitClass {
  switch (trigger) {
    case 'STOP':
    case 'BASKET_STOP':
      return pnl > 0 ? 'take_profit' : 'stop_loss';
    case 'ENVELOPE_TARGET':
    case 'BASKET_TARGET':
      return 'take_profit';
    case 'TREND_FLIP':
    case 'FORCED':
      return 'signal';
  }
}
