import { createChildLogger } from '../logger.js';
import type { AppConfig } from '../config.js';
import type {
  Candle,
  ClosedTrade,
  Equity,
  ExitTrigger,
  IndicatorFrame,
  MarketMeta,
  PositionSizing,
  PriceBar,
  Side,
  Signal,
  VenuePosition,
} from '../types/index.js';
import type { Clock, Venue } from '../exchange/venue.js';
import type { IndicatorEngine } from '../indicators/engine.js';
import type { Strategy } from '../strategy/strategy.js';
import { detectPullback } from '../strategy/trend.js';
import type { DailyAccounting } from '../risk/daily-accounting.js';
import { PositionStateMachine } from '../risk/state-machine.js';
import { sizeByMarginFraction, sizeByRiskFraction, sizeLadderLeg } from '../risk/position-sizer.js';
import type { OrderExecutor } from '../execution/order-executor.js';
import type { EventBus } from './event-bus.js';
import { PositionManager, initialStop } from './position-manager.js';

const log = createChildLogger('trading-engine');

export interface TradingEngineConfig {
  readonly historyBars: number;
  readonly leverage: number;
  readonly position: AppConfig['position'];
  readonly sizing: AppConfig['sizing'];
  /**
   * 틱 가격 범위 출처
   * ticker: 현재가 1점 (라이브), forming_candle: 진행 중 봉 고가/저가/종가 (백테스트)
   */
  readonly priceSource: 'ticker' | 'forming_candle';
}

/** 청산 주문은 나갔으나 포지션 소멸 미확인 */
export interface PendingExit {
  readonly trigger: ExitTrigger;
  readonly price: number;
  readonly barTs: number;
  readonly reason: string;
}

/** 엔진의 모든 가변 상태 */
export interface EngineState {
  readonly machine: PositionStateMachine;
  readonly positions: PositionManager;
  /** 손절 잠금 시점의 최신 마감봉 시각 */
  lockBarTs: number | null;
  /** 마지막 청산 시점의 최신 마감봉 시각 (쿨다운 기준) */
  lastExitBarTs: number | null;
  /** 미확인 청산: 다음 동기화에서 거래소가 비어 있으면 이 기록으로 청산 확정 */
  pendingExit: PendingExit | null;
  lastSignal: Signal | null;
  cycles: number;
}

export type CycleStatus =
  | 'abandoned'          // transient 실패: 다음 틱
  | 'insufficient_data'
  | 'locked'
  | 'unlocked'
  | 'holding'
  | 'exited'
  | 'exit_unconfirmed'
  | 'leg_added'
  | 'idle'
  | 'halted'
  | 'cooldown'
  | 'no_size'
  | 'entry_failed'
  | 'entered';

export interface CycleResult {
  readonly status: CycleStatus;
  readonly reason?: string;
  readonly trade?: ClosedTrade;
}

interface TickContext {
  readonly now: number;
  readonly closed: readonly Candle[];
  readonly frames: readonly IndicatorFrame[];
  readonly latest: Candle;
  readonly frame: IndicatorFrame;
  readonly bar: PriceBar;
  readonly signal: Signal;
}

export interface TradingEngineDeps {
  readonly venue: Venue;
  readonly meta: MarketMeta;
  readonly indicators: IndicatorEngine;
  readonly strategy: Strategy;
  readonly accounting: DailyAccounting;
  readonly executor: OrderExecutor;
  readonly bus: EventBus;
  readonly clock: Clock;
}

/**
 * 의사결정 사이클 1회:
 * 롤오버 → 캔들(진행 봉 제외) → 인디케이터 → 거래소 포지션 동기화
 * → 잠금 해제 확인 → 보유 포지션 관리 → 신규 진입
 */
export class TradingEngine {
  readonly state: EngineState;
  private readonly config: TradingEngineConfig;
  private readonly deps: TradingEngineDeps;

  constructor(config: TradingEngineConfig, deps: TradingEngineDeps) {
    this.config = config;
    this.deps = deps;
    this.state = {
      machine: new PositionStateMachine(() => deps.clock.now()),
      positions: new PositionManager(deps.bus, {
        stopPoints: config.position.stopPoints,
        trailingSteps: config.position.trailingSteps,
        contractSize: deps.meta.contractSize,
        envelopeTarget: config.position.envelopeTarget,
        closeOnTrendFlip: config.position.closeOnTrendFlip,
      }),
      lockBarTs: null,
      lastExitBarTs: null,
      pendingExit: null,
      lastSignal: null,
      cycles: 0,
    };
  }

  /**
   * 기동 시 거래소 포지션과 맞춤
   */
  async reconcile(): Promise<CycleResult | null> {
    const venuePos = await this.deps.executor.retry('fetchPosition', () => this.deps.venue.fetchPosition());
    if (!venuePos.ok) {
      return { status: 'abandoned', reason: venuePos.error.message };
    }
    this.syncWithVenue(venuePos.value, this.deps.clock.now());
    return null;
  }

  async runCycle(): Promise<CycleResult> {
    this.state.cycles++;
    const { venue, executor, accounting, bus, clock } = this.deps;
    const now = clock.now();

    const previous = accounting.rollIfNewDay(now);
    if (previous) {
      bus.emit({ type: 'DAY_ROLLOVER', timestamp: now, stats: previous });
    }

    const feed = await executor.retry('fetchCandles', () => venue.fetchCandles(this.config.historyBars));
    if (!feed.ok) return { status: 'abandoned', reason: feed.error.message };

    const all = feed.value.candles;
    const closed = feed.value.lastIsForming ? all.slice(0, -1) : all;
    const forming = feed.value.lastIsForming ? all[all.length - 1] : undefined;

    const computed = this.deps.indicators.compute(closed);
    if (!computed.ok) {
      log.debug({ required: computed.required, available: computed.available }, 'Insufficient history');
      return { status: 'insufficient_data' };
    }
    const frames = computed.frames;
    const latest = closed[closed.length - 1];
    const frame = frames[frames.length - 1];
    if (!latest || !frame) return { status: 'insufficient_data' };

    const bar = await this.priceBar(forming, now);
    if (!bar.ok) return { status: 'abandoned', reason: bar.reason };

    const signal = this.deps.strategy.evaluate({ candles: closed, frames }, bar.value.last);
    this.state.lastSignal = signal;

    const venuePos = await executor.retry('fetchPosition', () => venue.fetchPosition());
    if (!venuePos.ok) return { status: 'abandoned', reason: venuePos.error.message };

    const pending = this.state.pendingExit;
    if (pending && venuePos.value === null && this.state.positions.current) {
      // 늦게 확인된 청산: 이번 틱은 진입하지 않음
      log.info({ trigger: pending.trigger }, 'Pending close confirmed by venue');
      this.state.machine.transition('EXIT_PENDING');
      return this.settleExit(now, pending.barTs, pending.trigger, pending.price, pending.reason);
    }
    this.syncWithVenue(venuePos.value, now);

    const ctx: TickContext = { now, closed, frames, latest, frame, bar: bar.value, signal };

    if (this.state.machine.isLocked()) {
      return this.checkUnlock(ctx);
    }
    if (this.state.machine.isOpen()) {
      return this.manageOpen(ctx);
    }
    return this.tryEnter(ctx);
  }

  private async priceBar(
    forming: Candle | undefined,
    now: number,
  ): Promise<{ ok: true; value: PriceBar } | { ok: false; reason: string }> {
    if (this.config.priceSource === 'forming_candle' && forming) {
      return {
        ok: true,
        value: { timestamp: forming.timestamp, high: forming.high, low: forming.low, last: forming.close },
      };
    }
    const last = await this.deps.executor.retry('fetchLastPrice', () => this.deps.venue.fetchLastPrice());
    if (!last.ok) return { ok: false, reason: last.error.message };
    return { ok: true, value: { timestamp: now, high: last.value, low: last.value, last: last.value } };
  }

  /**
   * 로컬 상태를 거래소 기준으로 보정
   */
  private syncWithVenue(venuePos: VenuePosition | null, now: number): void {
    const { machine, positions } = this.state;
    const local = positions.current;

    if (!venuePos) {
      this.state.pendingExit = null;
      if (local) {
        positions.clear();
        machine.transition('FLAT');
        this.corrected(now, `venue has no position, local ${local.side} ${local.quantity} dropped`);
      }
      return;
    }

    if (local && local.side === venuePos.side) {
      if (Math.abs(local.quantity - venuePos.quantity) > 1e-12) {
        positions.syncQuantity(venuePos.quantity);
        this.corrected(now, `quantity ${local.quantity} → ${venuePos.quantity}`);
      }
      return;
    }

    if (local) {
      positions.clear();
      machine.transition('FLAT');
    }
    this.state.pendingExit = null;
    positions.open({
      side: venuePos.side,
      entryPrice: venuePos.entryPrice,
      quantity: venuePos.quantity,
      margin: 0,
      openedAt: now,
    });
    machine.transition('OPEN');
    this.state.lockBarTs = null;
    this.corrected(now, `adopted venue ${venuePos.side} ${venuePos.quantity} @ ${venuePos.entryPrice}`);
  }

  private corrected(now: number, detail: string): void {
    log.warn({ detail }, 'State corrected to venue');
    this.deps.bus.emit({ type: 'STATE_CORRECTED', timestamp: now, detail });
  }

  /**
   * 잠금 해제: 잠금 이후 마감된 봉의 종가가 [lower, upper] 안
   * 해제한 틱에는 진입하지 않음
   */
  private checkUnlock(ctx: TickContext): CycleResult {
    const { latest, frame } = ctx;
    const lockTs = this.state.lockBarTs;
    const { envelopeUpper, envelopeLower } = frame;
    if (
      lockTs !== null && latest.timestamp > lockTs &&
      envelopeUpper !== undefined && envelopeLower !== undefined &&
      latest.close >= envelopeLower && latest.close <= envelopeUpper
    ) {
      this.state.machine.transition('FLAT');
      this.state.lockBarTs = null;
      log.info({ close: latest.close, lower: envelopeLower, upper: envelopeUpper }, 'Lock released');
      this.deps.bus.emit({ type: 'UNLOCKED', timestamp: ctx.now });
      return { status: 'unlocked' };
    }
    return { status: 'locked' };
  }

  private async manageOpen(ctx: TickContext): Promise<CycleResult> {
    const { positions } = this.state;
    const pos = positions.current;
    if (!pos) return { status: 'holding' };

    let equityNow: number | undefined;
    if (pos.basket) {
      const eq = await this.deps.executor.retry('fetchEquity', () => this.deps.venue.fetchEquity());
      if (!eq.ok) return { status: 'abandoned', reason: eq.error.message };
      equityNow = eq.value.total;
    }

    const decision = positions.evaluate(ctx.bar, { frame: ctx.frame, signal: ctx.signal, equityNow });
    if (decision) {
      return this.exit(ctx.now, ctx.latest.timestamp, decision.trigger, decision.price, decision.reason);
    }

    if (this.config.sizing.policy === 'ladder') {
      // 당일 중단 중에는 레그 추가 금지
      const check = this.deps.accounting.checkEntry(ctx.now);
      if (!check.allowed) return { status: 'holding', reason: check.reason };
      return this.maybeAddLeg(ctx);
    }
    return { status: 'holding' };
  }

  /**
   * 보유 포지션 강제 청산 (백테스트 마감)
   */
  async closeOpenPosition(price: number, barTs: number): Promise<CycleResult> {
    if (!this.state.machine.isOpen()) return { status: 'idle' };
    return this.exit(this.deps.clock.now(), barTs, 'FORCED', price, 'forced close');
  }

  private async exit(
    now: number,
    barTs: number,
    trigger: ExitTrigger,
    price: number,
    reason: string,
  ): Promise<CycleResult> {
    const { machine, positions } = this.state;
    const pos = positions.current;
    if (!pos) return { status: 'holding' };

    machine.transition('EXIT_PENDING');
    const res = await this.deps.executor.close(pos.side, pos.quantity, price);
    if (!res.ok) {
      machine.transition('OPEN');
      this.state.pendingExit = { trigger, price, barTs, reason };
      return { status: 'exit_unconfirmed', reason: res.error.message };
    }
    return this.settleExit(now, barTs, trigger, res.value.fill.price, reason);
  }

  /**
   * 청산 확정 처리: 손익 기록 → 잠금 또는 FLAT
   * 호출 시 EXIT_PENDING 상태여야 함
   */
  private async settleExit(
    now: number,
    barTs: number,
    trigger: ExitTrigger,
    fillPrice: number,
    reason: string,
  ): Promise<CycleResult> {
    const { machine, positions } = this.state;
    const pos = positions.current;
    if (!pos) {
      machine.transition('FLAT');
      this.state.pendingExit = null;
      return { status: 'idle' };
    }

    let equityAfter: number | undefined;
    if (pos.basket) {
      const eq = await this.deps.executor.retry('fetchEquity', () => this.deps.venue.fetchEquity());
      if (eq.ok) {
        equityAfter = eq.value.total;
      } else {
        log.warn({ trigger, error: eq.error.message }, 'Equity unavailable after basket close — pnl from legs');
      }
    }

    const trade = positions.close(fillPrice, trigger, now, equityAfter);
    this.state.lastExitBarTs = barTs;
    this.state.pendingExit = null;

    const newlyHalted = this.deps.accounting.recordExit(
      {
        side: trade.side,
        entry: trade.entryPrice,
        exit: trade.exitPrice,
        qty: trade.quantity,
        pnl: trade.pnl,
        reason: trigger,
      },
      now,
    );

    if (trade.classification === 'stop_loss' && this.config.position.lockAfterStopLoss) {
      machine.transition('LOCKED');
      this.state.lockBarTs = barTs;
      this.deps.bus.emit({ type: 'LOCKED', timestamp: now });
    } else {
      machine.transition('FLAT');
    }

    if (newlyHalted) {
      this.deps.bus.emit({
        type: 'HALTED',
        timestamp: now,
        lossStreak: this.deps.accounting.snapshot().lossStreak,
      });
    }

    log.info({ trigger, reason, pnl: trade.pnl, classification: trade.classification }, 'Position closed');
    return { status: 'exited', trade };
  }

  private async maybeAddLeg(ctx: TickContext): Promise<CycleResult> {
    const pos = this.state.positions.current;
    const prev = ctx.frames[ctx.frames.length - 2];
    const prevCandle = ctx.closed[ctx.closed.length - 2];
    if (!pos || !prev || !prevCandle) return { status: 'holding' };

    if (!detectPullback(pos.side, prev, ctx.frame, prevCandle.close, ctx.bar.last)) {
      return { status: 'holding' };
    }

    const eq = await this.deps.executor.retry('fetchEquity', () => this.deps.venue.fetchEquity());
    if (!eq.ok) return { status: 'abandoned', reason: eq.error.message };

    const sizing = sizeLadderLeg({
      equity: eq.value.total,
      price: ctx.bar.last,
      legCount: pos.legCount,
      leverage: this.config.leverage,
      tiers: this.config.sizing.ladderTiers,
      meta: this.deps.meta,
    });
    if (sizing.qty <= 0) {
      log.debug({ reason: sizing.reason }, 'No ladder leg');
      return { status: 'holding', reason: sizing.reason };
    }

    const fill = await this.deps.executor.open(pos.side, sizing.qty, ctx.bar.last);
    if (!fill.ok) return { status: 'holding', reason: fill.error.message };

    this.state.positions.addLeg(pos.side, fill.value.price, fill.value.quantity, sizing.margin, ctx.now);
    return { status: 'leg_added' };
  }

  private async tryEnter(ctx: TickContext): Promise<CycleResult> {
    const { signal, bar, now } = ctx;
    if (signal.direction === 'none') return { status: 'idle' };
    const side = signal.direction;

    const check = this.deps.accounting.checkEntry(now);
    if (!check.allowed) {
      log.debug({ reason: check.reason }, 'Entry blocked');
      return { status: 'halted', reason: check.reason };
    }

    const waited = this.barsSinceExit(ctx.closed);
    if (waited !== undefined && waited < this.config.position.cooldownBars) {
      return { status: 'cooldown', reason: `${waited}/${this.config.position.cooldownBars} bars since exit` };
    }

    const eq = await this.deps.executor.retry('fetchEquity', () => this.deps.venue.fetchEquity());
    if (!eq.ok) return { status: 'abandoned', reason: eq.error.message };

    const sizing = this.size(side, bar.last, eq.value);
    if (sizing.qty <= 0) {
      log.info({ reason: sizing.reason }, 'Entry skipped: size');
      return { status: 'no_size', reason: sizing.reason };
    }

    const { machine, positions } = this.state;
    machine.transition('ENTRY_PENDING');
    const fill = await this.deps.executor.open(side, sizing.qty, bar.last);
    if (!fill.ok) {
      machine.transition('FLAT');
      return { status: 'entry_failed', reason: fill.error.message };
    }

    const { sizing: sizingCfg } = this.config;
    positions.open({
      side,
      entryPrice: fill.value.price,
      quantity: fill.value.quantity,
      margin: sizing.margin,
      openedAt: now,
      basket: sizingCfg.policy === 'ladder'
        ? {
            equityAtOpen: eq.value.total,
            targetFraction: sizingCfg.basketTargetFraction,
            stopFraction: sizingCfg.basketStopFraction,
          }
        : undefined,
    });
    machine.transition('OPEN');
    this.deps.accounting.recordEntry(now);

    log.info({ side, price: fill.value.price, qty: fill.value.quantity, reason: signal.reason }, 'Position opened');
    return { status: 'entered' };
  }

  private size(side: Side, price: number, equity: Equity): PositionSizing {
    const { sizing, leverage, position } = this.config;
    const meta = this.deps.meta;
    switch (sizing.policy) {
      case 'risk_fraction':
        return sizeByRiskFraction({
          equity: equity.total,
          riskFraction: sizing.riskFraction,
          entryPrice: price,
          stopPrice: initialStop(side, price, position.stopPoints),
          leverage,
          meta,
        });
      case 'margin_fraction':
        return sizeByMarginFraction({
          freeEquity: equity.free,
          marginFraction: sizing.marginFraction,
          leverage,
          price,
          meta,
        });
      case 'ladder':
        return sizeLadderLeg({ equity: equity.total, price, legCount: 0, leverage, tiers: sizing.ladderTiers, meta });
    }
  }

  /** 마지막 청산 이후 마감된 봉 수 (청산 이력 없으면 undefined) */
  private barsSinceExit(closed: readonly Candle[]): number | undefined {
    const exitTs = this.state.lastExitBarTs;
    if (exitTs === null) return undefined;
    return closed.filter((c) => c.timestamp > exitTs).length;
  }
}
