import { createChildLogger } from '../logger.js';
import type { PositionPhase } from '../types/index.js';

const log = createChildLogger('state-machine');

type PhaseTransition = [PositionPhase, PositionPhase];

/** 허용된 상태 전이 */
const VALID_TRANSITIONS: PhaseTransition[] = [
  ['FLAT', 'ENTRY_PENDING'],
  ['ENTRY_PENDING', 'OPEN'],
  ['ENTRY_PENDING', 'FLAT'],          // 주문 실패/최소 수량 미달
  ['OPEN', 'EXIT_PENDING'],
  ['EXIT_PENDING', 'FLAT'],
  ['EXIT_PENDING', 'LOCKED'],         // 손절 청산 확정
  ['EXIT_PENDING', 'OPEN'],           // 청산 미확정: 이전 상태 유지
  ['LOCKED', 'FLAT'],                 // envelope 안쪽 마감
  // 거래소 기준 보정
  ['OPEN', 'FLAT'],
  ['FLAT', 'OPEN'],
  ['LOCKED', 'OPEN'],
];

export class InvalidTransitionError extends Error {
  readonly from: PositionPhase;
  readonly to: PositionPhase;

  constructor(from: PositionPhase, to: PositionPhase) {
    super(`Invalid state transition: ${from} → ${to}`);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * 포지션 상태 머신
 * 잘못된 전이 시도 시 에러 (안전장치)
 */
export class PositionStateMachine {
  private phase: PositionPhase;
  private phaseEnteredAt: number;
  private history: Array<{ from: PositionPhase; to: PositionPhase; at: number }> = [];
  private readonly now: () => number;

  constructor(now: () => number = Date.now, initial: PositionPhase = 'FLAT') {
    this.now = now;
    this.phase = initial;
    this.phaseEnteredAt = now();
  }

  get current(): PositionPhase {
    return this.phase;
  }

  get phaseAge(): number {
    return this.now() - this.phaseEnteredAt;
  }

  transition(to: PositionPhase): void {
    if (this.phase === to) return; // noop

    if (!this.canTransition(to)) {
      const err = new InvalidTransitionError(this.phase, to);
      log.error({ from: this.phase, to }, err.message);
      throw err;
    }

    log.debug({ from: this.phase, to }, 'State transition');
    const at = this.now();
    this.history.push({ from: this.phase, to, at });
    this.phase = to;
    this.phaseEnteredAt = at;

    // 히스토리 100개 제한
    if (this.history.length > 100) {
      this.history = this.history.slice(-50);
    }
  }

  canTransition(to: PositionPhase): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.phase && target === to);
  }

  isFlat(): boolean {
    return this.phase === 'FLAT';
  }

  isOpen(): boolean {
    return this.phase === 'OPEN';
  }

  isLocked(): boolean {
    return this.phase === 'LOCKED';
  }

  getHistory(): ReadonlyArray<{ from: PositionPhase; to: PositionPhase; at: number }> {
    return this.history;
  }
}
