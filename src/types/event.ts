import type { Position, ClosedTrade } from './position.js';
import type { DailyStats } from './risk.js';

export type EventType =
  | 'POSITION_OPENED'
  | 'POSITION_CLOSED'
  | 'STEP_ADVANCED'
  | 'LEG_ADDED'
  | 'LOCKED'
  | 'UNLOCKED'
  | 'HALTED'
  | 'STATE_CORRECTED'
  | 'DAY_ROLLOVER';

export interface BaseEvent {
  readonly type: EventType;
  readonly timestamp: number;
}

export interface PositionOpenedEvent extends BaseEvent {
  readonly type: 'POSITION_OPENED';
  readonly position: Position;
}

export interface PositionClosedEvent extends BaseEvent {
  readonly type: 'POSITION_CLOSED';
  readonly trade: ClosedTrade;
}

export interface StepAdvancedEvent extends BaseEvent {
  readonly type: 'STEP_ADVANCED';
  readonly step: number;
  readonly stopPrice: number;
}

export interface LegAddedEvent extends BaseEvent {
  readonly type: 'LEG_ADDED';
  readonly legCount: number;
  readonly price: number;
  readonly quantity: number;
}

export interface LockEvent extends BaseEvent {
  readonly type: 'LOCKED' | 'UNLOCKED';
}

export interface HaltedEvent extends BaseEvent {
  readonly type: 'HALTED';
  readonly lossStreak: number;
}

export interface StateCorrectedEvent extends BaseEvent {
  readonly type: 'STATE_CORRECTED';
  readonly detail: string;
}

export interface DayRolloverEvent extends BaseEvent {
  readonly type: 'DAY_ROLLOVER';
  /** 마감된 전일 집계 */
  readonly stats: DailyStats;
}

export type TradingEvent =
  | PositionOpenedEvent
  | PositionClosedEvent
  | StepAdvancedEvent
  | LegAddedEvent
  | LockEvent
  | HaltedEvent
  | StateCorrectedEvent
  | DayRolloverEvent;
