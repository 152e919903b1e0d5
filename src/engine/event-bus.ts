import type { TradingEvent, EventType } from '../types/index.js';

type EventHandler = (event: TradingEvent) => void;

/**
 * 타입드 이벤트 버스: 최근 maxLog개 이벤트 보관
 */
export class EventBus {
  private handlers: Map<EventType, EventHandler[]> = new Map();
  private anyHandlers: EventHandler[] = [];
  private log: TradingEvent[] = [];
  private readonly maxLog: number;

  constructor(maxLog: number = 1000) {
    this.maxLog = maxLog;
  }

  on(type: EventType, handler: EventHandler): void {
    const list = this.handlers.get(type) ?? [];
    list.push(handler);
    this.handlers.set(type, list);
  }

  /** 전체 이벤트 구독 (감사 로그·알림) */
  onAny(handler: EventHandler): void {
    this.anyHandlers.push(handler);
  }

  emit(event: TradingEvent): void {
    this.log.push(event);
    if (this.log.length > this.maxLog) {
      this.log = this.log.slice(-Math.floor(this.maxLog / 2));
    }
    for (const h of this.handlers.get(event.type) ?? []) {
      h(event);
    }
    for (const h of this.anyHandlers) {
      h(event);
    }
  }

  getLog(): readonly TradingEvent[] {
    return this.log;
  }

  clearLog(): void {
    this.log = [];
  }
}
