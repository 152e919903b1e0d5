import { createChildLogger } from '../logger.js';
import type { EventBus } from '../engine/event-bus.js';
import type { ClosedTrade, DailyStats, Position, TradingEvent } from '../types/index.js';
import type { NotificationSink } from './telegram.js';

const log = createChildLogger('notifier');

function fmt(n: number, digits: number = 2): string {
  return n.toFixed(digits);
}

function signed(n: number): string {
  return `${n >= 0 ? '+' : ''}${fmt(n)}`;
}

export function formatEntry(symbol: string, pos: Position): string {
  return [
    `📈 진입 ${pos.side.toUpperCase()} ${symbol}`,
    `가격: ${fmt(pos.entryPrice)}`,
    `수량: ${pos.quantity}`,
    `손절: ${fmt(pos.stopPrice)}`,
  ].join('\n');
}

export function formatExit(symbol: string, trade: ClosedTrade): string {
  const emoji = trade.pnl > 0 ? '💰' : '📉';
  return [
    `${emoji} 청산 ${trade.side.toUpperCase()} ${symbol}`,
    `진입: ${fmt(trade.entryPrice)} → 청산: ${fmt(trade.exitPrice)}`,
    `수량: ${trade.quantity} (레그 ${trade.legCount})`,
    `손익: ${signed(trade.pnl)} USDT`,
    `사유: ${trade.trigger} (${trade.classification})`,
  ].join('\n');
}

/**
 * 일일 리포트: 요약 + 거래 목록
 */
export function formatDailyReport(symbol: string, stats: DailyStats): string {
  const total = stats.wins + stats.losses;
  const winRate = total > 0 ? (stats.wins / total) * 100 : 0;
  const lines = [
    `📊 일일 리포트 ${stats.date} (${symbol})`,
    `진입: ${stats.tradesToday} / 청산: ${total}`,
    `승/패: ${stats.wins}/${stats.losses} (승률 ${fmt(winRate, 1)}%)`,
    `실현 손익: ${signed(stats.realizedPnl)} USDT`,
    `연속 손실: ${stats.lossStreak}${stats.halted ? ' — 신규 진입 중단' : ''}`,
  ];
  for (const t of stats.trades) {
    lines.push(`${t.time} ${t.side} ${fmt(t.entry)}→${fmt(t.exit)} x${t.qty} ${signed(t.pnl)} ${t.reason}`);
  }
  return lines.join('\n');
}

/**
 * 알림 허브: 이벤트별 메시지 포맷 후 sink로 전달
 * sink가 없으면 모든 호출 무시
 */
export class Notifier {
  private readonly sink: NotificationSink | null;
  private readonly symbol: string;

  constructor(sink: NotificationSink | null, symbol: string) {
    this.sink = sink;
    this.symbol = symbol;
    log.debug({ enabled: sink !== null }, 'Notifier created');
  }

  /** 엔진 이벤트 구독 */
  attach(bus: EventBus): void {
    bus.onAny((event) => this.onEvent(event));
  }

  onEvent(event: TradingEvent): void {
    switch (event.type) {
      case 'POSITION_OPENED':
        this.send(formatEntry(this.symbol, event.position));
        break;
      case 'POSITION_CLOSED':
        this.send(formatExit(this.symbol, event.trade));
        break;
      case 'LEG_ADDED':
        this.send(`➕ 레그 추가 #${event.legCount} 가격 ${fmt(event.price)} 수량 ${event.quantity}`);
        break;
      case 'LOCKED':
        this.send('🔒 손절 후 잠금 — envelope 안쪽 마감 시 해제');
        break;
      case 'UNLOCKED':
        this.send('🔓 잠금 해제');
        break;
      case 'HALTED':
        this.send(`⛔ 연속 손실 ${event.lossStreak}회 — 오늘 신규 진입 중단`);
        break;
      case 'STATE_CORRECTED':
        this.send(`⚠️ 거래소 기준 상태 보정: ${event.detail}`);
        break;
      case 'DAY_ROLLOVER':
        this.notifyDailyReport(event.stats);
        break;
      case 'STEP_ADVANCED':
        break;
    }
  }

  notifyDailyReport(stats: DailyStats): void {
    this.send(formatDailyReport(this.symbol, stats));
  }

  notifyError(module: string, message: string): void {
    this.send(`⚠️ 에러 [${module}]\n${message}`);
  }

  notifyStartup(mode: string): void {
    this.send(`🤖 봇 시작\n모드: ${mode}\n심볼: ${this.symbol}`);
  }

  notifyShutdown(): void {
    this.send('🛑 봇 종료');
  }

  private send(text: string): void {
    if (!this.sink) return;
    try {
      this.sink.send(text);
    } catch (err) {
      log.warn({ err }, 'Notifier send error');
    }
  }
}
