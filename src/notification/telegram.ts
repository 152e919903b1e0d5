import { request } from 'undici';
import { createChildLogger } from '../logger.js';
import { sleep } from '../utils/sleep.js';

const log = createChildLogger('telegram');

/** 텍스트 알림 채널: 실패는 로그만 */
export interface NotificationSink {
  send(text: string): void;
}

export interface TelegramSinkOptions {
  readonly timeoutMs: number;
  /** 연속 전송 간격 (초당 1건) */
  readonly intervalMs: number;
  readonly wait: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: TelegramSinkOptions = {
  timeoutMs: 10_000,
  intervalMs: 1000,
  wait: sleep,
};

/**
 * Telegram Bot API를 통한 메시지 전송
 * - 큐 + 초당 1건 제한 (rate limit 준수)
 * - 전송 실패 시 로그만 남김
 */
export class TelegramSink implements NotificationSink {
  private readonly botToken: string;
  private readonly chatId: string;
  private readonly options: TelegramSinkOptions;
  private readonly queue: string[] = [];
  private draining: Promise<void> | null = null;

  constructor(botToken: string, chatId: string, options?: Partial<TelegramSinkOptions>) {
    this.botToken = botToken;
    this.chatId = chatId;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  send(text: string): void {
    this.queue.push(text);
    if (!this.draining) {
      this.draining = this.processQueue().finally(() => {
        this.draining = null;
      });
    }
  }

  /** 큐가 빌 때까지 대기 (종료 시) */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  private async processQueue(): Promise<void> {
    for (let msg = this.queue.shift(); msg !== undefined; msg = this.queue.shift()) {
      try {
        await this.doSend(msg);
      } catch (err) {
        log.warn({ err }, 'Telegram send failed');
      }
      if (this.queue.length > 0) {
        await this.options.wait(this.options.intervalMs);
      }
    }
  }

  private async doSend(text: string): Promise<void> {
    const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;
    const { statusCode, body } = await request(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ chat_id: this.chatId, text }),
      headersTimeout: this.options.timeoutMs,
      bodyTimeout: this.options.timeoutMs,
    });
    const raw = await body.text();
    if (statusCode >= 400) {
      log.warn({ status: statusCode, body: raw.slice(0, 200) }, 'Telegram API error');
    }
  }
}
