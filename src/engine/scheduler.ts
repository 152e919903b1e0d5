import cron, { type ScheduledTask } from 'node-cron';
import { createChildLogger } from '../logger.js';
import type { Clock } from '../exchange/venue.js';
import type { CycleResult } from './trading-engine.js';

const log = createChildLogger('scheduler');

export interface CycleRunner {
  runCycle(): Promise<CycleResult>;
}

/**
 * 단일 스레드 협력형 루프
 * 사이클 완료 → loopMs 대기 → 다음 사이클. 종료 요청은 다음 사이클 시작 시 반영
 */
export class TickScheduler {
  private readonly runner: CycleRunner;
  private readonly clock: Clock;
  private readonly loopMs: number;
  private stopRequested = false;
  private running = false;

  constructor(runner: CycleRunner, clock: Clock, loopMs: number) {
    this.runner = runner;
    this.clock = clock;
    this.loopMs = loopMs;
  }

  get isRunning(): boolean {
    return this.running;
  }

  requestStop(): void {
    if (!this.stopRequested) log.info('Stop requested — finishing current cycle');
    this.stopRequested = true;
  }

  /**
   * @param maxCycles 테스트/백테스트용 상한 (생략 시 종료 요청까지)
   * @returns 실행한 사이클 수
   */
  async run(maxCycles: number = Number.POSITIVE_INFINITY): Promise<number> {
    if (this.running) throw new Error('Scheduler already running');
    this.running = true;
    let cycles = 0;

    try {
      while (!this.stopRequested && cycles < maxCycles) {
        cycles++;
        try {
          const result = await this.runner.runCycle();
          if (result.status !== 'idle' && result.status !== 'holding') {
            log.debug({ cycle: cycles, status: result.status, reason: result.reason }, 'Cycle done');
          }
        } catch (err) {
          // 한 사이클의 예외로 프로세스를 끝내지 않음
          log.error({ err, cycle: cycles }, 'Cycle failed');
        }
        if (this.stopRequested || cycles >= maxCycles) break;
        await this.clock.sleep(this.loopMs);
      }
    } finally {
      this.running = false;
    }

    log.info({ cycles }, 'Scheduler stopped');
    return cycles;
  }
}

export type OnDailyReport = () => void | Promise<void>;

/**
 * 일일 리포트 스케줄: 매일 HH:MM (거래 타임존)
 */
export function startDailyReportSchedule(
  hour: number,
  minute: number,
  timeZone: string,
  onReport: OnDailyReport,
): ScheduledTask {
  const task = cron.schedule(`${minute} ${hour} * * *`, () => {
    Promise.resolve(onReport()).catch((err: unknown) => {
      log.error({ err }, 'Daily report callback error');
    });
  }, { timezone: timeZone });
  log.info({ hour, minute, timeZone }, 'Daily report scheduler started');
  return task;
}
