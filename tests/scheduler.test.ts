import { describe, it, expect, vi } from 'vitest';
import type { CycleResult } from '../src/engine/trading-engine.js';

const { scheduleMock } = vi.hoisted(() => ({
  scheduleMock: vi.fn((_expr: string, task: () => void, _opts: { timezone: string }) => {
    task();
    return { stop: vi.fn() };
  }),
}));

vi.mock('node-cron', () => ({ default: { schedule: scheduleMock } }));

const { TickScheduler, startDailyReportSchedule } = await import('../src/engine/scheduler.js');
const { ManualClock } = await import('../src/exchange/venue.js');

class CountingRunner {
  calls = 0;
  constructor(private readonly onCycle: (n: number) => void = () => undefined) {}

  runCycle(): Promise<CycleResult> {
    this.calls++;
    this.onCycle(this.calls);
    return Promise.resolve({ status: 'idle' });
  }
}

describe('TickScheduler', () => {
  it('should sleep loopMs between cycles', async () => {
    const runner = new CountingRunner();
    const clock = new ManualClock(0);
    const scheduler = new TickScheduler(runner, clock, 1000);

    expect(await scheduler.run(3)).toBe(3);
    expect(runner.calls).toBe(3);
    expect(clock.now()).toBe(2000);
    expect(scheduler.isRunning).toBe(false);
  });

  it('should keep looping after a failed cycle', async () => {
    const runner = new CountingRunner((n) => {
      if (n === 1) throw new Error('boom');
    });
    const scheduler = new TickScheduler(runner, new ManualClock(0), 10);
    expect(await scheduler.run(3)).toBe(3);
  });

  it('should stop at the cycle boundary after a stop request', async () => {
    let scheduler: InstanceType<typeof TickScheduler> | undefined;
    const runner = new CountingRunner((n) => {
      if (n === 2) scheduler?.requestStop();
    });
    scheduler = new TickScheduler(runner, new ManualClock(0), 10);
    expect(await scheduler.run()).toBe(2);
  });

  it('should refuse a second concurrent run', async () => {
    const scheduler = new TickScheduler(new CountingRunner(), new ManualClock(0), 10);
    const first = scheduler.run(2);
    await expect(scheduler.run(1)).rejects.toThrow('Scheduler already running');
    expect(await first).toBe(2);
  });
});

describe('startDailyReportSchedule', () => {
  it('should schedule a daily cron in the trading time zone', () => {
    const onReport = vi.fn();
    startDailyReportSchedule(23, 59, 'Asia/Seoul', onReport);

    expect(scheduleMock).toHaveBeenCalledWith('59 23 * * *', expect.any(Function), { timezone: 'Asia/Seoul' });
    expect(onReport).toHaveBeenCalledTimes(1);
  });
});
