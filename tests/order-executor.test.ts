import { describe, it, expect } from 'vitest';
import { OrderExecutor, type ExecutorConfig } from '../src/execution/order-executor.js';
import { ManualClock, fail, ok } from '../src/exchange/venue.js';
import type { MarketMeta, VenuePosition } from '../src/types/index.js';
import { ScriptedVenue } from './fakes.js';

const meta: MarketMeta = { tickSize: 0.1, qtyStep: 0.01, minQty: 0.01, contractSize: 0.01 };

const cfg: ExecutorConfig = {
  transientRetries: 2,
  transientBackoffMs: 1000,
  closeConfirmRetries: 3,
  closeConfirmIntervalMs: 300,
  ioTimeoutMs: 5000,
};

const openPosition: VenuePosition = { side: 'long', quantity: 0.04, entryPrice: 100, unrealizedPnl: 0 };

function setup() {
  const venue = new ScriptedVenue(meta);
  const clock = new ManualClock(0);
  const executor = new OrderExecutor(venue, meta, cfg, clock);
  return { venue, clock, executor };
}

describe('OrderExecutor', () => {
  it('should retry transient failures with a fixed backoff', async () => {
    const { venue, clock, executor } = setup();
    venue.orderResults.push(fail('transient', 'timeout'), fail('transient', 'timeout'));

    const res = await executor.open('long', 0.04, 100);
    expect(res.ok).toBe(true);
    expect(venue.orders).toHaveLength(3);
    expect(clock.now()).toBe(2000);
  });

  it('should give up after the retry budget', async () => {
    const { venue, clock, executor } = setup();
    venue.orderResults.push(fail('transient', 'a'), fail('transient', 'b'), fail('transient', 'c'));

    const res = await executor.open('long', 0.04, 100);
    expect(res).toEqual({ ok: false, error: { kind: 'transient', message: 'c' } });
    expect(venue.orders).toHaveLength(3);
    expect(clock.now()).toBe(2000);
  });

  it('should not retry a rejection', async () => {
    const { venue, executor } = setup();
    venue.orderResults.push(fail('rejected', 'bad side'));

    const res = await executor.open('long', 0.04, 100);
    expect(res.ok).toBe(false);
    expect(venue.orders).toHaveLength(1);
  });

  it('should halve the quantity on insufficient margin', async () => {
    const { venue, executor } = setup();
    venue.orderResults.push(fail('insufficient_margin', 'no funds'));

    const res = await executor.open('short', 0.04, 100);
    expect(venue.orders.map((o) => o.quantity)).toEqual([0.04, 0.02]);
    expect(res.ok && res.value.quantity).toBe(0.02);
  });

  it('should abandon the entry below the minimum quantity', async () => {
    const { venue, executor } = setup();
    venue.orderResults.push(fail('insufficient_margin', 'no funds'), fail('insufficient_margin', 'no funds'));

    const res = await executor.open('long', 0.02, 100);
    expect(venue.orders.map((o) => o.quantity)).toEqual([0.02, 0.01]);
    expect(res).toEqual({ ok: false, error: { kind: 'insufficient_margin', message: 'unfillable down to min qty 0.01' } });
  });

  it('should poll until the position is gone after a close', async () => {
    const { venue, clock, executor } = setup();
    venue.positionResults.push(ok(openPosition), ok(openPosition), ok(null));

    const res = await executor.close('long', 0.04, 101);
    expect(res.ok && res.value.polls).toBe(3);
    expect(venue.orders[0]).toEqual({ side: 'long', action: 'close', quantity: 0.04, referencePrice: 101, reduceOnly: true });
    expect(clock.now()).toBe(600);
  });

  it('should report an unconfirmed close as transient', async () => {
    const { venue, executor } = setup();
    venue.positionResults.push(ok(openPosition), ok(openPosition), ok(openPosition));

    const res = await executor.close('long', 0.04, 101);
    expect(res).toEqual({ ok: false, error: { kind: 'transient', message: 'close not confirmed after 3 polls' } });
    expect(venue.positionCalls).toBe(3);
  });

  it('should pass through a failed close order', async () => {
    const { venue, executor } = setup();
    venue.orderResults.push(fail('rejected', 'no position'));

    const res = await executor.close('long', 0.04, 101);
    expect(res).toEqual({ ok: false, error: { kind: 'rejected', message: 'no position' } });
    expect(venue.positionCalls).toBe(0);
  });
});
