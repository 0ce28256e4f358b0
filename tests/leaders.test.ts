import { describe, expect, it } from 'vitest';
import { BackoffController } from '../src/backoff.js';
import { LeaderScheduleError } from '../src/errors.js';
import { LeaderScheduleResolver } from '../src/leaders.js';
import { FakeSlotRpc, OTHER, TARGET, recordingSleep } from './fakes.js';

function resolver(rpc: FakeSlotRpc) {
  const { sleep, waits } = recordingSleep();
  const backoff = new BackoffController({ maxRetries: 2, random: () => 0 });
  return { leaders: new LeaderScheduleResolver(rpc, { backoff, sleep }), waits };
}

describe('LeaderScheduleResolver', () => {
  it('fetches an epoch once and serves later lookups from cache', async () => {
    const rpc = new FakeSlotRpc().setLeaders(3, { 96: TARGET, 97: OTHER, 100: TARGET });
    const { leaders } = resolver(rpc);

    expect(await leaders.leaderForSlot(96)).toBe(TARGET);
    expect(await leaders.leaderForSlot(97)).toBe(OTHER);
    expect(await leaders.leaderForSlot(100)).toBe(TARGET);

    expect(rpc.leaderScheduleCalls).toEqual([96]);
    expect(rpc.epochScheduleCalls).toBe(1);
    expect(leaders.cachedEpochs).toEqual([3]);
  });

  it('fetches each epoch the range crosses', async () => {
    const rpc = new FakeSlotRpc().setLeaders(2, { 95: OTHER }).setLeaders(3, { 96: TARGET });
    const { leaders } = resolver(rpc);

    expect(await leaders.leaderForSlot(96)).toBe(TARGET);
    expect(await leaders.leaderForSlot(95)).toBe(OTHER);

    expect(rpc.leaderScheduleCalls).toEqual([96, 64]);
  });

  it('returns undefined for a slot the schedule does not list', async () => {
    const rpc = new FakeSlotRpc().setLeaders(3, { 96: TARGET });
    const { leaders } = resolver(rpc);

    expect(await leaders.leaderForSlot(99)).toBeUndefined();
  });

  it('retries a rate-limited schedule fetch', async () => {
    const rpc = new FakeSlotRpc().setLeaders(3, 'RateLimited', { 98: TARGET });
    const { leaders, waits } = resolver(rpc);

    expect(await leaders.leaderForSlot(98)).toBe(TARGET);
    expect(waits).toEqual([5_000]);
  });

  it('throws LeaderScheduleError once retries run out', async () => {
    const rpc = new FakeSlotRpc().setLeaders(3, 'Transient');
    const { leaders } = resolver(rpc);

    await expect(leaders.getOrFetch(3)).rejects.toBeInstanceOf(LeaderScheduleError);
    expect(rpc.leaderScheduleCalls).toEqual([96, 96, 96]);
  });

  it('throws without retrying when the schedule is not available', async () => {
    const rpc = new FakeSlotRpc();
    const { leaders, waits } = resolver(rpc);

    await expect(leaders.getOrFetch(5)).rejects.toThrow(
      'Could not fetch leader schedule for epoch 5: NotFound from fake endpoint',
    );
    expect(waits).toEqual([]);
  });
});
