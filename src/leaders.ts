import type { EpochSchedule } from '@solana/web3.js';
import { delay, retryCall, type BackoffController, type Sleep } from './backoff.js';
import { LeaderScheduleError } from './errors.js';
import { getLogger } from './logger.js';
import type { SlotRpc } from './rpc.js';
import type { LeaderSchedule } from './types.js';

const logger = getLogger('leaders');

export type LeaderScheduleResolverOptions = {
  backoff: BackoffController;
  sleep?: Sleep;
  signal?: AbortSignal;
};

/**
 * Per-invocation cache of leader schedules. Each epoch is fetched on first
 * access and never refetched; a fetch that fails after retries throws
 * `LeaderScheduleError`, which aborts the scan.
 */
export class LeaderScheduleResolver {
  private readonly rpc: SlotRpc;
  private readonly backoff: BackoffController;
  private readonly sleep: Sleep;
  private readonly signal?: AbortSignal;
  private epochSchedule?: EpochSchedule;
  private readonly schedules = new Map<number, LeaderSchedule>();

  constructor(rpc: SlotRpc, options: LeaderScheduleResolverOptions) {
    this.rpc = rpc;
    this.backoff = options.backoff;
    this.sleep = options.sleep ?? delay;
    this.signal = options.signal;
  }

  get cachedEpochs(): number[] {
    return Array.from(this.schedules.keys());
  }

  async leaderForSlot(slot: number): Promise<string | undefined> {
    const epochSchedule = await this.getEpochSchedule();
    const schedule = await this.getOrFetch(epochSchedule.getEpoch(slot));
    return schedule.get(slot);
  }

  async getOrFetch(epoch: number): Promise<LeaderSchedule> {
    const cached = this.schedules.get(epoch);
    if (cached) {
      return cached;
    }

    const epochSchedule = await this.getEpochSchedule();
    const firstSlot = epochSchedule.getFirstSlotInEpoch(epoch);
    const result = await retryCall(() => this.rpc.fetchLeaderSchedule(firstSlot, this.signal), {
      backoff: this.backoff,
      sleep: this.sleep,
      signal: this.signal,
      onRetry: (attempt, delayMs, error) =>
        logger.debug({ epoch, attempt, delayMs, kind: error.kind }, 'Retrying leader schedule fetch'),
    });
    if (!result.ok) {
      throw new LeaderScheduleError(epoch, result.error);
    }

    logger.debug({ epoch, firstSlot, slots: result.value.size }, 'Cached leader schedule');
    this.schedules.set(epoch, result.value);
    return result.value;
  }

  private async getEpochSchedule(): Promise<EpochSchedule> {
    if (this.epochSchedule) {
      return this.epochSchedule;
    }
    const result = await retryCall(() => this.rpc.fetchEpochSchedule(this.signal), {
      backoff: this.backoff,
      sleep: this.sleep,
      signal: this.signal,
    });
    if (!result.ok) {
      throw new LeaderScheduleError(undefined, result.error);
    }
    this.epochSchedule = result.value;
    return result.value;
  }
}
