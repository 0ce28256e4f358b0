import { BackoffController, delay, type Sleep } from './backoff.js';
import { RpcError, ScanAbortedError } from './errors.js';
import { LeaderScheduleResolver } from './leaders.js';
import { getLogger } from './logger.js';
import { ReportAggregator, slotRange } from './report.js';
import type { SlotRpc } from './rpc.js';
import type {
  BlockSummary,
  Report,
  RetryState,
  ScanRequest,
  SlotOutcome,
  SlotState,
} from './types.js';
import { extractBlockVotes, findTargetVotes } from './vote.js';

const logger = getLogger('scan');

export type ScanObserver = {
  onSlotStart?: (slot: number, index: number, total: number) => void;
  onStateChange?: (slot: number, state: SlotState) => void;
  onRetry?: (slot: number, attempt: number, delayMs: number, reason: string) => void;
  onOutcome?: (outcome: SlotOutcome) => void;
};

export type ScanDependencies = {
  rpc: SlotRpc;
  backoff?: BackoffController;
  leaders?: LeaderScheduleResolver;
  sleep?: Sleep;
  signal?: AbortSignal;
  observer?: ScanObserver;
};

export type SlotContext = {
  request: ScanRequest;
  rpc: SlotRpc;
  backoff: BackoffController;
  leaders: LeaderScheduleResolver;
  sleep: Sleep;
  signal?: AbortSignal;
  observer?: ScanObserver;
};

/**
 * Scans every slot of the request, one at a time and newest first, and
 * returns the finalized report. Per-slot RPC failures become `ERRORED`
 * outcomes; a leader schedule failure or an abort rejects the whole scan.
 */
export async function scanSlots(request: ScanRequest, deps: ScanDependencies): Promise<Report> {
  const backoff = deps.backoff ?? new BackoffController();
  const sleep = deps.sleep ?? delay;
  const context: SlotContext = {
    request,
    rpc: deps.rpc,
    backoff,
    leaders:
      deps.leaders ?? new LeaderScheduleResolver(deps.rpc, { backoff, sleep, signal: deps.signal }),
    sleep,
    signal: deps.signal,
    observer: deps.observer,
  };

  const aggregator = new ReportAggregator(request);
  logger.info(
    { startSlot: request.startSlot, distance: request.distance, account: request.targetAccount },
    'Starting scan',
  );

  let index = 0;
  for (const slot of slotRange(request)) {
    throwIfAborted(deps.signal);
    deps.observer?.onSlotStart?.(slot, index, request.distance);
    index += 1;
    const outcome = await scanSlot(slot, context);
    aggregator.record(outcome);
    deps.observer?.onOutcome?.(outcome);
  }

  const report = aggregator.finalize();
  logger.info({ summary: report.summary }, 'Scan complete');
  return report;
}

/**
 * Drives one slot through PENDING → FETCHING → {SUCCEEDED, RETRYING,
 * EXHAUSTED} and returns its terminal outcome.
 */
export async function scanSlot(slot: number, context: SlotContext): Promise<SlotOutcome> {
  const { rpc, backoff, observer, signal } = context;
  const retry: RetryState = { consecutiveFailures: 0, emptyResult: false };
  let attempts = 0;
  let state: SlotState = transition(slot, 'PENDING', observer);

  for (;;) {
    switch (state) {
      case 'PENDING':
      case 'RETRYING': {
        state = transition(slot, 'FETCHING', observer);
        break;
      }

      case 'FETCHING': {
        attempts += 1;
        const result = await rpc.fetchBlock(slot, signal);
        throwIfAborted(signal);

        if (result.ok && result.value) {
          transition(slot, 'SUCCEEDED', observer);
          return classifyBlock(slot, result.value, attempts, context);
        }

        if (!result.ok && result.error.kind === 'SlotSkipped') {
          transition(slot, 'SUCCEEDED', observer);
          return freeze({ slot, attempts, status: 'LEADER_SKIPPED_SLOT', reason: 'slot_skipped' });
        }

        const error = result.ok
          ? new RpcError('Transient', `No block returned for slot ${slot}`)
          : result.error;
        retry.emptyResult = result.ok;
        retry.lastError = error;
        retry.lastErrorKind = error.kind;

        if (!backoff.shouldRetry(retry.consecutiveFailures, error.kind)) {
          transition(slot, 'EXHAUSTED', observer);
          return exhaustedOutcome(slot, attempts, retry, context);
        }

        const delayMs = backoff.nextDelay(retry.consecutiveFailures, error.kind);
        retry.consecutiveFailures += 1;
        state = transition(slot, 'RETRYING', observer);
        logger.debug(
          { slot, attempt: attempts, delayMs, kind: error.kind, message: error.message },
          'Retrying block fetch',
        );
        observer?.onRetry?.(slot, attempts, delayMs, error.message);
        await pause(context, delayMs);
        break;
      }
    }
  }
}

function transition<S extends SlotState>(slot: number, next: S, observer?: ScanObserver): S {
  observer?.onStateChange?.(slot, next);
  return next;
}

/**
 * Outcome of a slot whose block was fetched. The leader schedule is only
 * consulted when the target has no vote in the block.
 */
export async function classifyBlock(
  slot: number,
  block: BlockSummary,
  attempts: number,
  context: Pick<SlotContext, 'request' | 'leaders' | 'signal'>,
): Promise<SlotOutcome> {
  const { request } = context;
  const votes = extractBlockVotes(block);
  const targetVotes = findTargetVotes(votes, request);
  if (targetVotes.length > 0) {
    return freeze({ slot, attempts, status: 'VOTE_FOUND', voteCount: votes.length, votes: targetVotes });
  }

  throwIfAborted(context.signal);
  const leader = await context.leaders.leaderForSlot(slot);
  const leaderKey = request.identity ?? request.targetAccount;
  if (leader !== leaderKey) {
    return freeze({
      slot,
      attempts,
      leader,
      status: 'LEADER_SKIPPED_SLOT',
      reason: 'not_leader',
      voteCount: votes.length,
    });
  }
  return freeze({ slot, attempts, leader, status: 'NO_VOTE_IN_BLOCK', voteCount: votes.length });
}

async function exhaustedOutcome(
  slot: number,
  attempts: number,
  retry: RetryState,
  context: SlotContext,
): Promise<SlotOutcome> {
  if (retry.emptyResult) {
    throwIfAborted(context.signal);
    const leader = await context.leaders.leaderForSlot(slot);
    return freeze({ slot, attempts, leader, status: 'BLOCK_MISSING' });
  }
  return freeze({
    slot,
    attempts,
    status: 'ERRORED',
    error: {
      kind: retry.lastErrorKind ?? 'Fatal',
      message: retry.lastError?.message ?? 'unknown error',
    },
  });
}

async function pause(context: SlotContext, ms: number): Promise<void> {
  try {
    await context.sleep(ms, context.signal);
  } catch (error) {
    if (context.signal?.aborted) {
      throw new ScanAbortedError();
    }
    throw error;
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ScanAbortedError();
  }
}

function freeze(outcome: SlotOutcome): SlotOutcome {
  return Object.freeze(outcome);
}
