import { BackoffController, delay, retryCall, type Sleep } from './backoff.js';
import type { ScanConfig } from './config.js';
import { ScanAbortedError, SetupError } from './errors.js';
import { getLogger } from './logger.js';
import { SolanaRpcClient, type SlotRpc } from './rpc.js';
import { scanSlots, type ScanObserver } from './scan.js';
import type { Report } from './types.js';

const logger = getLogger('run');

export const EXIT_OK = 0;
export const EXIT_SETUP_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export type RunDependencies = {
  rpc?: SlotRpc;
  sleep?: Sleep;
  random?: () => number;
  signal?: AbortSignal;
  observer?: ScanObserver;
};

/**
 * Probes the endpoint, then scans. Throws `SetupError` when the endpoint is
 * unreachable or the requested range is not yet produced.
 */
export async function runScan(config: ScanConfig, deps: RunDependencies = {}): Promise<Report> {
  const { request } = config;
  const rpc = deps.rpc ?? new SolanaRpcClient(request.rpcUrl, { timeoutMs: config.timeoutMs });
  const sleep = deps.sleep ?? delay;
  const backoff = new BackoffController({
    maxRetries: config.maxRetries,
    ...(deps.random ? { random: deps.random } : {}),
  });

  const current = await retryCall(() => rpc.fetchCurrentSlot(deps.signal), {
    backoff,
    sleep,
    signal: deps.signal,
    onRetry: (attempt, delayMs, error) =>
      logger.debug({ attempt, delayMs, kind: error.kind }, 'Retrying current slot probe'),
  });
  if (!current.ok) {
    throw new SetupError(`Could not reach ${request.rpcUrl}: ${current.error.message}`, {
      cause: current.error,
    });
  }
  if (request.startSlot > current.value) {
    throw new SetupError(
      `Slot ${request.startSlot} is ahead of the cluster (current slot ${current.value})`,
    );
  }

  return scanSlots(request, {
    rpc,
    backoff,
    sleep,
    signal: deps.signal,
    observer: deps.observer,
  });
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof ScanAbortedError) {
    return EXIT_INTERRUPTED;
  }
  return EXIT_SETUP_FAILURE;
}

export type ProgressSpinner = {
  text: string;
};

export function progressObserver(spinner: ProgressSpinner): ScanObserver {
  return {
    onSlotStart: (slot, index, total) => {
      spinner.text = `Slot ${slot} (${index + 1}/${total})`;
    },
    onRetry: (slot, attempt, delayMs, reason) => {
      spinner.text = `Slot ${slot}: ${reason}; retrying in ${(delayMs / 1000).toFixed(1)}s (attempt ${attempt + 1})`;
    },
  };
}
