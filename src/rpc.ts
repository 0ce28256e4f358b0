import {
  Connection,
  EpochSchedule,
  SolanaJSONRPCError,
  type LoadedAddresses,
  type MessageCompiledInstruction,
  type PublicKey,
} from '@solana/web3.js';
import { z } from 'zod';
import { RpcError, ScanAbortedError } from './errors.js';
import type {
  BlockSummary,
  DecodedTransaction,
  LeaderSchedule,
  RpcCallResult,
  RpcErrorKind,
} from './types.js';

export const DEFAULT_TIMEOUT_MS = 20_000;

/**
 * The remote capabilities the scanner depends on. Every call rejects with
 * `ScanAbortedError` once `signal` aborts; all other failures come back as
 * an `RpcError` result.
 */
export interface SlotRpc {
  fetchBlock(slot: number, signal?: AbortSignal): Promise<RpcCallResult<BlockSummary | null>>;
  /** Leader schedule of the epoch starting at `epochStartSlot`, keyed by absolute slot. */
  fetchLeaderSchedule(epochStartSlot: number, signal?: AbortSignal): Promise<RpcCallResult<LeaderSchedule>>;
  fetchEpochSchedule(signal?: AbortSignal): Promise<RpcCallResult<EpochSchedule>>;
  fetchCurrentSlot(signal?: AbortSignal): Promise<RpcCallResult<number>>;
}

export type FetchLike = (
  input: string,
  init: { method: string; headers: Record<string, string>; body: string; signal?: AbortSignal },
) => Promise<{
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}>;

export type SolanaRpcClientOptions = {
  timeoutMs?: number;
  fetch?: FetchLike;
};

const jsonRpcResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const leaderScheduleSchema = z.record(z.string(), z.array(z.number().int().nonnegative())).nullable();

export class SolanaRpcClient implements SlotRpc {
  private readonly url: string;
  private readonly connection: Connection;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;
  private requestId = 0;

  constructor(url: string, options: SolanaRpcClientOptions = {}) {
    this.url = url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
    this.connection = new Connection(url, {
      commitment: 'confirmed',
      disableRetryOnRateLimit: true,
    });
  }

  async fetchBlock(slot: number, signal?: AbortSignal): Promise<RpcCallResult<BlockSummary | null>> {
    if (!isValidSlot(slot)) {
      return { ok: false, error: new RpcError('Fatal', `Invalid slot ${slot}`) };
    }
    return this.call(async () => {
      const block = await this.connection.getBlock(slot, {
        commitment: 'confirmed',
        maxSupportedTransactionVersion: 0,
        transactionDetails: 'full',
        rewards: false,
      });
      return block ? flattenBlock(slot, block) : null;
    }, signal);
  }

  async fetchLeaderSchedule(
    epochStartSlot: number,
    signal?: AbortSignal,
  ): Promise<RpcCallResult<LeaderSchedule>> {
    if (!isValidSlot(epochStartSlot)) {
      return { ok: false, error: new RpcError('Fatal', `Invalid slot ${epochStartSlot}`) };
    }
    const raw = await this.call(
      () => this.request('getLeaderSchedule', [epochStartSlot, { commitment: 'confirmed' }], signal),
      signal,
    );
    if (!raw.ok) {
      return raw;
    }
    const parsed = leaderScheduleSchema.safeParse(raw.value);
    if (!parsed.success) {
      return {
        ok: false,
        error: new RpcError('Fatal', 'Malformed getLeaderSchedule response', { cause: parsed.error }),
      };
    }
    if (parsed.data === null) {
      return {
        ok: false,
        error: new RpcError('NotFound', `No leader schedule for epoch starting at slot ${epochStartSlot}`),
      };
    }
    return { ok: true, value: toAbsoluteSchedule(epochStartSlot, parsed.data) };
  }

  fetchEpochSchedule(signal?: AbortSignal): Promise<RpcCallResult<EpochSchedule>> {
    return this.call(() => this.connection.getEpochSchedule(), signal);
  }

  fetchCurrentSlot(signal?: AbortSignal): Promise<RpcCallResult<number>> {
    return this.call(() => this.connection.getSlot('confirmed'), signal);
  }

  private async call<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<RpcCallResult<T>> {
    if (signal?.aborted) {
      throw new ScanAbortedError();
    }
    try {
      const value = await withTimeout(fn(), this.timeoutMs, signal);
      return { ok: true, value };
    } catch (error) {
      if (error instanceof ScanAbortedError) {
        throw error;
      }
      return { ok: false, error: classifyRpcError(error) };
    }
  }

  private async request(method: string, params: unknown[], signal?: AbortSignal): Promise<unknown> {
    this.requestId += 1;
    const res = await this.fetchFn(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ jsonrpc: '2.0', id: this.requestId, method, params }),
      ...(signal ? { signal } : {}),
    });
    const text = await res.text();
    if (!res.ok) {
      throw new Error(`${res.status} ${res.statusText}: ${text}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new RpcError('Fatal', `Invalid JSON in ${method} response`, { cause: error });
    }
    const parsed = jsonRpcResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RpcError('Fatal', `Malformed ${method} response`, { cause: parsed.error });
    }
    if (parsed.data.error) {
      throw new SolanaJSONRPCError(parsed.data.error, `failed to call ${method}`);
    }
    return parsed.data.result ?? null;
  }
}

export type RawBlock = {
  blockhash: string;
  transactions: Array<{
    transaction: {
      signatures: string[];
      message: {
        staticAccountKeys: PublicKey[];
        compiledInstructions: MessageCompiledInstruction[];
      };
    };
    meta: { loadedAddresses?: LoadedAddresses } | null;
  }>;
};

/**
 * Resolves account indexes against the static keys followed by the
 * addresses loaded from lookup tables (writable first, then readonly).
 */
export function flattenBlock(slot: number, block: RawBlock): BlockSummary {
  const transactions = block.transactions.map(({ transaction, meta }): DecodedTransaction => {
    const loaded = meta?.loadedAddresses;
    const accountKeys = [
      ...transaction.message.staticAccountKeys,
      ...(loaded?.writable ?? []),
      ...(loaded?.readonly ?? []),
    ].map((key) => key.toBase58());

    return {
      signature: transaction.signatures[0] ?? '',
      accountKeys,
      instructions: transaction.message.compiledInstructions.map((ix) => ({
        programId: accountKeys[ix.programIdIndex] ?? '',
        accounts: ix.accountKeyIndexes.map((index) => accountKeys[index] ?? ''),
        data: ix.data,
      })),
    };
  });

  return { slot, blockhash: block.blockhash, transactions };
}

export function toAbsoluteSchedule(
  epochStartSlot: number,
  schedule: Record<string, number[]>,
): LeaderSchedule {
  const slotToLeader = new Map<number, string>();
  for (const [identity, relativeSlots] of Object.entries(schedule)) {
    for (const relative of relativeSlots) {
      slotToLeader.set(epochStartSlot + relative, identity);
    }
  }
  return slotToLeader;
}

/**
 * Settles with `promise`, or rejects with a Transient `RpcError` after
 * `timeoutMs`, or with `ScanAbortedError` as soon as `signal` aborts.
 * Connection calls take no signal, so an aborted call is abandoned rather
 * than cancelled on the wire.
 */
function withTimeout<T>(promise: Promise<T>, timeoutMs: number, signal?: AbortSignal): Promise<T> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ScanAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      reject(new RpcError('Transient', `RPC timeout after ${timeoutMs}ms`));
    }, timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    promise
      .then((value) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      })
      .catch((error) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      });
  });
}

// JSON-RPC server error codes returned by Solana validators.
const JSON_RPC_KINDS: ReadonlyMap<number, RpcErrorKind> = new Map([
  [429, 'RateLimited'],
  [-32001, 'NotFound'], // block cleaned up
  [-32004, 'Transient'], // block not available for slot
  [-32005, 'Transient'], // node unhealthy
  [-32007, 'SlotSkipped'], // slot skipped or missing due to ledger jump
  [-32009, 'SlotSkipped'], // slot skipped or missing in long-term storage
  [-32011, 'NotFound'], // transaction history not available
  [-32014, 'Transient'], // block status not yet available
  [-32016, 'Transient'], // minimum context slot not reached
  [-32603, 'Transient'], // internal error
]);

export function classifyRpcError(error: unknown): RpcError {
  if (error instanceof RpcError) {
    return error;
  }
  const message = parseRpcErrorMessage(error);

  if (error instanceof SolanaJSONRPCError && typeof error.code === 'number') {
    return new RpcError(JSON_RPC_KINDS.get(error.code) ?? 'Fatal', message, { cause: error });
  }

  const status = httpStatusOf(message);
  if (status !== undefined) {
    const kind: RpcErrorKind = status === 429 ? 'RateLimited' : status >= 500 ? 'Transient' : 'Fatal';
    return new RpcError(kind, message, { cause: error });
  }
  if (isRateLimitMessage(message)) {
    return new RpcError('RateLimited', message, { cause: error });
  }
  if (isTransientMessage(message)) {
    return new RpcError('Transient', message, { cause: error });
  }
  return new RpcError('Fatal', message, { cause: error });
}

function httpStatusOf(message: string): number | undefined {
  const match = /^(\d{3}) /.exec(message);
  return match ? Number(match[1]) : undefined;
}

export function isRateLimitMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return lower.includes('rate limit') || lower.includes('too many requests');
}

export function isTransientMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return (
    lower.includes('timeout') ||
    lower.includes('timed out') ||
    lower.includes('fetch failed') ||
    lower.includes('socket hang up') ||
    lower.includes('econnreset') ||
    lower.includes('econnrefused') ||
    lower.includes('etimedout') ||
    lower.includes('enotfound') ||
    lower.includes('eai_again')
  );
}

export function parseRpcErrorMessage(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

function isValidSlot(slot: number): boolean {
  return Number.isSafeInteger(slot) && slot >= 0;
}
