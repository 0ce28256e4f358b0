import { PublicKey } from '@solana/web3.js';
import { z } from 'zod';
import { DEFAULT_BACKOFF } from './backoff.js';
import { InvalidScanRequestError } from './errors.js';
import { DEFAULT_TIMEOUT_MS } from './rpc.js';
import type { ScanRequest } from './types.js';

const MAX_DISTANCE = 0xffff_ffff;

function isPublicKey(value: string): boolean {
  try {
    return new PublicKey(value).toBase58() === value;
  } catch {
    return false;
  }
}

const publicKeySchema = z
  .string()
  .trim()
  .refine(isPublicKey, { message: 'must be a base58-encoded 32-byte public key' });

export const scanOptionsSchema = z
  .object({
    url: z
      .string()
      .trim()
      .url()
      .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' }),
    account: publicKeySchema,
    identity: publicKeySchema.optional(),
    slot: z.coerce.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    distance: z.coerce.number().int().min(1).max(MAX_DISTANCE),
    maxRetries: z.coerce.number().int().min(0).max(20).default(DEFAULT_BACKOFF.maxRetries),
    timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    json: z.boolean().default(false),
  })
  .refine((options) => options.distance <= options.slot + 1, {
    message: 'distance reaches below slot 0',
    path: ['distance'],
  });

export type ScanConfig = {
  request: ScanRequest;
  maxRetries: number;
  timeoutMs: number;
  json: boolean;
};

export function createScanRequest(fields: ScanRequest): ScanRequest {
  const { rpcUrl, targetAccount, identity, startSlot, distance } = fields;
  return Object.freeze(
    identity === undefined
      ? { rpcUrl, targetAccount, startSlot, distance }
      : { rpcUrl, targetAccount, identity, startSlot, distance },
  );
}

export function parseScanConfig(raw: unknown): ScanConfig {
  const parsed = scanOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidScanRequestError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }

  const options = parsed.data;
  return {
    request: createScanRequest({
      rpcUrl: options.url,
      targetAccount: options.account,
      identity: options.identity,
      startSlot: options.slot,
      distance: options.distance,
    }),
    maxRetries: options.maxRetries,
    timeoutMs: options.timeoutMs,
    json: options.json,
  };
}
