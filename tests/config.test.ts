import { describe, expect, it } from 'vitest';
import { createScanRequest, parseScanConfig } from '../src/config.js';
import { InvalidScanRequestError } from '../src/errors.js';
import { IDENTITY, TARGET } from './fakes.js';

const base = { url: 'http://localhost:8899', account: TARGET, slot: '100', distance: '5' };

function issuesOf(raw: unknown): string[] {
  try {
    parseScanConfig(raw);
  } catch (error) {
    if (error instanceof InvalidScanRequestError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('parseScanConfig', () => {
  it('coerces command line strings and applies defaults', () => {
    expect(parseScanConfig(base)).toEqual({
      request: { rpcUrl: 'http://localhost:8899', targetAccount: TARGET, startSlot: 100, distance: 5 },
      maxRetries: 5,
      timeoutMs: 20_000,
      json: false,
    });
  });

  it('keeps the optional identity and overrides', () => {
    const config = parseScanConfig({ ...base, identity: IDENTITY, maxRetries: '2', timeoutMs: '500', json: true });

    expect(config.request.identity).toBe(IDENTITY);
    expect(config.maxRetries).toBe(2);
    expect(config.timeoutMs).toBe(500);
    expect(config.json).toBe(true);
  });

  it('returns a frozen request', () => {
    expect(Object.isFrozen(parseScanConfig(base).request)).toBe(true);
  });

  it('rejects an account that is not a public key', () => {
    expect(issuesOf({ ...base, account: 'not-a-key' })).toEqual([
      'account: must be a base58-encoded 32-byte public key',
    ]);
  });

  it('rejects a non-http endpoint', () => {
    expect(issuesOf({ ...base, url: 'ws://localhost:8900' })).toEqual(['url: must be an http(s) URL']);
  });

  it('rejects a zero distance', () => {
    expect(issuesOf({ ...base, distance: '0' })).toHaveLength(1);
    expect(issuesOf({ ...base, distance: '0' })[0]).toMatch(/^distance: /);
  });

  it('rejects a range that reaches below slot 0', () => {
    expect(issuesOf({ ...base, slot: '10', distance: '12' })).toEqual(['distance: distance reaches below slot 0']);
  });

  it('accepts a range ending exactly at slot 0', () => {
    expect(parseScanConfig({ ...base, slot: '10', distance: '11' }).request.distance).toBe(11);
  });

  it('rejects a negative slot', () => {
    expect(issuesOf({ ...base, slot: '-1', distance: '1' })[0]).toMatch(/^slot: /);
  });

  it('names the issues in the error message', () => {
    expect(() => parseScanConfig({ ...base, url: 'ws://localhost:8900' })).toThrow(
      'Invalid scan request: url: must be an http(s) URL',
    );
  });
});

describe('createScanRequest', () => {
  it('leaves identity out when it is not given', () => {
    const request = createScanRequest({
      rpcUrl: 'http://localhost:8899',
      targetAccount: TARGET,
      identity: undefined,
      startSlot: 1,
      distance: 1,
    });

    expect('identity' in request).toBe(false);
  });
});
