import { describe, expect, it } from 'vitest';
import { createScanRequest } from '../src/config.js';
import { formatOutcome, formatSummary, renderReport } from '../src/render.js';
import { summarize } from '../src/report.js';
import type { Report, SlotOutcome } from '../src/types.js';
import { OTHER, TARGET } from './fakes.js';

const found: SlotOutcome = {
  slot: 100,
  attempts: 1,
  leader: OTHER,
  status: 'VOTE_FOUND',
  voteCount: 2,
  votes: [
    {
      signature: 'sig-100-1',
      signer: TARGET,
      voteAccount: TARGET,
      instruction: 'TowerSync',
      votedSlot: 99,
      position: 1,
    },
  ],
};

const missing: SlotOutcome = { slot: 99, attempts: 1, leader: TARGET, status: 'NO_VOTE_IN_BLOCK', voteCount: 3 };

const skipped: SlotOutcome = { slot: 98, attempts: 1, status: 'LEADER_SKIPPED_SLOT', reason: 'slot_skipped' };

function reportOf(outcomes: SlotOutcome[]): Report {
  return {
    request: createScanRequest({
      rpcUrl: 'http://localhost:8899',
      targetAccount: TARGET,
      startSlot: 100,
      distance: outcomes.length,
    }),
    outcomes,
    summary: summarize(outcomes),
  };
}

describe('formatOutcome', () => {
  it('describes a found vote with its position in the block', () => {
    expect(formatOutcome(found)).toBe('100  VOTE FOUND    votes=2  #1 voted=99 sig=sig-100-1');
  });

  it('lists every vote of the target and marks an unknown voted slot', () => {
    const outcome: SlotOutcome = {
      slot: 100,
      attempts: 1,
      status: 'VOTE_FOUND',
      voteCount: 5,
      votes: [
        { signature: 'sig-a', signer: TARGET, voteAccount: TARGET, instruction: 'TowerSync', votedSlot: 98, position: 0 },
        { signature: 'sig-b', signer: TARGET, voteAccount: TARGET, instruction: 'Vote', position: 4 },
      ],
    };
    expect(formatOutcome(outcome)).toBe('100  VOTE FOUND    votes=5  #0 voted=98 sig=sig-a  #4 voted=? sig=sig-b');
  });

  it('names the leader of a block without the vote', () => {
    expect(formatOutcome(missing)).toBe(`99  MISSING VOTE  votes=3  leader=${TARGET}`);
  });

  it('describes skipped slots by reason', () => {
    expect(formatOutcome(skipped)).toBe('98  SKIPPED       slot skipped');
    expect(
      formatOutcome({ slot: 97, attempts: 1, leader: OTHER, status: 'LEADER_SKIPPED_SLOT', reason: 'not_leader' }),
    ).toBe(`97  SKIPPED       not leader  leader=${OTHER}`);
  });

  it('shows the retry count and error of an errored slot', () => {
    expect(
      formatOutcome({
        slot: 96,
        attempts: 6,
        status: 'ERRORED',
        error: { kind: 'Transient', message: 'fetch failed' },
      }),
    ).toBe('96  ERRORED       Transient: fetch failed  attempts=6');
  });

  it('falls back to an unknown leader', () => {
    expect(formatOutcome({ slot: 95, attempts: 2, status: 'BLOCK_MISSING' })).toBe(
      '95  NO BLOCK      leader=unknown  attempts=2',
    );
  });
});

describe('formatSummary', () => {
  it('counts every status', () => {
    expect(formatSummary(reportOf([found, missing, skipped]))).toBe(
      'Summary: 3 slots, 1 found, 1 missing, 0 no block, 1 skipped, 0 errored',
    );
  });
});

describe('renderReport', () => {
  it('lists slots newest first and flags missing votes', () => {
    expect(renderReport(reportOf([found, missing, skipped])).split('\n')).toEqual([
      `Account: ${TARGET}`,
      'Slots:   98..100 (3, newest first)',
      '',
      '100  VOTE FOUND    votes=2  #1 voted=99 sig=sig-100-1',
      `99  MISSING VOTE  votes=3  leader=${TARGET}`,
      '98  SKIPPED       slot skipped',
      '',
      'Summary: 3 slots, 1 found, 1 missing, 0 no block, 1 skipped, 0 errored',
      '1 slot(s) led by this validator carry no vote from it',
    ]);
  });

  it('omits the warning when no led slot lacks the vote', () => {
    const lines = renderReport(reportOf([found])).split('\n');
    expect(lines.at(-1)).toBe('Summary: 1 slots, 1 found, 0 missing, 0 no block, 0 skipped, 0 errored');
  });

  it('adds escape codes when color is on', () => {
    expect(renderReport(reportOf([found]), { color: true })).toContain('\u001b[32m');
  });
});
