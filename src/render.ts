import pc from 'picocolors';
import type { Report, SlotOutcome, SlotStatus } from './types.js';

type Colors = ReturnType<typeof pc.createColors>;

export type RenderOptions = {
  color?: boolean;
};

const LABELS: Record<SlotStatus, string> = {
  VOTE_FOUND: 'VOTE FOUND',
  NO_VOTE_IN_BLOCK: 'MISSING VOTE',
  BLOCK_MISSING: 'NO BLOCK',
  LEADER_SKIPPED_SLOT: 'SKIPPED',
  ERRORED: 'ERRORED',
};

const LABEL_WIDTH = 12;

export function renderReport(report: Report, options: RenderOptions = {}): string {
  const c = pc.createColors(options.color ?? false);
  const { request, summary } = report;
  const oldest = request.startSlot - request.distance + 1;

  const lines = [
    `${c.bold('Account:')} ${request.targetAccount}`,
    `${c.bold('Slots:')}   ${oldest}..${request.startSlot} (${request.distance}, newest first)`,
    '',
    ...report.outcomes.map((outcome) => formatOutcome(outcome, c)),
    '',
    formatSummary(report, c),
  ];
  if (summary.NO_VOTE_IN_BLOCK > 0) {
    lines.push(c.red(`${summary.NO_VOTE_IN_BLOCK} slot(s) led by this validator carry no vote from it`));
  }
  return lines.join('\n');
}

export function formatOutcome(outcome: SlotOutcome, c: Colors = pc.createColors(false)): string {
  const label = colorFor(outcome.status, c)(LABELS[outcome.status].padEnd(LABEL_WIDTH));
  const details = describe(outcome);
  if (outcome.attempts > 1) {
    details.push(`attempts=${outcome.attempts}`);
  }
  return [String(outcome.slot), label, ...details].join('  ').trimEnd();
}

export function formatSummary(report: Report, c: Colors = pc.createColors(false)): string {
  const { summary } = report;
  return [
    `${c.bold('Summary:')} ${summary.total} slots`,
    c.green(`${summary.VOTE_FOUND} found`),
    c.red(`${summary.NO_VOTE_IN_BLOCK} missing`),
    c.yellow(`${summary.BLOCK_MISSING} no block`),
    c.dim(`${summary.LEADER_SKIPPED_SLOT} skipped`),
    c.magenta(`${summary.ERRORED} errored`),
  ].join(', ');
}

function describe(outcome: SlotOutcome): string[] {
  switch (outcome.status) {
    case 'VOTE_FOUND':
      return [
        `votes=${outcome.voteCount}`,
        ...outcome.votes.map((vote) => `#${vote.position} voted=${vote.votedSlot ?? '?'} sig=${vote.signature}`),
      ];
    case 'NO_VOTE_IN_BLOCK':
      return [`votes=${outcome.voteCount}`, `leader=${outcome.leader ?? 'unknown'}`];
    case 'BLOCK_MISSING':
      return [`leader=${outcome.leader ?? 'unknown'}`];
    case 'LEADER_SKIPPED_SLOT':
      return outcome.reason === 'slot_skipped'
        ? ['slot skipped']
        : ['not leader', `leader=${outcome.leader ?? 'unknown'}`];
    case 'ERRORED':
      return [`${outcome.error.kind}: ${outcome.error.message}`];
  }
}

function colorFor(status: SlotStatus, c: Colors): (text: string) => string {
  switch (status) {
    case 'VOTE_FOUND':
      return c.green;
    case 'NO_VOTE_IN_BLOCK':
      return c.red;
    case 'BLOCK_MISSING':
      return c.yellow;
    case 'LEADER_SKIPPED_SLOT':
      return c.dim;
    case 'ERRORED':
      return c.magenta;
  }
}
