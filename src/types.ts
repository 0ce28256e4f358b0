import type { RpcError } from './errors.js';

export type RpcErrorKind = 'RateLimited' | 'Transient' | 'SlotSkipped' | 'NotFound' | 'Fatal';

export type SlotStatus =
  | 'VOTE_FOUND'
  | 'NO_VOTE_IN_BLOCK'
  | 'BLOCK_MISSING'
  | 'LEADER_SKIPPED_SLOT'
  | 'ERRORED';

export type SlotState = 'PENDING' | 'FETCHING' | 'RETRYING' | 'SUCCEEDED' | 'EXHAUSTED';

export type ScanRequest = {
  readonly rpcUrl: string;
  readonly targetAccount: string;
  readonly identity?: string;
  readonly startSlot: number;
  readonly distance: number;
};

export type DecodedInstruction = {
  programId: string;
  accounts: string[];
  data: Uint8Array;
};

export type DecodedTransaction = {
  signature: string;
  accountKeys: string[];
  instructions: DecodedInstruction[];
};

export type BlockSummary = {
  slot: number;
  blockhash: string;
  transactions: DecodedTransaction[];
};

export type VoteInstructionName =
  | 'Vote'
  | 'VoteSwitch'
  | 'UpdateVoteState'
  | 'UpdateVoteStateSwitch'
  | 'CompactUpdateVoteState'
  | 'CompactUpdateVoteStateSwitch'
  | 'TowerSync'
  | 'TowerSyncSwitch';

export type VoteRecord = {
  signature: string;
  signer: string;
  voteAccount: string;
  instruction: VoteInstructionName;
  votedSlot?: number;
  /** Zero-based index among the block's vote instructions. */
  position: number;
};

/** Slot number to leader identity, for one epoch. */
export type LeaderSchedule = ReadonlyMap<number, string>;

type OutcomeBase = {
  slot: number;
  attempts: number;
  leader?: string;
};

export type SlotOutcome =
  | (OutcomeBase & { status: 'VOTE_FOUND'; voteCount: number; votes: VoteRecord[] })
  | (OutcomeBase & { status: 'NO_VOTE_IN_BLOCK'; voteCount: number })
  | (OutcomeBase & { status: 'BLOCK_MISSING' })
  | (OutcomeBase & {
      status: 'LEADER_SKIPPED_SLOT';
      reason: 'slot_skipped' | 'not_leader';
      voteCount?: number;
    })
  | (OutcomeBase & { status: 'ERRORED'; error: { kind: RpcErrorKind; message: string } });

export type ReportSummary = Record<SlotStatus, number> & { total: number };

export type Report = {
  request: ScanRequest;
  outcomes: SlotOutcome[];
  summary: ReportSummary;
};

export type RetryState = {
  consecutiveFailures: number;
  lastErrorKind?: RpcErrorKind;
  lastError?: RpcError;
  emptyResult: boolean;
};

export type RpcCallResult<T> = { ok: true; value: T } | { ok: false; error: RpcError };
