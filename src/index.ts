export { scanSlots, scanSlot, classifyBlock } from './scan.js';
export type { ScanObserver, ScanDependencies } from './scan.js';
export { BackoffController, DEFAULT_BACKOFF, retryCall } from './backoff.js';
export type { BackoffOptions, Sleep } from './backoff.js';
export { LeaderScheduleResolver } from './leaders.js';
export { ReportAggregator, slotRange, summarize } from './report.js';
export { renderReport } from './render.js';
export { SolanaRpcClient, classifyRpcError } from './rpc.js';
export type { SlotRpc } from './rpc.js';
export { createScanRequest, parseScanConfig } from './config.js';
export { decodeVotedSlot, extractBlockVotes, extractVotes, findTargetVotes, VOTE_PROGRAM_ID } from './vote.js';
export * from './errors.js';
export type {
  BlockSummary,
  LeaderSchedule,
  Report,
  ReportSummary,
  RpcErrorKind,
  ScanRequest,
  SlotOutcome,
  SlotStatus,
  VoteRecord,
} from './types.js';
