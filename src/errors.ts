import type { RpcErrorKind } from './types.js';

export class RpcError extends Error {
  readonly kind: RpcErrorKind;

  constructor(kind: RpcErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RpcError';
    this.kind = kind;
  }
}

export class InvalidScanRequestError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid scan request: ${issues.join('; ')}`);
    this.name = 'InvalidScanRequestError';
    this.issues = issues;
  }
}

/** Raised when a setup probe against the endpoint fails; aborts the run. */
export class SetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SetupError';
  }
}

export class LeaderScheduleError extends Error {
  readonly epoch: number | undefined;

  constructor(epoch: number | undefined, cause: RpcError) {
    const scope = epoch === undefined ? 'epoch schedule' : `leader schedule for epoch ${epoch}`;
    super(`Could not fetch ${scope}: ${cause.message}`, { cause });
    this.name = 'LeaderScheduleError';
    this.epoch = epoch;
  }
}

export class IncompleteReportError extends Error {
  readonly missingSlots: number[];

  constructor(missingSlots: number[]) {
    super(`Report is missing ${missingSlots.length} slot(s): ${missingSlots.slice(0, 10).join(', ')}`);
    this.name = 'IncompleteReportError';
    this.missingSlots = missingSlots;
  }
}

export class ScanAbortedError extends Error {
  constructor() {
    super('Scan aborted');
    this.name = 'ScanAbortedError';
  }
}
