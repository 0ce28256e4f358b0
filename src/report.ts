import { IncompleteReportError } from './errors.js';
import type { Report, ReportSummary, ScanRequest, SlotOutcome } from './types.js';

/**
 * Slots covered by a request, in scan order: newest (`startSlot`) first,
 * down to `startSlot - distance + 1`. Yielded lazily; `distance` may be large.
 */
export function* slotRange(request: ScanRequest): Generator<number, void, undefined> {
  for (let offset = 0; offset < request.distance; offset += 1) {
    yield request.startSlot - offset;
  }
}

export class ReportAggregator {
  private readonly request: ScanRequest;
  private readonly outcomes = new Map<number, SlotOutcome>();

  constructor(request: ScanRequest) {
    this.request = request;
  }

  record(outcome: SlotOutcome): void {
    const { slot } = outcome;
    if (slot > this.request.startSlot || slot <= this.request.startSlot - this.request.distance) {
      throw new RangeError(`Slot ${slot} is outside the scanned range`);
    }
    if (this.outcomes.has(slot)) {
      throw new Error(`Slot ${slot} already has an outcome`);
    }
    this.outcomes.set(slot, Object.freeze({ ...outcome }));
  }

  /** Builds the report from scratch on every call; safe to call repeatedly. */
  finalize(): Report {
    const missing: number[] = [];
    const outcomes: SlotOutcome[] = [];
    for (const slot of slotRange(this.request)) {
      const outcome = this.outcomes.get(slot);
      if (outcome) {
        outcomes.push(outcome);
      } else {
        missing.push(slot);
      }
    }
    if (missing.length > 0) {
      throw new IncompleteReportError(missing);
    }

    return Object.freeze({
      request: this.request,
      outcomes,
      summary: summarize(outcomes),
    });
  }
}

export function summarize(outcomes: SlotOutcome[]): ReportSummary {
  const summary: ReportSummary = {
    total: outcomes.length,
    VOTE_FOUND: 0,
    NO_VOTE_IN_BLOCK: 0,
    BLOCK_MISSING: 0,
    LEADER_SKIPPED_SLOT: 0,
    ERRORED: 0,
  };
  for (const outcome of outcomes) {
    summary[outcome.status] += 1;
  }
  return summary;
}
