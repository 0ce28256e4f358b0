import { VoteProgram } from '@solana/web3.js';
import type { BlockSummary, DecodedTransaction, VoteInstructionName, VoteRecord } from './types.js';

export const VOTE_PROGRAM_ID = VoteProgram.programId.toBase58();

// Vote program instruction discriminants that cast a vote.
const VOTE_INSTRUCTIONS: ReadonlyMap<number, VoteInstructionName> = new Map([
  [2, 'Vote'],
  [6, 'VoteSwitch'],
  [8, 'UpdateVoteState'],
  [9, 'UpdateVoteStateSwitch'],
  [12, 'CompactUpdateVoteState'],
  [13, 'CompactUpdateVoteStateSwitch'],
  [14, 'TowerSync'],
  [15, 'TowerSyncSwitch'],
]);

const NO_ROOT = 0xffff_ffff_ffff_ffffn;

export function voteInstructionName(data: Uint8Array): VoteInstructionName | undefined {
  if (data.length < 4) {
    return undefined;
  }
  const tag = new DataView(data.buffer, data.byteOffset, data.byteLength).getUint32(0, true);
  return VOTE_INSTRUCTIONS.get(tag);
}

/**
 * Returns the newest slot a vote instruction votes on (the lockout with
 * confirmation count 1), or undefined when the payload cannot be read.
 */
export function decodeVotedSlot(data: Uint8Array): number | undefined {
  const name = voteInstructionName(data);
  if (!name) {
    return undefined;
  }
  const reader = new ByteReader(data, 4);
  try {
    switch (name) {
      case 'Vote':
      case 'VoteSwitch': {
        const count = reader.u64();
        let last: bigint | undefined;
        for (let i = 0n; i < count; i += 1n) {
          last = reader.u64();
        }
        return toSlot(last);
      }
      case 'UpdateVoteState':
      case 'UpdateVoteStateSwitch': {
        const count = reader.u64();
        let last: bigint | undefined;
        for (let i = 0n; i < count; i += 1n) {
          last = reader.u64();
          reader.u32();
        }
        return toSlot(last);
      }
      case 'CompactUpdateVoteState':
      case 'CompactUpdateVoteStateSwitch':
      case 'TowerSync':
      case 'TowerSyncSwitch': {
        const root = reader.u64();
        const count = reader.varint();
        let slot = root === NO_ROOT ? 0n : root;
        for (let i = 0n; i < count; i += 1n) {
          slot += reader.varint();
          reader.u8();
        }
        return count > 0n ? toSlot(slot) : undefined;
      }
    }
  } catch (error) {
    if (error instanceof RangeError) {
      return undefined;
    }
    throw error;
  }
}

/** `firstPosition` is the block-wide position of the transaction's first vote. */
export function extractVotes(tx: DecodedTransaction, firstPosition = 0): VoteRecord[] {
  const signer = tx.accountKeys[0] ?? '';
  const votes: VoteRecord[] = [];
  for (const ix of tx.instructions) {
    if (ix.programId !== VOTE_PROGRAM_ID) {
      continue;
    }
    const instruction = voteInstructionName(ix.data);
    if (!instruction) {
      continue;
    }
    votes.push({
      signature: tx.signature,
      signer,
      voteAccount: ix.accounts[0] ?? '',
      instruction,
      votedSlot: decodeVotedSlot(ix.data),
      position: firstPosition + votes.length,
    });
  }
  return votes;
}

export function extractBlockVotes(block: BlockSummary): VoteRecord[] {
  const votes: VoteRecord[] = [];
  for (const tx of block.transactions) {
    votes.push(...extractVotes(tx, votes.length));
  }
  return votes;
}

export type VoteTarget = {
  targetAccount: string;
  identity?: string;
};

/** Every vote cast by the target, in block order. */
export function findTargetVotes(votes: VoteRecord[], target: VoteTarget): VoteRecord[] {
  return votes.filter(
    (vote) =>
      vote.voteAccount === target.targetAccount ||
      vote.signer === target.targetAccount ||
      (target.identity !== undefined && vote.signer === target.identity),
  );
}

function toSlot(value: bigint | undefined): number | undefined {
  if (value === undefined || value > BigInt(Number.MAX_SAFE_INTEGER)) {
    return undefined;
  }
  return Number(value);
}

class ByteReader {
  private readonly view: DataView;
  private offset: number;

  constructor(data: Uint8Array, offset = 0) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.offset = offset;
  }

  u8(): number {
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  u32(): number {
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  u64(): bigint {
    const value = this.view.getBigUint64(this.offset, true);
    this.offset += 8;
    return value;
  }

  /** Unsigned LEB128. */
  varint(): bigint {
    let result = 0n;
    let shift = 0n;
    for (;;) {
      const byte = this.u8();
      result |= BigInt(byte & 0x7f) << shift;
      if ((byte & 0x80) === 0) {
        return result;
      }
      shift += 7n;
      if (shift > 63n) {
        throw new RangeError('varint too long');
      }
    }
  }
}
