/**
 * Checkpoint storage interface — the L1 contract that records state roots.
 *
 * The pool reads checkpoints and deadlines through this interface; the
 * storage calls back into the pool to bond each accepted checkpoint.
 */

import type { Address } from "@valpool/protocol";

export interface Checkpoint {
  index: number;
  submitter: Address;
  /** 0x-prefixed 32-byte state root. */
  outputRoot: string;
  /** L2 block the root commits to. */
  blockNumber: number;
  /** L1 time the checkpoint was accepted (s). */
  timestamp: number;
}

export interface CheckpointStorage {
  /** Index the next accepted checkpoint will get. */
  nextExpectedIndex(): number;
  /** L2 block number the next checkpoint must commit to. */
  nextExpectedBlockNumber(): number;
  /** Index of the most recent checkpoint, null before the first. */
  latestAcceptedIndex(): number | null;
  getCheckpoint(index: number): Checkpoint | undefined;
  /** L1 time at which `blockNumber` is expected to exist (s). */
  expectedDeadline(blockNumber: number): number;
}
