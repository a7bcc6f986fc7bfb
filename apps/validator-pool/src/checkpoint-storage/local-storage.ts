/**
 * Local checkpoint storage — in-process stand-in for the L1 contract.
 *
 * Used by tests and by the service in dev mode. Mirrors the contract's
 * submission rules:
 *   - checkpoints commit to every `submissionInterval`-th L2 block, in order
 *   - a block can only be checkpointed once its L2 timestamp has passed
 *   - only the validator on turn may submit, anyone during a public round
 *   - every accepted checkpoint is bonded with minBondAmount, expiring after
 *     the finalization period
 */

import {
  computeL2Timestamp,
  maySubmit,
  normalizeAddress,
  shortAddress,
  type Address,
  type L2Clock,
} from "@valpool/protocol";
import { PoolError } from "../errors.js";
import type { ValidatorPool } from "../pool.js";
import type { Checkpoint, CheckpointStorage } from "./types.js";

export interface LocalCheckpointStorageOptions {
  /** Address the storage calls the pool as. */
  address: Address;
  clock: L2Clock;
  /** L2 blocks between consecutive checkpoints. */
  submissionInterval: number;
  /** L2 block the chain of checkpoints starts after. Default 0. */
  startingBlockNumber?: number;
}

export interface SubmitCheckpointInput {
  submitter: string;
  outputRoot: string;
  blockNumber: number;
}

export class LocalCheckpointStorage implements CheckpointStorage {
  readonly address: Address;
  private readonly clock: L2Clock;
  private readonly submissionInterval: number;
  private readonly startingBlockNumber: number;
  private readonly checkpoints: Checkpoint[] = [];

  constructor(opts: LocalCheckpointStorageOptions) {
    this.address = opts.address;
    this.clock = opts.clock;
    this.submissionInterval = opts.submissionInterval;
    this.startingBlockNumber = opts.startingBlockNumber ?? 0;
  }

  nextExpectedIndex(): number {
    return this.checkpoints.length;
  }

  nextExpectedBlockNumber(): number {
    return this.startingBlockNumber + (this.checkpoints.length + 1) * this.submissionInterval;
  }

  latestAcceptedIndex(): number | null {
    return this.checkpoints.length > 0 ? this.checkpoints.length - 1 : null;
  }

  getCheckpoint(index: number): Checkpoint | undefined {
    return this.checkpoints[index];
  }

  expectedDeadline(blockNumber: number): number {
    return computeL2Timestamp(this.clock, blockNumber);
  }

  /**
   * Accept a checkpoint and bond it. If bonding fails the checkpoint is
   * dropped again and the pool error propagates.
   */
  submitCheckpoint(pool: ValidatorPool, input: SubmitCheckpointInput, now: number): Checkpoint {
    const submitter = normalizeAddress(input.submitter);
    if (submitter === null) {
      throw new PoolError("InvalidAddress", `not an address: ${input.submitter}`);
    }

    const expected = this.nextExpectedBlockNumber();
    if (input.blockNumber !== expected) {
      throw new PoolError(
        "UnexpectedCheckpoint",
        `expected L2 block ${expected}, got ${input.blockNumber}`,
      );
    }
    if (this.expectedDeadline(input.blockNumber) > now) {
      throw new PoolError(
        "UnexpectedCheckpoint",
        `L2 block ${input.blockNumber} is not produced until ${this.expectedDeadline(input.blockNumber)}`,
      );
    }

    const turn = pool.nextValidator(now);
    if (!maySubmit(turn, submitter)) {
      throw new PoolError("OutOfTurn", `${shortAddress(submitter)} is not the validator on turn`);
    }

    const checkpoint: Checkpoint = {
      index: this.checkpoints.length,
      submitter,
      outputRoot: input.outputRoot,
      blockNumber: input.blockNumber,
      timestamp: now,
    };
    this.checkpoints.push(checkpoint);

    try {
      pool.createBond(
        this.address,
        checkpoint.index,
        pool.params.minBondAmount,
        now + pool.params.finalizationPeriod,
        now,
      );
    } catch (err) {
      this.checkpoints.pop();
      throw err;
    }

    return checkpoint;
  }
}
