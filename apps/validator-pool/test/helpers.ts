/**
 * Shared fixtures for pool tests.
 */

import { expect } from "vitest";
import { pino } from "pino";
import { computeL2Timestamp, type PoolParams } from "@valpool/protocol";
import { ValidatorPool } from "../src/pool.js";
import { InMemoryCustody } from "../src/custody.js";
import { LocalCheckpointStorage } from "../src/checkpoint-storage/local-storage.js";
import type { Checkpoint, CheckpointStorage } from "../src/checkpoint-storage/types.js";
import { isPoolError, type PoolErrorCode } from "../src/errors.js";

export const addr = (byte: string): string => "0x" + byte.repeat(20);

export const V = addr("11");
export const A = addr("aa");
export const B = addr("bb");
export const C = addr("cc");

export const STORAGE = addr("a1");
export const DISPUTE = addr("a2");
export const VAULT = addr("a3");
export const PUBLIC = addr("00");

/** L2 block k × 10 is expected at GENESIS + 20k. */
export const GENESIS = 1_000_000;
export const CLOCK = { genesisTime: GENESIS, blockTime: 2 };
export const INTERVAL = 10;

export const params: PoolParams = {
  minBondAmount: 100n,
  nonPenaltyPeriod: 600,
  penaltyPeriod: 1200,
  finalizationPeriod: 3600,
  publicRoundAddress: PUBLIC,
  checkpointStorage: STORAGE,
  dispute: DISPUTE,
  rewardVault: VAULT,
  rewardGasLimit: 300_000,
};

export const silentLogger = pino({ level: "silent" });

export const ROOT = "0x" + "ee".repeat(32);

/** Pool wired to the in-process checkpoint storage. */
export function setupLocal() {
  const storage = new LocalCheckpointStorage({
    address: STORAGE,
    clock: CLOCK,
    submissionInterval: INTERVAL,
  });
  const custody = new InMemoryCustody();
  const pool = new ValidatorPool({ params, storage, custody, logger: silentLogger });

  /** Submit the next expected checkpoint as `submitter` at `now`. */
  const submit = (submitter: string, now: number) =>
    storage.submitCheckpoint(
      pool,
      { submitter, outputRoot: ROOT, blockNumber: storage.nextExpectedBlockNumber() },
      now,
    );

  /** Fund a wallet and deposit all of it. */
  const stake = (who: string, amount: bigint, now = GENESIS) => {
    custody.fund(who, amount);
    return pool.deposit(who, amount, now);
  };

  return { storage, custody, pool, submit, stake };
}

/** Checkpoint storage whose records are set directly by the test. */
export class StubCheckpointStorage implements CheckpointStorage {
  readonly checkpoints = new Map<number, Checkpoint>();

  record(index: number, submitter: string, blockNumber: number, timestamp: number): Checkpoint {
    const checkpoint = { index, submitter, outputRoot: ROOT, blockNumber, timestamp };
    this.checkpoints.set(index, checkpoint);
    return checkpoint;
  }

  nextExpectedIndex(): number {
    return this.checkpoints.size;
  }

  nextExpectedBlockNumber(): number {
    return (this.checkpoints.size + 1) * INTERVAL;
  }

  latestAcceptedIndex(): number | null {
    return this.checkpoints.size > 0 ? this.checkpoints.size - 1 : null;
  }

  getCheckpoint(index: number): Checkpoint | undefined {
    return this.checkpoints.get(index);
  }

  expectedDeadline(blockNumber: number): number {
    return computeL2Timestamp(CLOCK, blockNumber);
  }
}

/** Pool wired to a stub storage, for driving createBond directly. */
export function setupStub() {
  const storage = new StubCheckpointStorage();
  const custody = new InMemoryCustody();
  const pool = new ValidatorPool({ params, storage, custody, logger: silentLogger });
  const stake = (who: string, amount: bigint, now = GENESIS) => {
    custody.fund(who, amount);
    return pool.deposit(who, amount, now);
  };
  return { storage, custody, pool, stake };
}

/** Assert that `fn` throws a PoolError with the given code. */
export function expectPoolError(fn: () => unknown, code: PoolErrorCode): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(isPoolError(caught, code)).toBe(true);
}
