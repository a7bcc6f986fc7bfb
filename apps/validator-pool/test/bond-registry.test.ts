/**
 * Bond registry tests — create, increase, release, lazy drain.
 */

import { describe, it, expect } from "vitest";
import {
  A,
  B,
  C,
  DISPUTE,
  GENESIS,
  STORAGE,
  V,
  setupLocal,
  expectPoolError,
  setupStub,
} from "./helpers.js";

describe("bond lifecycle", () => {
  it("checkpoint bonds the submitter's stake until the finalization period ends", () => {
    const { pool, stake, submit } = setupLocal();
    stake(V, 100n);

    submit(V, 1_000_020);

    expect(pool.getBond(0)).toEqual({
      checkpointIndex: 0,
      amount: 100n,
      expiresAt: 1_003_620,
      submitter: V,
    });
    expect(pool.balanceOf(V)).toBe(0n);
    expect(pool.validatorCount()).toBe(0);
    expect(pool.nextReleaseIndex()).toBe(0);

    expectPoolError(() => pool.unbond(1_003_619), "NotYetExpired");

    expect(pool.unbond(1_003_620)).toEqual({
      checkpointIndex: 0,
      submitter: V,
      amount: 100n,
      penalty: 0,
    });
    expect(pool.balanceOf(V)).toBe(100n);
    expect(pool.isValidator(V)).toBe(true);
    expect(pool.nextReleaseIndex()).toBeNull();
    expectPoolError(() => pool.getBond(0), "NoSuchBond");
    expectPoolError(() => pool.unbond(1_003_621), "NoSuchBond");

    const [queued] = pool.notifier.pending();
    expect(queued?.notification).toEqual({
      version: 1,
      beneficiary: V,
      checkpoint_index: 0,
      block_number: 10,
      penalty: 0,
      penalty_period: 1200,
    });
  });

  it("records the event sequence of a full cycle", () => {
    const { pool, stake, submit } = setupLocal();
    stake(V, 100n);
    submit(V, 1_000_020);
    pool.unbond(1_003_620);

    expect(pool.events.getEvents().map((e) => e.type)).toEqual([
      "validator.join.v1",
      "pool.deposit.v1",
      "validator.leave.v1",
      "bond.create.v1",
      "validator.join.v1",
      "bond.release.v1",
    ]);
    expect(pool.events.getEventsByType("bond.create.v1")[0]?.payload).toEqual({
      checkpoint_index: 0,
      submitter: V,
      amount: "100",
      expires_at: 1_003_620,
    });
  });

  it("late submission carries a penalty into the reward notification", () => {
    const { pool, stake, submit } = setupLocal();
    stake(V, 100n);

    // deadline 1_000_020, 900s late → 300s into the penalty window
    submit(V, 1_000_920);

    const result = pool.unbond(1_000_920 + 3600);
    expect(result.penalty).toBe(300);
    expect(result.amount).toBe(100n);
    expect(pool.notifier.pending()[0]?.notification.penalty).toBe(300);
  });
});

describe("createBond", () => {
  it("only the checkpoint storage may create bonds", () => {
    const { pool, storage, stake } = setupStub();
    stake(A, 100n);
    storage.record(0, A, 10, 1_000_020);

    expectPoolError(() => pool.createBond(A, 0, 100n, 1_003_620, 1_000_020), "Unauthorized");
  });

  it("rejects amounts below the minimum", () => {
    const { pool, storage, stake } = setupStub();
    stake(A, 100n);
    storage.record(0, A, 10, 1_000_020);

    expectPoolError(
      () => pool.createBond(STORAGE, 0, 99n, 1_003_620, 1_000_020),
      "ZeroOrBelowMinimum",
    );
    expectPoolError(
      () => pool.createBond(STORAGE, 0, 0n, 1_003_620, 1_000_020),
      "ZeroOrBelowMinimum",
    );
  });

  it("one bond per checkpoint", () => {
    const { pool, storage, stake } = setupStub();
    stake(A, 300n);
    storage.record(0, A, 10, 1_000_020);

    pool.createBond(STORAGE, 0, 100n, 1_003_620, 1_000_020);
    expectPoolError(
      () => pool.createBond(STORAGE, 0, 100n, 1_003_620, 1_000_020),
      "BondAlreadyExists",
    );
    expect(pool.balanceOf(A)).toBe(200n);
  });

  it("rejects checkpoints storage has not recorded", () => {
    const { pool, stake } = setupStub();
    stake(A, 100n);
    expectPoolError(
      () => pool.createBond(STORAGE, 7, 100n, 1_003_620, 1_000_020),
      "UnknownCheckpoint",
    );
  });

  it("fails with InsufficientFunds when the submitter cannot cover the bond", () => {
    const { pool, storage, stake } = setupStub();
    stake(A, 50n);
    storage.record(0, A, 10, 1_000_020);

    expectPoolError(
      () => pool.createBond(STORAGE, 0, 100n, 1_003_620, 1_000_020),
      "InsufficientFunds",
    );
    expect(pool.balanceOf(A)).toBe(50n);
    expect(pool.pendingBonds()).toEqual([]);
  });

  it("lazily releases the oldest expired bond first", () => {
    const { pool, storage, stake } = setupStub();
    stake(A, 100n);
    stake(B, 100n);
    storage.record(0, A, 10, 1_000_020);
    storage.record(1, B, 20, 1_000_040);
    storage.record(2, B, 30, 1_000_060);

    pool.createBond(STORAGE, 0, 100n, 1_000_500, 1_000_020);
    pool.createBond(STORAGE, 1, 100n, 1_000_600, 1_000_040);
    expect(pool.balanceOf(A)).toBe(0n);
    expect(pool.balanceOf(B)).toBe(0n);

    // Both 0 and 1 have expired; only the head is drained.
    stake(B, 100n);
    pool.createBond(STORAGE, 2, 100n, 1_001_000, 1_000_700);

    expect(pool.balanceOf(A)).toBe(100n);
    expect(pool.pendingBonds().map((b) => b.checkpointIndex)).toEqual([1, 2]);
    expect(pool.notifier.size()).toBe(1);
  });

  it("a failed createBond also undoes the lazy release", () => {
    const { pool, storage, stake } = setupStub();
    stake(A, 100n);
    storage.record(0, A, 10, 1_000_020);
    storage.record(1, B, 20, 1_000_040);

    pool.createBond(STORAGE, 0, 100n, 1_000_500, 1_000_020);
    const eventsBefore = pool.events.getEventCount();

    expectPoolError(
      () => pool.createBond(STORAGE, 1, 100n, 1_002_000, 1_001_000),
      "InsufficientFunds",
    );

    expect(pool.balanceOf(A)).toBe(0n);
    expect(pool.nextReleaseIndex()).toBe(0);
    expect(pool.notifier.size()).toBe(0);
    expect(pool.events.getEventCount()).toBe(eventsBefore);
  });
});

describe("release", () => {
  it("releases strictly oldest first", () => {
    const { pool, storage, stake } = setupStub();
    stake(A, 200n);
    storage.record(0, A, 10, 1_000_020);
    storage.record(1, A, 20, 1_000_040);

    pool.createBond(STORAGE, 0, 100n, 1_001_000, 1_000_100);
    pool.createBond(STORAGE, 1, 100n, 1_000_500, 1_000_200);

    expectPoolError(() => pool.release(1, 1_000_600), "NotYetExpired");
    expectPoolError(() => pool.release(0, 1_000_600), "NotYetExpired");

    expect(pool.release(0, 1_001_000).checkpointIndex).toBe(0);
    expect(pool.release(1, 1_001_000).checkpointIndex).toBe(1);
    expect(pool.balanceOf(A)).toBe(200n);
  });

  it("unknown index is NoSuchBond", () => {
    const { pool } = setupStub();
    expectPoolError(() => pool.release(3, GENESIS), "NoSuchBond");
  });

  it("unbond with nothing outstanding is NoSuchBond", () => {
    const { pool } = setupStub();
    expectPoolError(() => pool.unbond(GENESIS), "NoSuchBond");
  });

  it("penalty comes from the stored checkpoint time", () => {
    const { pool, storage, stake } = setupStub();
    stake(A, 100n);
    storage.record(0, A, 10, 1_000_920);

    pool.createBond(STORAGE, 0, 100n, 1_000_920, 1_000_920);
    expect(pool.unbond(1_000_920).penalty).toBe(300);
  });
});

describe("increaseBond", () => {
  function withBond() {
    const ctx = setupLocal();
    ctx.stake(V, 100n);
    ctx.stake(C, 100n);
    ctx.submit(V, 1_000_020);
    return ctx;
  }

  it("challenger matches the bond, doubling it", () => {
    const { pool } = withBond();

    const bond = pool.increaseBond(DISPUTE, C, 0, 1_000_100);
    expect(bond.amount).toBe(200n);
    expect(pool.getBond(0).amount).toBe(200n);
    expect(pool.balanceOf(C)).toBe(0n);
    expect(pool.isValidator(C)).toBe(false);

    expectPoolError(() => pool.increaseBond(DISPUTE, C, 0, 1_000_200), "InsufficientFunds");
    expect(pool.getBond(0).amount).toBe(200n);
  });

  it("release pays the doubled amount to the submitter", () => {
    const { pool } = withBond();
    pool.increaseBond(DISPUTE, C, 0, 1_000_100);

    expect(pool.unbond(1_003_620).amount).toBe(200n);
    expect(pool.balanceOf(V)).toBe(200n);
  });

  it("only the dispute contract may increase", () => {
    const { pool } = withBond();
    expectPoolError(() => pool.increaseBond(A, C, 0, 1_000_100), "Unauthorized");
  });

  it("unknown checkpoint is NoSuchBond", () => {
    const { pool } = withBond();
    expectPoolError(() => pool.increaseBond(DISPUTE, C, 5, 1_000_100), "NoSuchBond");
  });

  it("finalized bonds cannot be challenged", () => {
    const { pool } = withBond();
    expect(pool.increaseBond(DISPUTE, C, 0, 1_003_620).amount).toBe(200n);

    const again = withBond();
    expectPoolError(
      () => again.pool.increaseBond(DISPUTE, C, 0, 1_003_621),
      "AlreadyFinalized",
    );
  });
});
