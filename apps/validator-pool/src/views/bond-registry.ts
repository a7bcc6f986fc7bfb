/**
 * Bond registry — one bond per accepted checkpoint.
 *
 * Lifecycle: created with the checkpoint → (optionally) doubled by a
 * challenger while pending → released once expired, oldest first.
 *
 * The pending queue is drained lazily: every createBond() first releases
 * the oldest bond if it has expired, so the backlog stays at about one
 * bond per finalization period without a separate job.
 */

import {
  buildRewardNotification,
  computePenalty,
  shortAddress,
  type Address,
} from "@valpool/protocol";
import { PoolError } from "../errors.js";
import { dequeuePending, enqueuePending, type Bond, type PoolState } from "../state.js";
import { advanceTurn } from "../validator-set.js";
import type { PoolTx } from "../tx.js";
import { decreaseBalance, increaseBalance } from "./ledger.js";
import {
  BOND_CREATE_EVENT,
  BOND_INCREASE_EVENT,
  BOND_RELEASE_EVENT,
} from "../event-log/schemas.js";

export interface ReleaseResult {
  checkpointIndex: number;
  submitter: Address;
  amount: bigint;
  penalty: number;
}

// ── Reads ──────────────────────────────────────────────────────────

export function getBond(state: PoolState, checkpointIndex: number): Bond {
  const bond = state.bonds.get(checkpointIndex);
  if (!bond) {
    throw new PoolError("NoSuchBond", `no bond for checkpoint ${checkpointIndex}`);
  }
  return bond;
}

/** Oldest outstanding bond index, or null when nothing is pending. */
export function nextReleaseIndex(state: PoolState): number | null {
  return state.pending[0] ?? null;
}

export function pendingBonds(state: PoolState): Array<Bond & { checkpointIndex: number }> {
  return state.pending.flatMap((checkpointIndex) => {
    const bond = state.bonds.get(checkpointIndex);
    return bond ? [{ checkpointIndex, ...bond }] : [];
  });
}

// ── Create ─────────────────────────────────────────────────────────

export function createBond(
  tx: PoolTx,
  caller: Address,
  checkpointIndex: number,
  amount: bigint,
  expiresAt: number,
): Bond {
  if (caller !== tx.params.checkpointStorage) {
    throw new PoolError("Unauthorized", `${shortAddress(caller)} is not the checkpoint storage`);
  }
  if (amount <= 0n || amount < tx.params.minBondAmount) {
    throw new PoolError(
      "ZeroOrBelowMinimum",
      `bond ${amount.toString()} is below the minimum ${tx.params.minBondAmount.toString()}`,
    );
  }
  if (tx.state.bonds.has(checkpointIndex)) {
    throw new PoolError("BondAlreadyExists", `bond for checkpoint ${checkpointIndex} already exists`);
  }
  const checkpoint = tx.storage.getCheckpoint(checkpointIndex);
  if (!checkpoint) {
    throw new PoolError("UnknownCheckpoint", `checkpoint ${checkpointIndex} is not recorded`);
  }

  // Accepted checkpoint consumes the current turn. This runs before any
  // balance moves so the pointer lands on the slot that was on turn.
  advanceTurn(tx.state.validators);

  // (a) lazy release of the oldest expired bond
  tryReleaseOldest(tx);

  // (b) debit the submitter
  decreaseBalance(tx, checkpoint.submitter, amount);

  // (c) store
  const bond: Bond = { amount, expiresAt, submitter: checkpoint.submitter };
  tx.state.bonds.set(checkpointIndex, bond);
  enqueuePending(tx.state, checkpointIndex);

  tx.emit(BOND_CREATE_EVENT, {
    checkpoint_index: checkpointIndex,
    submitter: checkpoint.submitter,
    amount: amount.toString(),
    expires_at: expiresAt,
  });

  return bond;
}

// ── Release ────────────────────────────────────────────────────────

function releaseBond(tx: PoolTx, checkpointIndex: number, bond: Bond): ReleaseResult {
  const checkpoint = tx.storage.getCheckpoint(checkpointIndex);
  if (!checkpoint) {
    throw new PoolError("UnknownCheckpoint", `checkpoint ${checkpointIndex} is not recorded`);
  }

  const deadline = tx.storage.expectedDeadline(checkpoint.blockNumber);
  const penalty = computePenalty(tx.params, deadline, checkpoint.timestamp);

  tx.notify(
    buildRewardNotification({
      beneficiary: bond.submitter,
      checkpointIndex,
      blockNumber: checkpoint.blockNumber,
      penalty,
      penaltyPeriod: tx.params.penaltyPeriod,
    }),
  );

  // Principal comes back whole; the penalty only scales the L2 reward.
  increaseBalance(tx, bond.submitter, bond.amount);
  tx.state.bonds.delete(checkpointIndex);
  dequeuePending(tx.state, checkpointIndex);

  tx.emit(BOND_RELEASE_EVENT, {
    checkpoint_index: checkpointIndex,
    submitter: bond.submitter,
    amount: bond.amount.toString(),
    penalty,
  });

  return { checkpointIndex, submitter: bond.submitter, amount: bond.amount, penalty };
}

/** Release the oldest bond if it has expired. Returns null otherwise. */
export function tryReleaseOldest(tx: PoolTx): ReleaseResult | null {
  const head = nextReleaseIndex(tx.state);
  if (head === null) return null;
  const bond = tx.state.bonds.get(head);
  if (!bond || tx.now < bond.expiresAt) return null;
  return releaseBond(tx, head, bond);
}

export function release(tx: PoolTx, checkpointIndex: number): ReleaseResult {
  const bond = getBond(tx.state, checkpointIndex);
  if (tx.now < bond.expiresAt) {
    throw new PoolError(
      "NotYetExpired",
      `bond ${checkpointIndex} expires at ${bond.expiresAt}, now ${tx.now}`,
    );
  }
  const head = nextReleaseIndex(tx.state);
  if (head !== checkpointIndex) {
    throw new PoolError(
      "NotYetExpired",
      `bond ${checkpointIndex} is queued behind bond ${String(head)}`,
    );
  }
  return releaseBond(tx, checkpointIndex, bond);
}

/** Release the oldest outstanding bond. */
export function unbond(tx: PoolTx): ReleaseResult {
  const head = nextReleaseIndex(tx.state);
  if (head === null) {
    throw new PoolError("NoSuchBond", "no outstanding bond to release");
  }
  return release(tx, head);
}

// ── Increase ───────────────────────────────────────────────────────

export function increaseBond(
  tx: PoolTx,
  caller: Address,
  challenger: Address,
  checkpointIndex: number,
): Bond {
  if (caller !== tx.params.dispute) {
    throw new PoolError("Unauthorized", `${shortAddress(caller)} is not the dispute contract`);
  }
  const bond = getBond(tx.state, checkpointIndex);
  if (tx.now > bond.expiresAt) {
    throw new PoolError("AlreadyFinalized", `checkpoint ${checkpointIndex} is already finalized`);
  }

  const added = bond.amount;
  decreaseBalance(tx, challenger, added);
  bond.amount += added;

  tx.emit(BOND_INCREASE_EVENT, {
    challenger,
    checkpoint_index: checkpointIndex,
    added: added.toString(),
  });

  return bond;
}
