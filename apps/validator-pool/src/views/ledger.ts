/**
 * Balance ledger — unbonded stake per address.
 *
 * Membership in the validator set is derived from the balance and kept in
 * sync on every mutation:
 *
 *   isValidator(a) ⇔ balance(a) ≥ minBondAmount
 */

import { shortAddress, type Address, type PoolParams } from "@valpool/protocol";
import { PoolError } from "../errors.js";
import type { StakeCustody } from "../custody.js";
import { addMember, hasMember, removeMember } from "../validator-set.js";
import type { PoolState } from "../state.js";
import type { PoolTx } from "../tx.js";
import {
  DEPOSIT_EVENT,
  WITHDRAW_EVENT,
  VALIDATOR_JOIN_EVENT,
  VALIDATOR_LEAVE_EVENT,
} from "../event-log/schemas.js";

// ── Reads ──────────────────────────────────────────────────────────

export function balanceOf(state: PoolState, address: Address): bigint {
  return state.balances.get(address) ?? 0n;
}

export function isValidator(state: PoolState, address: Address): boolean {
  return hasMember(state.validators, address);
}

export function validatorCount(state: PoolState): number {
  return state.validators.members.length;
}

export function isEligible(params: PoolParams, balance: bigint): boolean {
  return balance >= params.minBondAmount;
}

// ── Internal mutations ─────────────────────────────────────────────

function setBalance(tx: PoolTx, address: Address, balance: bigint): void {
  if (balance === 0n) tx.state.balances.delete(address);
  else tx.state.balances.set(address, balance);

  if (isEligible(tx.params, balance)) {
    if (addMember(tx.state.validators, address)) {
      tx.emit(VALIDATOR_JOIN_EVENT, { address, balance: balance.toString() });
    }
  } else if (removeMember(tx.state.validators, address)) {
    tx.emit(VALIDATOR_LEAVE_EVENT, { address, balance: balance.toString() });
  }
}

export function increaseBalance(tx: PoolTx, address: Address, amount: bigint): bigint {
  const next = balanceOf(tx.state, address) + amount;
  setBalance(tx, address, next);
  return next;
}

/** Throws InsufficientFunds when the balance cannot cover `amount`. */
export function decreaseBalance(tx: PoolTx, address: Address, amount: bigint): bigint {
  const current = balanceOf(tx.state, address);
  if (current < amount) {
    throw new PoolError(
      "InsufficientFunds",
      `${shortAddress(address)} has ${current.toString()}, needs ${amount.toString()}`,
    );
  }
  const next = current - amount;
  setBalance(tx, address, next);
  return next;
}

function requirePositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new PoolError("ZeroOrBelowMinimum", "amount must be positive");
  }
}

// ── Entry points ───────────────────────────────────────────────────

export function deposit(
  tx: PoolTx,
  custody: StakeCustody,
  address: Address,
  amount: bigint,
): bigint {
  requirePositive(amount);
  custody.collect(address, amount);
  const balance = increaseBalance(tx, address, amount);
  tx.emit(DEPOSIT_EVENT, { address, amount: amount.toString(), balance: balance.toString() });
  return balance;
}

export function withdraw(
  tx: PoolTx,
  custody: StakeCustody,
  address: Address,
  amount: bigint,
): bigint {
  requirePositive(amount);
  const balance = decreaseBalance(tx, address, amount);
  custody.payout(address, amount);
  tx.emit(WITHDRAW_EVENT, { address, amount: amount.toString(), balance: balance.toString() });
  return balance;
}
