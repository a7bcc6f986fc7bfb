/**
 * Pool state — the single owned state object.
 *
 * Operations never mutate the live state directly: they run against a
 * clone and the pool swaps it in once the operation has completed.
 */

import type { Address } from "@valpool/protocol";
import { createValidatorSet, type ValidatorSet } from "./validator-set.js";

export interface Bond {
  /** Stake at risk. */
  amount: bigint;
  /** L1 time (s) after which the bond may be released. */
  expiresAt: number;
  /** Credited when the bond is released. */
  submitter: Address;
}

export interface PoolState {
  /** Unbonded stake per address. Zero balances are deleted. */
  balances: Map<Address, bigint>;
  /** Addresses with balance ≥ minBondAmount, in rotation order, with the turn pointer. */
  validators: ValidatorSet;
  /** checkpoint index → bond */
  bonds: Map<number, Bond>;
  /** Checkpoint indices with an outstanding bond, ascending. */
  pending: number[];
}

export function createPoolState(): PoolState {
  return {
    balances: new Map(),
    validators: createValidatorSet(),
    bonds: new Map(),
    pending: [],
  };
}

export function cloneState(state: PoolState): PoolState {
  return structuredClone(state);
}

/** Insert keeping `pending` ascending. */
export function enqueuePending(state: PoolState, index: number): void {
  let i = state.pending.length;
  while (i > 0 && (state.pending[i - 1] ?? -1) > index) i--;
  state.pending.splice(i, 0, index);
}

export function dequeuePending(state: PoolState, index: number): void {
  const i = state.pending.indexOf(index);
  if (i >= 0) state.pending.splice(i, 1);
}
