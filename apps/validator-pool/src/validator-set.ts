/**
 * Ordered validator set.
 *
 * members[]   — rotation order
 * positions   — address → index into members
 * lastServed  — index of the member whose turn was last consumed, -1 if none
 *
 * Removal closes the gap in place so the relative order of the remaining
 * members never changes, and lastServed is shifted with them. Re-entry
 * always appends, which puts a returning validator at the end of the cycle.
 */

import { rotationIndex, type Address } from "@valpool/protocol";

export interface ValidatorSet {
  members: Address[];
  positions: Map<Address, number>;
  lastServed: number;
}

export function createValidatorSet(): ValidatorSet {
  return { members: [], positions: new Map(), lastServed: -1 };
}

export function hasMember(set: ValidatorSet, address: Address): boolean {
  return set.positions.has(address);
}

/** Append if absent. Returns true when the set changed. */
export function addMember(set: ValidatorSet, address: Address): boolean {
  if (set.positions.has(address)) return false;
  set.positions.set(address, set.members.length);
  set.members.push(address);
  return true;
}

/** Order-preserving removal. Returns true when the set changed. */
export function removeMember(set: ValidatorSet, address: Address): boolean {
  const index = set.positions.get(address);
  if (index === undefined) return false;

  set.members.splice(index, 1);
  set.positions.delete(address);
  for (let i = index; i < set.members.length; i++) {
    const member = set.members[i];
    if (member !== undefined) set.positions.set(member, i);
  }

  // Whoever followed the removed member keeps their turn.
  if (index <= set.lastServed) set.lastServed--;
  return true;
}

/** Consume the current turn. No-op on an empty set. */
export function advanceTurn(set: ValidatorSet): void {
  if (set.members.length === 0) return;
  set.lastServed = rotationIndex(set.lastServed, set.members.length);
}
