/**
 * Validator rotation — round-robin turn selection.
 *
 * turn = validators[(lastServed + 1) mod count]
 *
 * `lastServed` is the set position of the validator whose turn was last
 * consumed by an accepted checkpoint (-1 before the first). The owner of the
 * set keeps it pointing at the right slot when members leave. Time only
 * matters for the liveness escape: once a full round has passed the next
 * checkpoint's deadline with no submission, nobody in particular is on turn
 * and any address may submit (public round).
 *
 * Used by:
 *   - The pool: to answer "who may submit next"
 *   - Checkpoint storage: to reject out-of-turn submissions
 */

import type { Address } from "./address.js";
import { isPublicRound, type RoundTiming } from "./round.js";

export type Turn =
  | { kind: "assigned"; validator: Address }
  | { kind: "public" };

export const PUBLIC_ROUND: Turn = Object.freeze({ kind: "public" });

export interface RotationInput {
  /** Ordered validator set. */
  validators: readonly Address[];
  /** Position of the last validator served, -1 when none has been. */
  lastServed: number;
  /** Expected deadline of the next checkpoint (s). */
  deadline: number;
  /** Current L1 time (s). */
  now: number;
}

/** Position in the set whose turn it is, or -1 when the set is empty. */
export function rotationIndex(lastServed: number, count: number): number {
  if (count <= 0) return -1;
  return (((lastServed + 1) % count) + count) % count;
}

export function selectNextValidator(timing: RoundTiming, input: RotationInput): Turn {
  const index = rotationIndex(input.lastServed, input.validators.length);
  const validator = input.validators[index];
  if (validator === undefined) return PUBLIC_ROUND;
  if (isPublicRound(timing, input.deadline, input.now)) return PUBLIC_ROUND;
  return { kind: "assigned", validator };
}

/** May `submitter` post the next checkpoint under this turn? */
export function maySubmit(turn: Turn, submitter: Address): boolean {
  return turn.kind === "public" || turn.validator === submitter;
}
