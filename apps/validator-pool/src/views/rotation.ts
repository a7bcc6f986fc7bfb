/**
 * Rotation scheduler — who may submit the next checkpoint.
 *
 * Stateless beyond the pool state: the deadline comes from checkpoint
 * storage, the order and turn pointer from the validator set.
 */

import { selectNextValidator, type PoolParams, type Turn } from "@valpool/protocol";
import type { CheckpointStorage } from "../checkpoint-storage/types.js";
import type { PoolState } from "../state.js";

export function nextDeadline(storage: CheckpointStorage): number {
  return storage.expectedDeadline(storage.nextExpectedBlockNumber());
}

export function nextValidator(
  state: PoolState,
  params: PoolParams,
  storage: CheckpointStorage,
  now: number,
): Turn {
  return selectNextValidator(params, {
    validators: state.validators.members,
    lastServed: state.validators.lastServed,
    deadline: nextDeadline(storage),
    now,
  });
}
