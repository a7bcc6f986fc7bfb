/**
 * Shared route context.
 */

import type { BondV1 } from "@valpool/protocol";
import type { ValidatorPool, BondView } from "../pool.js";
import type { LocalCheckpointStorage } from "../checkpoint-storage/local-storage.js";

export interface RouteContext {
  pool: ValidatorPool;
  /** Null when checkpoints arrive from a real L1 storage contract. */
  storage: LocalCheckpointStorage | null;
  /** Current L1 time (s). */
  now: () => number;
}

export function bondToJson(bond: BondView): BondV1 {
  return {
    checkpoint_index: bond.checkpointIndex,
    amount: bond.amount.toString(),
    expires_at: bond.expiresAt,
    submitter: bond.submitter,
  };
}
