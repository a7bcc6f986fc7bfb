/**
 * Event log schemas — append-only pool events.
 *
 * Every committed mutation appends one or more events. Amounts are decimal
 * strings so the log serializes to JSON as-is.
 */

import { Type, type Static } from "@sinclair/typebox";

/** Base envelope for all pool events. */
export const EventEnvelope = Type.Object({
  /** Event type discriminator. */
  type: Type.String(),
  /** Monotonic sequence number within the log. */
  seq: Type.Integer({ minimum: 0 }),
  /** L1 time of the operation that produced the event (s). */
  timestamp: Type.Integer({ minimum: 0 }),
  /** Event-specific payload. */
  payload: Type.Record(Type.String(), Type.Union([Type.String(), Type.Number(), Type.Null()])),
});

export type EventEnvelope = Static<typeof EventEnvelope>;

export type EventPayload = EventEnvelope["payload"];

// ── Event types ────────────────────────────────────────────────────

export const DEPOSIT_EVENT = "pool.deposit.v1" as const;
export const WITHDRAW_EVENT = "pool.withdraw.v1" as const;
export const VALIDATOR_JOIN_EVENT = "validator.join.v1" as const;
export const VALIDATOR_LEAVE_EVENT = "validator.leave.v1" as const;
export const BOND_CREATE_EVENT = "bond.create.v1" as const;
export const BOND_INCREASE_EVENT = "bond.increase.v1" as const;
export const BOND_RELEASE_EVENT = "bond.release.v1" as const;

export type PoolEventType =
  | typeof DEPOSIT_EVENT
  | typeof WITHDRAW_EVENT
  | typeof VALIDATOR_JOIN_EVENT
  | typeof VALIDATOR_LEAVE_EVENT
  | typeof BOND_CREATE_EVENT
  | typeof BOND_INCREASE_EVENT
  | typeof BOND_RELEASE_EVENT;
