/**
 * Operation context handed to the views.
 *
 * `state` is a draft: the views mutate it freely and the pool commits it,
 * together with the buffered events and notifications, only if the view
 * returns without throwing.
 */

import type { PoolParams, RewardNotificationV1 } from "@valpool/protocol";
import type { CheckpointStorage } from "./checkpoint-storage/types.js";
import type { EventPayload, PoolEventType } from "./event-log/schemas.js";
import type { PoolState } from "./state.js";

export interface PoolTx {
  readonly state: PoolState;
  readonly params: PoolParams;
  readonly storage: CheckpointStorage;
  /** Single time snapshot for the whole operation (s). */
  readonly now: number;
  emit(type: PoolEventType, payload: EventPayload): void;
  notify(notification: RewardNotificationV1): void;
}
