/**
 * Reward notification payload.
 *
 * payload    = canonical(RewardNotificationV1)
 * message_id = SHA256(payload)
 *
 * The reward vault on L2 decodes the payload and mints the validator's
 * reward scaled by (penalty_period − penalty) / penalty_period.
 */

import type { Address } from "./address.js";
import { canonicalEncode, canonicalHash, toHex } from "./canonical.js";
import { REWARD_MESSAGE_VERSION } from "./constants.js";
import type { RewardNotificationV1 } from "./schemas/reward.js";

export interface RewardInput {
  beneficiary: Address;
  checkpointIndex: number;
  blockNumber: number;
  penalty: number;
  penaltyPeriod: number;
}

export function buildRewardNotification(input: RewardInput): RewardNotificationV1 {
  return {
    version: REWARD_MESSAGE_VERSION,
    beneficiary: input.beneficiary,
    checkpoint_index: input.checkpointIndex,
    block_number: input.blockNumber,
    penalty: input.penalty,
    penalty_period: input.penaltyPeriod,
  };
}

export function rewardMessageId(notification: RewardNotificationV1): string {
  return canonicalHash(notification);
}

/** 0x-prefixed hex payload handed to the bridge. */
export function encodeRewardPayload(notification: RewardNotificationV1): string {
  return `0x${toHex(canonicalEncode(notification))}`;
}
