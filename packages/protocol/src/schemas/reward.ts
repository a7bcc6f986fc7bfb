/**
 * RewardNotificationV1 — forwarded across the bridge on every bond release.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressSchema } from "./address.js";

export const RewardNotificationV1 = Type.Object(
  {
    version: Type.Literal(1),
    beneficiary: AddressSchema,
    checkpoint_index: Type.Integer({ minimum: 0 }),
    block_number: Type.Integer({ minimum: 0 }),
    /** Seconds of penalized delay, 0..penalty_period. */
    penalty: Type.Integer({ minimum: 0 }),
    penalty_period: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type RewardNotificationV1 = Static<typeof RewardNotificationV1>;
