/**
 * PoolParams — parameters fixed when a pool is constructed.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressSchema } from "./address.js";

export const PoolParams = Type.Object(
  {
    /** Eligibility threshold and bond floor. */
    minBondAmount: Type.BigInt({ minimum: 1n }),
    nonPenaltyPeriod: Type.Integer({ minimum: 0 }),
    penaltyPeriod: Type.Integer({ minimum: 0 }),
    /** Seconds a bond stays locked after its checkpoint is accepted. */
    finalizationPeriod: Type.Integer({ minimum: 0 }),
    /** Rendered as "next validator" during a public round. */
    publicRoundAddress: AddressSchema,
    /** Only caller allowed to create bonds. */
    checkpointStorage: AddressSchema,
    /** Only caller allowed to increase bonds. */
    dispute: AddressSchema,
    /** Reward-distribution contract on L2 that receives notifications. */
    rewardVault: AddressSchema,
    /** Gas budget attached to each bridged reward notification. */
    rewardGasLimit: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type PoolParams = Static<typeof PoolParams>;
