/**
 * Schema barrel export.
 * All V1 wire types used across the pool.
 */

export { AddressSchema, AmountString, Hex32 } from "./address.js";
export { PoolParams } from "./pool-params.js";
export { BondV1 } from "./bond.js";
export { CheckpointV1 } from "./checkpoint.js";
export { RewardNotificationV1 } from "./reward.js";
