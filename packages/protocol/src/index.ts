/**
 * @valpool/protocol — Pool protocol primitives.
 *
 * This package contains ONLY pure arithmetic and versioned schemas.
 * It has no I/O, no state.
 * The pool service imports from here, never the reverse.
 */

// Addresses
export {
  isAddress,
  normalizeAddress,
  toChecksumAddress,
  shortAddress,
  type Address,
} from "./address.js";

// Canonical encoding
export { canonicalEncode, canonicalHash, toHex } from "./canonical.js";

// Round / deadline arithmetic
export {
  roundDuration,
  computeL2Timestamp,
  isPublicRound,
  roundPhase,
  type RoundTiming,
  type RoundPhase,
  type L2Clock,
} from "./round.js";

// Penalty
export { computePenalty, rewardShareBps } from "./penalty.js";

// Rotation
export {
  selectNextValidator,
  rotationIndex,
  maySubmit,
  PUBLIC_ROUND,
  type Turn,
  type RotationInput,
} from "./rotation.js";

// Reward notification payload
export {
  buildRewardNotification,
  rewardMessageId,
  encodeRewardPayload,
  type RewardInput,
} from "./reward-message.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
