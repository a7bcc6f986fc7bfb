/**
 * Protocol constants.
 *
 * FROZEN constants never change — breaking change = hard fork.
 * DEFAULT values are the parameters a pool is deployed with unless
 * overridden in the service config.
 */

// ── Frozen (never change) ──────────────────────────────────────────
export const REWARD_MESSAGE_VERSION = 1;

/** Sentinel reported as "next validator" while a public round is open. */
export const PUBLIC_ROUND_ADDRESS = "0x0000000000000000000000000000000000000000";

export const ADDRESS_PATTERN = "^0x[0-9a-f]{40}$";

// ── Defaults (deployment parameters) ───────────────────────────────
export const MIN_BOND_AMOUNT_DEFAULT = 200_000_000_000_000_000n; // 0.2 ETH in wei
export const NON_PENALTY_PERIOD_SECS_DEFAULT = 10 * 60; // 10 min grace after deadline
export const PENALTY_PERIOD_SECS_DEFAULT = 20 * 60; // 20 min of linear penalty
export const FINALIZATION_PERIOD_SECS_DEFAULT = 7 * 24 * 60 * 60; // 7 days

export const L2_BLOCK_TIME_SECS_DEFAULT = 2;
export const SUBMISSION_INTERVAL_BLOCKS_DEFAULT = 1_800; // one checkpoint per hour at 2s blocks

export const REWARD_GAS_LIMIT_DEFAULT = 300_000;
