/**
 * Validator pool service configuration.
 * All env access centralized here — no direct process.env elsewhere.
 */

import {
  FINALIZATION_PERIOD_SECS_DEFAULT,
  L2_BLOCK_TIME_SECS_DEFAULT,
  MIN_BOND_AMOUNT_DEFAULT,
  NON_PENALTY_PERIOD_SECS_DEFAULT,
  PENALTY_PERIOD_SECS_DEFAULT,
  PUBLIC_ROUND_ADDRESS,
  REWARD_GAS_LIMIT_DEFAULT,
  SUBMISSION_INTERVAL_BLOCKS_DEFAULT,
  type PoolParams,
} from "@valpool/protocol";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export const config = {
  port: parseInt(env("POOL_PORT", "3300"), 10),
  host: env("POOL_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info"),

  // ── Pool parameters ──────────────────────────────────────────
  /** Eligibility threshold and bond size, in wei. */
  minBondAmount: BigInt(env("MIN_BOND_AMOUNT", MIN_BOND_AMOUNT_DEFAULT.toString())),
  nonPenaltyPeriod: parseInt(env("NON_PENALTY_PERIOD_SECS", String(NON_PENALTY_PERIOD_SECS_DEFAULT)), 10),
  penaltyPeriod: parseInt(env("PENALTY_PERIOD_SECS", String(PENALTY_PERIOD_SECS_DEFAULT)), 10),
  finalizationPeriod: parseInt(
    env("FINALIZATION_PERIOD_SECS", String(FINALIZATION_PERIOD_SECS_DEFAULT)),
    10,
  ),
  publicRoundAddress: env("PUBLIC_ROUND_ADDRESS", PUBLIC_ROUND_ADDRESS).toLowerCase(),
  /** Caller allowed to create bonds. Defaults to a fixed dev address. */
  checkpointStorageAddress: env(
    "CHECKPOINT_STORAGE_ADDRESS",
    "0x00000000000000000000000000000000000000a1",
  ).toLowerCase(),
  /** Caller allowed to increase bonds. */
  disputeAddress: env("DISPUTE_ADDRESS", "0x00000000000000000000000000000000000000a2").toLowerCase(),
  rewardVaultAddress: env(
    "REWARD_VAULT_ADDRESS",
    "0x00000000000000000000000000000000000000a3",
  ).toLowerCase(),
  rewardGasLimit: parseInt(env("REWARD_GAS_LIMIT", String(REWARD_GAS_LIMIT_DEFAULT)), 10),

  // ── Local checkpoint storage (dev mode) ──────────────────────
  /** L1 time of L2 block 0 (s). 0 = Unix epoch. */
  l2GenesisTime: parseInt(env("L2_GENESIS_TIME", "0"), 10),
  l2BlockTime: parseInt(env("L2_BLOCK_TIME_SECS", String(L2_BLOCK_TIME_SECS_DEFAULT)), 10),
  submissionInterval: parseInt(
    env("SUBMISSION_INTERVAL_BLOCKS", String(SUBMISSION_INTERVAL_BLOCKS_DEFAULT)),
    10,
  ),

  // ── Reward relay ─────────────────────────────────────────────
  /** Bridge relay API. Empty = dev mode, notifications stay queued. */
  bridgeUrl: env("BRIDGE_URL", ""),
  bridgeAuthToken: env("BRIDGE_AUTH_TOKEN", ""),
  /** Outbox drain interval (ms). 0 = disabled. */
  relayIntervalMs: parseInt(env("RELAY_INTERVAL_MS", "15000"), 10),
  /** Outbox size in dev mode, where nothing drains it. Oldest entries are dropped. */
  devOutboxCapacity: parseInt(env("DEV_OUTBOX_CAPACITY", "1000"), 10),
} as const;

export function poolParamsFromConfig(): PoolParams {
  return {
    minBondAmount: config.minBondAmount,
    nonPenaltyPeriod: config.nonPenaltyPeriod,
    penaltyPeriod: config.penaltyPeriod,
    finalizationPeriod: config.finalizationPeriod,
    publicRoundAddress: config.publicRoundAddress,
    checkpointStorage: config.checkpointStorageAddress,
    dispute: config.disputeAddress,
    rewardVault: config.rewardVaultAddress,
    rewardGasLimit: config.rewardGasLimit,
  };
}
