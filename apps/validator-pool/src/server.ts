/**
 * Validator pool server — bonding, rotation and reward relay over HTTP.
 *
 * Owns: pool state, event log, reward outbox, local checkpoint storage.
 *
 * Routes:
 *   GET  /health                 — liveness + outbox depth
 *   POST /deposit                — credit stake
 *   POST /withdraw               — debit stake
 *   GET  /balances/:address      — balance + eligibility
 *   GET  /validators             — validator set in rotation order
 *   GET  /validators/next        — who may submit next (sentinel in a public round)
 *   POST /checkpoints            — submit + bond a checkpoint (local storage)
 *   GET  /bonds                  — outstanding bonds
 *   GET  /bonds/:index           — one bond
 *   POST /bonds/:index/increase  — dispute contract doubles a bond
 *   POST /bonds/:index/release   — release the oldest bond by index
 *   POST /unbond                 — release the oldest expired bond
 *   GET  /events                 — event log query
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify from "fastify";
import { HttpBridgeClient, type BridgeClient } from "@valpool/bridge-client";
import { toChecksumAddress } from "@valpool/protocol";
import { config, poolParamsFromConfig } from "./config.js";
import { InMemoryCustody, type StakeCustody } from "./custody.js";
import { POOL_ERROR_STATUS, isPoolError } from "./errors.js";
import { ValidatorPool } from "./pool.js";
import { LocalCheckpointStorage } from "./checkpoint-storage/local-storage.js";
import { createRewardRelayer } from "./relayer.js";
import { RewardNotifier } from "./reward-notifier.js";
import type { RouteContext } from "./routes/context.js";
import { healthRoutes } from "./routes/health.js";
import { ledgerRoutes } from "./routes/ledger.js";
import { bondRoutes } from "./routes/bonds.js";
import { eventRoutes } from "./routes/events.js";

export interface PoolServerDeps {
  storage?: LocalCheckpointStorage;
  custody?: StakeCustody;
  /** null = dev mode, notifications stay queued. */
  bridgeClient?: BridgeClient | null;
  /** Current L1 time (s). */
  now?: () => number;
}

/** Real bridge client from config, or null (dev mode). */
function createBridgeClient(): BridgeClient | null {
  if (!config.bridgeUrl) return null;
  return new HttpBridgeClient({ baseUrl: config.bridgeUrl, authToken: config.bridgeAuthToken });
}

export async function buildApp(deps?: PoolServerDeps) {
  const app = Fastify({ logger: { level: config.logLevel } });
  const now = deps?.now ?? (() => Math.floor(Date.now() / 1000));

  const params = poolParamsFromConfig();
  const storage =
    deps?.storage ??
    new LocalCheckpointStorage({
      address: params.checkpointStorage,
      clock: { genesisTime: config.l2GenesisTime, blockTime: config.l2BlockTime },
      submissionInterval: config.submissionInterval,
    });

  const bridgeClient = deps?.bridgeClient !== undefined ? deps.bridgeClient : createBridgeClient();
  const relaying = bridgeClient !== null && config.relayIntervalMs > 0;

  const pool = new ValidatorPool({
    params,
    storage,
    custody: deps?.custody ?? new InMemoryCustody({ mintOnDemand: true }),
    logger: app.log,
    notifier: new RewardNotifier({
      target: params.rewardVault,
      gasLimit: params.rewardGasLimit,
      capacity: relaying ? undefined : config.devOutboxCapacity,
    }),
  });

  if (bridgeClient && relaying) {
    const relayer = createRewardRelayer(pool.notifier, bridgeClient, {
      intervalMs: config.relayIntervalMs,
      onRelay: (receipt) => {
        app.log.info({ id: receipt.id, status: receipt.status }, "reward notification relayed");
      },
      onError: (err, id) => {
        app.log.error({ err, id }, "reward relay failed");
      },
    });
    app.addHook("onReady", async () => {
      relayer.start();
    });
    app.addHook("onClose", async () => {
      relayer.stop();
    });
  } else {
    app.log.info(
      { capacity: config.devOutboxCapacity },
      "reward relay disabled — notifications stay queued, oldest dropped when full",
    );
  }

  app.setErrorHandler((err, _request, reply) => {
    if (isPoolError(err)) {
      return reply.status(POOL_ERROR_STATUS[err.code]).send({ error: err.code, detail: err.message });
    }
    return reply.send(err);
  });

  const ctx: RouteContext = { pool, storage, now };
  healthRoutes(app, ctx);
  ledgerRoutes(app, ctx);
  bondRoutes(app, ctx);
  eventRoutes(app, ctx);

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── validator pool config ───");
  console.log(`  port:               ${config.port}`);
  console.log(`  min_bond:           ${config.minBondAmount.toString()}`);
  console.log(`  round:              ${config.nonPenaltyPeriod}s grace + ${config.penaltyPeriod}s penalty`);
  console.log(`  finalization:       ${config.finalizationPeriod}s`);
  console.log(`  checkpoint_storage: ${toChecksumAddress(config.checkpointStorageAddress)}`);
  console.log(`  dispute:            ${toChecksumAddress(config.disputeAddress)}`);
  console.log(`  reward_vault:       ${toChecksumAddress(config.rewardVaultAddress)}`);
  console.log(`  bridge_url:         ${config.bridgeUrl || "(none — dev mode)"}`);
  console.log("─────────────────────────────");

  const app = await buildApp();
  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
