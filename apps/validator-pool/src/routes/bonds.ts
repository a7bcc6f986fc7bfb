/**
 * Checkpoint + bond routes.
 *
 * POST /checkpoints              — submit a checkpoint (local storage only)
 * GET  /bonds                    — outstanding bonds, oldest first
 * GET  /bonds/:index             — one bond
 * POST /bonds/:index/increase    — dispute contract doubles a bond
 * POST /bonds/:index/release     — release a specific (oldest) bond
 * POST /unbond                   — release the oldest bond
 */

import type { FastifyInstance } from "fastify";
import { BondV1, rewardShareBps, type CheckpointV1, type PoolParams } from "@valpool/protocol";
import type { ReleaseResult } from "../views/bond-registry.js";
import {
  IncreaseBondRequest,
  IndexParams,
  SubmitCheckpointRequest,
} from "./schemas.js";
import { bondToJson, type RouteContext } from "./context.js";

function releaseToJson(params: PoolParams, result: ReleaseResult) {
  return {
    checkpoint_index: result.checkpointIndex,
    submitter: result.submitter,
    amount: result.amount.toString(),
    penalty: result.penalty,
    reward_share_bps: rewardShareBps(result.penalty, params.penaltyPeriod),
  };
}

export function bondRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { pool, storage } = ctx;

  if (storage) {
    app.post<{ Body: SubmitCheckpointRequest }>(
      "/checkpoints",
      { schema: { body: SubmitCheckpointRequest } },
      async (request, reply) => {
        const { submitter, output_root, block_number } = request.body;
        const checkpoint = storage.submitCheckpoint(
          pool,
          { submitter, outputRoot: output_root, blockNumber: block_number },
          ctx.now(),
        );
        const body: CheckpointV1 & { bond: BondV1 } = {
          index: checkpoint.index,
          submitter: checkpoint.submitter,
          output_root: checkpoint.outputRoot,
          block_number: checkpoint.blockNumber,
          timestamp: checkpoint.timestamp,
          bond: bondToJson(pool.getBond(checkpoint.index)),
        };
        return reply.status(201).send(body);
      },
    );
  }

  app.get("/bonds", async (_request, reply) => {
    return reply.send({
      next_release_index: pool.nextReleaseIndex(),
      bonds: pool.pendingBonds().map(bondToJson),
    });
  });

  app.get<{ Params: IndexParams }>(
    "/bonds/:index",
    { schema: { params: IndexParams, response: { 200: BondV1 } } },
    async (request, reply) => {
      return reply.send(bondToJson(pool.getBond(request.params.index)));
    },
  );

  app.post<{ Params: IndexParams; Body: IncreaseBondRequest }>(
    "/bonds/:index/increase",
    { schema: { params: IndexParams, body: IncreaseBondRequest } },
    async (request, reply) => {
      const { caller, challenger } = request.body;
      const bond = pool.increaseBond(caller, challenger, request.params.index, ctx.now());
      return reply.send(bondToJson(bond));
    },
  );

  app.post<{ Params: IndexParams }>(
    "/bonds/:index/release",
    { schema: { params: IndexParams } },
    async (request, reply) => {
      return reply.send(releaseToJson(pool.params, pool.release(request.params.index, ctx.now())));
    },
  );

  app.post("/unbond", async (_request, reply) => {
    return reply.send(releaseToJson(pool.params, pool.unbond(ctx.now())));
  });
}
