/**
 * GET /health — liveness + outbox depth.
 */

import type { FastifyInstance } from "fastify";
import type { RouteContext } from "./context.js";

export function healthRoutes(app: FastifyInstance, ctx: RouteContext): void {
  app.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      timestamp: ctx.now(),
      validators: ctx.pool.validatorCount(),
      pending_bonds: ctx.pool.pendingBonds().length,
      pending_notifications: ctx.pool.notifier.size(),
    });
  });
}
