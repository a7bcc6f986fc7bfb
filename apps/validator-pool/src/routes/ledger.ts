/**
 * Ledger + rotation routes.
 *
 * POST /deposit            — credit stake (funds pulled from custody)
 * POST /withdraw           — debit stake
 * GET  /balances/:address  — balance + eligibility
 * GET  /validators         — validator set in rotation order
 * GET  /validators/next    — who may submit the next checkpoint
 */

import type { FastifyInstance } from "fastify";
import { roundPhase } from "@valpool/protocol";
import { AddressParams, AmountRequest } from "./schemas.js";
import type { RouteContext } from "./context.js";

export function ledgerRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { pool } = ctx;

  app.post<{ Body: AmountRequest }>(
    "/deposit",
    { schema: { body: AmountRequest } },
    async (request, reply) => {
      const { address, amount } = request.body;
      const balance = pool.deposit(address, BigInt(amount), ctx.now());
      return reply.status(201).send({
        address,
        balance: balance.toString(),
        is_validator: pool.isValidator(address),
      });
    },
  );

  app.post<{ Body: AmountRequest }>(
    "/withdraw",
    { schema: { body: AmountRequest } },
    async (request, reply) => {
      const { address, amount } = request.body;
      const balance = pool.withdraw(address, BigInt(amount), ctx.now());
      return reply.send({
        address,
        balance: balance.toString(),
        is_validator: pool.isValidator(address),
      });
    },
  );

  app.get<{ Params: AddressParams }>(
    "/balances/:address",
    { schema: { params: AddressParams } },
    async (request, reply) => {
      const { address } = request.params;
      return reply.send({
        address,
        balance: pool.balanceOf(address).toString(),
        is_validator: pool.isValidator(address),
      });
    },
  );

  app.get("/validators", async (_request, reply) => {
    return reply.send({
      count: pool.validatorCount(),
      validators: pool.validators(),
    });
  });

  app.get("/validators/next", async (_request, reply) => {
    const now = ctx.now();
    const turn = pool.nextValidator(now);
    const deadline = pool.nextDeadline();
    return reply.send({
      kind: turn.kind,
      address: turn.kind === "assigned" ? turn.validator : pool.params.publicRoundAddress,
      deadline,
      phase: roundPhase(pool.params, deadline, now),
      timestamp: now,
    });
  });
}
