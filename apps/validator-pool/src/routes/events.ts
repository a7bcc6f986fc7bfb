/**
 * GET /events — event log query (?from=seq, ?type=).
 */

import type { FastifyInstance } from "fastify";
import { EventsQuery } from "./schemas.js";
import type { RouteContext } from "./context.js";

export function eventRoutes(app: FastifyInstance, ctx: RouteContext): void {
  app.get<{ Querystring: EventsQuery }>(
    "/events",
    { schema: { querystring: EventsQuery } },
    async (request, reply) => {
      const { from, type } = request.query;
      const events = ctx.pool.events
        .getEvents(from ?? 0)
        .filter((e) => type === undefined || e.type === type);
      return reply.send({ count: events.length, events });
    },
  );
}
