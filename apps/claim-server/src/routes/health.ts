/**
 * GET /health: liveness plus a store round trip.
 */

import type { FastifyInstance } from "fastify";
import type { LedgerStore } from "../store/types.js";

export function healthRoutes(app: FastifyInstance, store: LedgerStore): void {
  app.get("/health", async (request, reply) => {
    try {
      await store.ping();
    } catch (err) {
      request.log.error({ err }, "store ping failed");
      return reply.status(503).send({ status: "degraded", store: "unreachable" });
    }
    return reply.send({ status: "ok", timestamp: Date.now() });
  });
}
