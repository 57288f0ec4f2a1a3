/**
 * User routes.
 *
 * POST /api/verify         check a credential, return the masked identity
 * POST /api/claim/status   eligibility and recent claims
 * POST /api/claim          award one code
 *
 * Every route takes { credential } and verifies it against the ledger
 * first. The credential itself is never stored or logged.
 */

import type { FastifyInstance, FastifyReply } from "fastify";
import type { ClaimIdentity } from "../services/allocator.js";
import type { ClaimService } from "../services/claim-service.js";
import {
  CredentialBody,
  awardToWire,
  check,
  eligibilityToWire,
  sendFailure,
} from "./schemas.js";

export function claimRoutes(app: FastifyInstance, claims: ClaimService): void {
  /** Verify the request's credential. On null the reply has been sent. */
  async function authenticate(body: unknown, reply: FastifyReply): Promise<ClaimIdentity | null> {
    const parsed = check(CredentialBody, body);
    if (!parsed.ok) {
      reply.status(400).send({ error: "invalid-request", message: parsed.error });
      return null;
    }
    const verified = await claims.verify(parsed.value.credential.trim());
    switch (verified.kind) {
      case "verified":
        return verified.identity;
      case "rejected":
        sendFailure(reply, verified.failure);
        return null;
      case "unavailable":
        reply.status(503).send({ error: "verification-unavailable", message: verified.message });
        return null;
    }
  }

  app.post("/api/verify", async (request, reply) => {
    const identity = await authenticate(request.body, reply);
    if (!identity) return reply;
    return reply.send({ user_id: identity.userId, username: identity.username });
  });

  app.post("/api/claim/status", async (request, reply) => {
    const identity = await authenticate(request.body, reply);
    if (!identity) return reply;
    const [view, history] = await Promise.all([
      claims.getEligibility(identity.userId),
      claims.history(identity.userId),
    ]);
    return reply.send(eligibilityToWire(view, history));
  });

  app.post("/api/claim", async (request, reply) => {
    const identity = await authenticate(request.body, reply);
    if (!identity) return reply;
    const outcome = await claims.claim(identity);
    if (!outcome.ok) return sendFailure(reply, outcome.failure);
    return reply.send(awardToWire(outcome.award));
  });
}
