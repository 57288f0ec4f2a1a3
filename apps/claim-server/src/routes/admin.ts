/**
 * Admin routes. Every request must carry x-admin-password; with no
 * ADMIN_PASSWORD configured the whole group answers 403.
 *
 * GET    /api/admin/policy   current policy
 * PUT    /api/admin/policy   partial update (tier maps merge per tier)
 * POST   /api/admin/pool     load codes into one tier
 * GET    /api/admin/pool     list entries (claimed, tier_value, source, page, page_size)
 * DELETE /api/admin/pool     delete entries by filter
 * GET    /api/admin/stats    pool totals per tier + virtual stock
 */

import { createHash, timingSafeEqual } from "node:crypto";
import { configInvalid, parseTierValue, policyToWire, type TierValue } from "@codedrop/allocation";
import type { FastifyInstance } from "fastify";
import type { ClaimService } from "../services/claim-service.js";
import type { PolicyStore } from "../services/policy-store.js";
import type { PoolFilter } from "../store/types.js";
import {
  DeletePoolBody,
  LoadPoolBody,
  PoolQuery,
  check,
  poolEntryToWire,
  sendFailure,
} from "./schemas.js";

export interface AdminRouteContext {
  claims: ClaimService;
  policies: PolicyStore;
  adminPassword: string;
}

const DEFAULT_PAGE_SIZE = 50;

/** Constant-time compare of two secrets of any length. */
export function passwordMatches(given: string, expected: string): boolean {
  const a = createHash("sha256").update(given).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

/** Canonical tier for a filter, undefined when absent, null when invalid. */
function tierFilter(input: string | number | undefined): TierValue | undefined | null {
  if (input === undefined) return undefined;
  return parseTierValue(input);
}

export function adminRoutes(app: FastifyInstance, ctx: AdminRouteContext): void {
  void app.register(async (admin) => {
    admin.addHook("onRequest", async (request, reply) => {
      if (!ctx.adminPassword) {
        return reply.status(403).send({ error: "admin-disabled" });
      }
      const given = request.headers["x-admin-password"];
      if (typeof given !== "string" || !passwordMatches(given, ctx.adminPassword)) {
        return reply.status(401).send({ error: "unauthorized", message: "Admin password required" });
      }
    });

    admin.get("/api/admin/policy", async (_request, reply) => {
      return reply.send(policyToWire(await ctx.policies.snapshot()));
    });

    admin.put("/api/admin/policy", async (request, reply) => {
      const result = await ctx.policies.update(request.body);
      if (!result.ok) return sendFailure(reply, result.failure);
      return reply.send(policyToWire(result.policy));
    });

    admin.post("/api/admin/pool", async (request, reply) => {
      const parsed = check(LoadPoolBody, request.body);
      if (!parsed.ok) return sendFailure(reply, configInvalid(parsed.error));

      const result = await ctx.claims.loadEntries(parsed.value.codes, parsed.value.tier_value);
      if (!result.ok) return sendFailure(reply, result.failure);
      return reply.status(201).send({
        tier_value: result.tierValue,
        inserted: result.inserted,
        skipped: result.skipped,
      });
    });

    admin.get("/api/admin/pool", async (request, reply) => {
      const parsed = check(PoolQuery, request.query);
      if (!parsed.ok) return sendFailure(reply, configInvalid(parsed.error));
      const q = parsed.value;

      const tierValue = tierFilter(q.tier_value);
      if (tierValue === null) return sendFailure(reply, configInvalid("tier_value: invalid tier value"));

      const filter: PoolFilter = {
        tierValue,
        claimed: q.claimed === undefined ? undefined : q.claimed === "true",
        source: q.source,
      };
      const page = {
        page: q.page ? parseInt(q.page, 10) : 1,
        pageSize: q.page_size ? parseInt(q.page_size, 10) : DEFAULT_PAGE_SIZE,
      };
      const result = await ctx.claims.listEntries(filter, page);
      return reply.send({
        entries: result.entries.map(poolEntryToWire),
        total: result.total,
        page: page.page,
      });
    });

    admin.delete("/api/admin/pool", async (request, reply) => {
      const parsed = check(DeletePoolBody, request.body ?? {});
      if (!parsed.ok) return sendFailure(reply, configInvalid(parsed.error));
      const body = parsed.value;

      const tierValue = tierFilter(body.tier_value);
      if (tierValue === null) return sendFailure(reply, configInvalid("tier_value: invalid tier value"));

      const result = await ctx.claims.deleteEntries({
        ids: body.ids,
        tierValue,
        claimed: body.claimed,
        source: body.source,
      });
      if (!result.ok) return sendFailure(reply, result.failure);
      return reply.send({ deleted: result.deleted });
    });

    admin.get("/api/admin/stats", async (_request, reply) => {
      const stats = await ctx.claims.stats();
      return reply.send({
        total: stats.total,
        available: stats.available,
        claimed: stats.claimed,
        by_tier: stats.byTier.map((t) => ({
          tier_value: t.tierValue,
          total: t.total,
          available: t.available,
        })),
        virtual_stock: stats.virtualStock,
        policy_version: stats.policyVersion,
      });
    });
  });
}
