/**
 * Inheritance plan routes.
 *
 * POST   /api/v1/plans                                   Create the caller's plan
 * GET    /api/v1/plans                                   List plans (?beneficiary=)
 * GET    /api/v1/plans/:owner                            Plan details and claim status
 * POST   /api/v1/plans/me/proof-of-life                  Reset the caller's lock
 * POST   /api/v1/plans/me/funds                          Top up the caller's plan
 * PUT    /api/v1/plans/me/beneficiaries                  Replace beneficiaries and shares
 * POST   /api/v1/plans/:owner/claim                      Claim the caller's share
 * POST   /api/v1/plans/:owner/emergency                  Pause claims (emergency contact)
 * DELETE /api/v1/plans/:owner/emergency                  Resume claims (owner or contact)
 * GET    /api/v1/plans/:owner/beneficiaries/:id/share    Share, authorization and claimed amount
 *
 * The /me routes are registered first, so they win over /:owner.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddFundsSchema,
  CreatePlanSchema,
  ListPlansQuerySchema,
  UpdateBeneficiariesSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createPlanRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Caller's own plan ───────────────────────────────────────────

  routes.post("/", validateBody(CreatePlanSchema), (c) => {
    const service = c.get("service");
    const ctx = service.context(c.get("caller"), c.get("requestId"));

    const plan = service.createPlan(ctx, c.get("validatedBody"));
    return c.json({ data: plan }, 201);
  });

  routes.post("/me/proof-of-life", (c) => {
    const service = c.get("service");
    const ctx = service.context(c.get("caller"), c.get("requestId"));

    return c.json({ data: service.submitProofOfLife(ctx) });
  });

  routes.post("/me/funds", validateBody(AddFundsSchema), (c) => {
    const service = c.get("service");
    const ctx = service.context(c.get("caller"), c.get("requestId"));

    return c.json({ data: service.addFunds(ctx, c.get("validatedBody")) });
  });

  routes.put("/me/beneficiaries", validateBody(UpdateBeneficiariesSchema), (c) => {
    const service = c.get("service");
    const ctx = service.context(c.get("caller"), c.get("requestId"));

    return c.json({ data: service.updateBeneficiaries(ctx, c.get("validatedBody")) });
  });

  // ─── Reads ───────────────────────────────────────────────────────

  routes.get("/", validateQuery(ListPlansQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.get("validatedQuery");
    return c.json({ data: service.listPlans(query.beneficiary) });
  });

  routes.get("/:owner", (c) => {
    const service = c.get("service");
    const owner = c.req.param("owner");

    const plan = service.getPlan(owner);
    if (plan === undefined) {
      return c.json(
        createErrorEnvelope("INHERITANCE_NOT_FOUND", `No inheritance plan for '${owner}'`),
        404,
      );
    }
    return c.json({ data: plan });
  });

  routes.get("/:owner/beneficiaries/:id/share", (c) => {
    const service = c.get("service");
    const owner = c.req.param("owner");
    const beneficiary = c.req.param("id");

    return c.json({ data: { owner, beneficiary, ...service.getShare(owner, beneficiary) } });
  });

  // ─── Other owners' plans ─────────────────────────────────────────

  routes.post("/:owner/claim", (c) => {
    const service = c.get("service");
    const ctx = service.context(c.get("caller"), c.get("requestId"));
    const owner = c.req.param("owner");

    const amount = service.claim(ctx, owner);
    return c.json({ data: { owner, beneficiary: ctx.caller, amount } });
  });

  routes.post("/:owner/emergency", (c) => {
    const service = c.get("service");
    const ctx = service.context(c.get("caller"), c.get("requestId"));

    return c.json({ data: service.activateEmergency(ctx, c.req.param("owner")) });
  });

  routes.delete("/:owner/emergency", (c) => {
    const service = c.get("service");
    const ctx = service.context(c.get("caller"), c.get("requestId"));

    return c.json({ data: service.deactivateEmergency(ctx, c.req.param("owner")) });
  });

  return routes;
}
