/**
 * Request DTOs with Zod validation schemas.
 *
 * Schemas check shape only. Domain rules (share totals, lock bounds,
 * positive amounts) belong to the escrow ledger and surface as its
 * error codes.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Decimal amount in the escrow currency, e.g. "1.5" */
export const AmountSchema = z.string().min(1).max(64);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Plan DTOs
// =============================================================================

export const CreatePlanSchema = z.object({
  beneficiaries: z.array(z.string()),
  shares: z.array(z.number()),
  lockDuration: z.number(),
  emergencyContact: z.string(),
  description: z.string().max(1024).optional(),
  deposit: AmountSchema,
});

export type CreatePlanDto = z.infer<typeof CreatePlanSchema>;

export const ListPlansQuerySchema = z.object({
  beneficiary: z.string().min(1).optional(),
});

export type ListPlansQuery = z.infer<typeof ListPlansQuerySchema>;

export const AddFundsSchema = z.object({
  amount: AmountSchema,
});

export type AddFundsDto = z.infer<typeof AddFundsSchema>;

export const UpdateBeneficiariesSchema = z.object({
  beneficiaries: z.array(z.string()),
  shares: z.array(z.number()),
});

export type UpdateBeneficiariesDto = z.infer<typeof UpdateBeneficiariesSchema>;

// =============================================================================
// Event Query DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: z.string().min(1).optional(),
  correlationId: z.string().min(1).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
