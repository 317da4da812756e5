import { z } from 'zod';

/** Session ids are caller-chosen opaque tokens. */
export const sessionParamsSchema = z.object({
  session_id: z.string().regex(/^[A-Za-z0-9_.:-]{1,128}$/, 'session_id must be 1-128 characters of [A-Za-z0-9_.:-]'),
});

export const turnParamsSchema = z.object({
  turn_id: z.string().uuid('turn_id must be a valid UUID'),
});

/**
 * Schema for POST /api/v1/sessions/:session_id/turns.
 * Length limits beyond `max` are the policy engine's business.
 */
export const submitTurnBodySchema = z.object({
  text: z.string().min(1).max(10_000),
  /** Lets the caller cancel the turn through DELETE /api/v1/turns/:turn_id while it runs. */
  turn_id: z.string().uuid('turn_id must be a valid UUID').optional(),
  timeout_ms: z.number().int().min(1).max(120_000).optional(),
  metadata: z.record(z.string(), z.unknown()).optional().default({}),
});

export type SubmitTurnBody = z.infer<typeof submitTurnBodySchema>;

/** Query for GET /api/v1/sessions/:session_id/turns. Out-of-range limits are clamped. */
export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().optional().default(20)
    .transform((n) => Math.min(100, Math.max(1, n))),
});
