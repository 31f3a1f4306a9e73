import { z } from 'zod';

import { finalPlanSchema, issueSeveritySchema } from './verification.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  success: z.boolean(),
  planId: z.string().min(1),
  city: z.string(),
  dateTime: z.string(),
  message: z.string(),
  exitCode: z.number().int().nonnegative(),
  processingTimeSeconds: z.number().nonnegative(),
  confidenceScore: z.number().min(0).max(1).optional(),
  issues: z.array(
    z.object({
      severity: issueSeveritySchema,
      category: z.string(),
      message: z.string(),
    }),
  ),
  errors: z.array(z.string()),
  plan: finalPlanSchema.optional(),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
