import { z } from 'zod';

import { finalPlanSchema } from './verification.js';

// ── DatePlanResponse ─────────────────────────────────────────

export const datePlanResponseSchema = z.object({
  success: z.boolean(),
  planId: z.string().min(1),
  message: z.string().min(1),
  plan: finalPlanSchema.optional(),
  errors: z.array(z.string()),
  processingTimeSeconds: z.number().nonnegative(),
});

export type DatePlanResponse = z.infer<typeof datePlanResponseSchema>;
