import { z } from 'zod';

// ── Action discriminator ─────────────────────────────────────

export const planActionSchema = z.enum([
  'fetch_weather',
  'search_venues',
  'check_events',
  'fetch_images',
  'compose_final',
]);

export type PlanAction = z.infer<typeof planActionSchema>;

export function isPlanAction(value: string): value is PlanAction {
  return planActionSchema.safeParse(value).success;
}

// ── PlanStep ─────────────────────────────────────────────────

export const stepParamsSchema = z.record(z.unknown());

export type StepParams = z.infer<typeof stepParamsSchema>;

export const planStepSchema = z.object({
  id: z.string().min(1),
  action: planActionSchema,
  params: stepParamsSchema,
  reasoning: z.string().optional(),
});

export type PlanStep = z.infer<typeof planStepSchema>;

const uniqueStepList = z
  .array(planStepSchema)
  .min(1)
  .superRefine((steps, ctx) => {
    const seen = new Set<string>();
    for (const [index, step] of steps.entries()) {
      if (seen.has(step.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `Duplicate step id "${step.id}"`,
        });
      }
      seen.add(step.id);
    }
  });

// ── Plan ─────────────────────────────────────────────────────

export const planSchema = z.object({
  planId: z.string().min(1),
  userIntent: z.string().min(1),
  steps: uniqueStepList,
  estimatedBudget: z.number().optional(),
  safetyNotes: z.array(z.string()),
});

export type Plan = z.infer<typeof planSchema>;

// ── LLM planning response (wire contract, snake_case) ───────

export const plannerResponseSchema = z.object({
  user_intent: z.string().min(1),
  steps: uniqueStepList,
  estimated_budget: z.number().nullable().optional(),
  safety_notes: z.array(z.string()).optional().default([]),
});

export type PlannerResponse = z.infer<typeof plannerResponseSchema>;

// ── Loose step shape accepted by the executor ────────────────
// Plans built in memory may carry actions the enum does not know;
// the executor reports those as failed steps instead of rejecting the plan.

export interface ExecutableStep {
  id: string;
  action: string;
  params: StepParams;
  reasoning?: string | undefined;
}

export interface ExecutablePlan {
  planId: string;
  steps: readonly ExecutableStep[];
}
