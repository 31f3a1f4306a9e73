import { z } from 'zod';

// ── StepResult ───────────────────────────────────────────────

export const stepStatusSchema = z.enum(['success', 'partial', 'failed']);

export type StepStatus = z.infer<typeof stepStatusSchema>;

export const stepResultSchema = z.object({
  stepId: z.string().min(1),
  action: z.string().min(1),
  status: stepStatusSchema,
  payload: z.record(z.unknown()),
  source: z.string().min(1),
  errorMessage: z.string().optional(),
  timestamp: z.string().datetime(),
});

export type StepResult = z.infer<typeof stepResultSchema>;

// ── ExecutionReport ──────────────────────────────────────────

export const overallStatusSchema = z.enum([
  'success',
  'partial_success',
  'failed',
]);

export type OverallStatus = z.infer<typeof overallStatusSchema>;

export const executionReportSchema = z.object({
  planId: z.string().min(1),
  results: z.array(stepResultSchema),
  overallStatus: overallStatusSchema,
  executionTimeSeconds: z.number().nonnegative(),
});

export type ExecutionReport = z.infer<typeof executionReportSchema>;

// ── Deterministic status decision ────────────────────────────
// An empty batch has no successes, so it counts as failed.

export function computeOverallStatus(
  results: readonly Pick<StepResult, 'status'>[],
): OverallStatus {
  const successes = results.filter((r) => r.status === 'success').length;

  if (results.length > 0 && successes === results.length) return 'success';
  if (successes > 0) return 'partial_success';
  return 'failed';
}
