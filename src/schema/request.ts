import { z } from 'zod';

// ── DatePlanRequest ──────────────────────────────────────────

export const datePlanRequestSchema = z.object({
  city: z.string().trim().min(1),
  budgetPerPerson: z.number().positive().optional(),
  dateTime: z.string().trim().min(1),
  preferences: z.string().optional(),
  dietaryRestrictions: z.array(z.string().min(1)).optional(),
  accessibilityNeeds: z.string().optional(),
});

export type DatePlanRequest = z.infer<typeof datePlanRequestSchema>;

export function parseDatePlanRequest(data: unknown): DatePlanRequest {
  return datePlanRequestSchema.parse(data);
}
