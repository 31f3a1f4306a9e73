import { z } from 'zod';

import {
  eventResultSchema,
  imageResultSchema,
  venueResultSchema,
  weatherResultSchema,
} from './providers.js';

// ── ValidationIssue ──────────────────────────────────────────

export const issueSeveritySchema = z.enum(['critical', 'warning', 'info']);

export type IssueSeverity = z.infer<typeof issueSeveritySchema>;

export const issueCategorySchema = z.enum([
  'venues',
  'weather',
  'budget',
  'accessibility',
  'safety',
]);

export type IssueCategory = z.infer<typeof issueCategorySchema>;

export const validationIssueSchema = z.object({
  severity: issueSeveritySchema,
  category: issueCategorySchema,
  message: z.string().min(1),
  suggestion: z.string().optional(),
});

export type ValidationIssue = z.infer<typeof validationIssueSchema>;

// ── SafetyAssessment ─────────────────────────────────────────

export const safetyAssessmentSchema = z.object({
  publicVenue: z.boolean(),
  operatingHoursValid: z.boolean(),
  crowdRating: z.string().optional(),
  emergencyInfo: z.array(z.string()),
  safetyScore: z.number().int().min(0).max(10),
});

export type SafetyAssessment = z.infer<typeof safetyAssessmentSchema>;

// ── FinalPlan ────────────────────────────────────────────────

export const timelineEntrySchema = z.object({
  time: z.string().min(1),
  activity: z.string().min(1),
  location: z.string().optional(),
  durationMinutes: z.number().int().positive().optional(),
  notes: z.string().optional(),
});

export type TimelineEntry = z.infer<typeof timelineEntrySchema>;

export const finalPlanSchema = z.object({
  title: z.string().min(1),
  summary: z.string().min(1),
  dateTime: z.string(),
  city: z.string(),
  totalBudgetEstimate: z.string(),
  venues: z.array(venueResultSchema).max(5),
  weatherForecast: weatherResultSchema.optional(),
  nearbyEvents: z.array(eventResultSchema),
  timeline: z.array(timelineEntrySchema),
  safetyChecklist: z.array(z.string()),
  transportationSuggestions: z.array(z.string()),
  backupPlan: z.string().optional(),
  venueImages: z.array(imageResultSchema),
  createdAt: z.string().datetime(),
});

export type FinalPlan = z.infer<typeof finalPlanSchema>;

// ── VerificationReport ───────────────────────────────────────

export const verificationReportSchema = z.object({
  planId: z.string().min(1),
  approved: z.boolean(),
  confidenceScore: z.number().min(0).max(1),
  issues: z.array(validationIssueSchema),
  safetyCheck: safetyAssessmentSchema,
  finalOutput: finalPlanSchema.optional(),
  retryRecommendations: z.array(z.string()),
  verifiedAt: z.string().datetime(),
});

export type VerificationReport = z.infer<typeof verificationReportSchema>;
