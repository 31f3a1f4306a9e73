import type { z } from 'zod';

import type {
  DatePlanRequest,
  EventResult,
  ExecutionReport,
  ImageResult,
  IssueCategory,
  IssueSeverity,
  Plan,
  SafetyAssessment,
  ValidationIssue,
  VenueResult,
  VerificationReport,
  WeatherResult,
} from '../schema/index.js';
import {
  eventResultSchema,
  imageResultSchema,
  venueResultSchema,
  weatherResultSchema,
} from '../schema/index.js';
import {
  CONFIDENCE,
  COST_PER_PRICE_LEVEL,
  DEFAULT_CURRENCY_SYMBOL,
  RETRY_RECOMMENDATIONS,
  SAFETY,
  WEATHER_THRESHOLDS,
  emergencyContacts,
} from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { composeFinalPlan } from './compose.js';
import { parseDateTime } from './requestContext.js';

// ── Public types ─────────────────────────────────────────────

export interface VerifierOptions {
  currencySymbol?: string | undefined;
  now?: (() => Date) | undefined;
}

export interface ExtractedResults {
  venues: VenueResult[];
  weather: WeatherResult | undefined;
  events: EventResult[];
  images: ImageResult[];
}

// ── Extraction ───────────────────────────────────────────────
// Each collection is read independently; a bad entry is skipped, not fatal.

function collect<T>(
  report: ExecutionReport,
  action: string,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T[] {
  const items: T[] = [];

  for (const result of report.results) {
    if (result.action !== action || result.status !== 'success') continue;

    const entries = result.payload[key];
    if (!Array.isArray(entries)) {
      log.warn(`Step ${result.stepId}: payload has no "${key}" list`);
      continue;
    }

    for (const entry of entries) {
      const parsed = schema.safeParse(entry);
      if (parsed.success) {
        items.push(parsed.data);
      } else {
        log.warn(`Step ${result.stepId}: skipping unparsable ${key} entry`);
      }
    }
  }

  return items;
}

function firstWeather(report: ExecutionReport): WeatherResult | undefined {
  for (const result of report.results) {
    if (result.action !== 'fetch_weather' || result.status !== 'success') continue;

    const parsed = weatherResultSchema.safeParse(result.payload);
    if (parsed.success) return parsed.data;
    log.warn(`Step ${result.stepId}: unparsable weather payload`);
  }
  return undefined;
}

export function extractResults(report: ExecutionReport): ExtractedResults {
  return {
    venues: collect(report, 'search_venues', 'venues', venueResultSchema),
    weather: firstWeather(report),
    events: collect(report, 'check_events', 'events', eventResultSchema),
    images: collect(report, 'fetch_images', 'images', imageResultSchema),
  };
}

// ── Validation ───────────────────────────────────────────────

function issue(
  severity: IssueSeverity,
  category: IssueCategory,
  message: string,
  suggestion?: string,
): ValidationIssue {
  return {
    severity,
    category,
    message,
    ...(suggestion !== undefined ? { suggestion } : {}),
  };
}

export function validateVenues(
  venues: readonly VenueResult[],
  request: DatePlanRequest,
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (venues.length === 0) {
    issues.push(issue(
      'critical',
      'venues',
      'No venues found matching criteria',
      'Try broadening search criteria or increasing search radius',
    ));
  } else if (venues.length < 3) {
    issues.push(issue(
      'warning',
      'venues',
      `Only ${String(venues.length)} venues found - limited options`,
      'Consider alternative cuisines or venue types',
    ));
  }

  const rated = venues.filter((v) => v.rating !== undefined && v.rating > 0);
  if (rated.length < venues.length * 0.5) {
    issues.push(issue(
      'info',
      'venues',
      'Some venues missing rating information',
      'Verify venue quality through other sources',
    ));
  }

  if (request.accessibilityNeeds?.trim()) {
    const accessible = venues.filter((v) => v.wheelchairAccessible === true);
    if (accessible.length === 0) {
      issues.push(issue(
        'warning',
        'accessibility',
        'No confirmed wheelchair-accessible venues found',
        'Call venues directly to confirm accessibility',
      ));
    }
  }

  return issues;
}

export function validateWeather(
  weather: WeatherResult | undefined,
): ValidationIssue[] {
  if (!weather) {
    return [issue(
      'warning',
      'weather',
      'Weather data unavailable',
      'Check weather manually before the date',
    )];
  }

  const issues: ValidationIssue[] = [];
  const rain = weather.rainProbability;

  if (rain !== undefined && rain > WEATHER_THRESHOLDS.RAIN_WARNING) {
    issues.push(issue(
      'warning',
      'weather',
      `High chance of rain (${String(rain)}%)`,
      'Choose indoor venues or carry umbrellas',
    ));
  }

  if (weather.temperature > WEATHER_THRESHOLDS.HOT) {
    issues.push(issue(
      'info',
      'weather',
      'Very hot weather expected',
      'Choose air-conditioned venues and stay hydrated',
    ));
  } else if (weather.temperature < WEATHER_THRESHOLDS.COLD) {
    issues.push(issue(
      'info',
      'weather',
      'Cold weather expected',
      'Dress warmly and consider indoor venues',
    ));
  }

  return issues;
}

export function estimatedCost(venue: VenueResult): number | undefined {
  if (venue.priceLevel === undefined || venue.priceLevel <= 0) return undefined;
  return venue.priceLevel * COST_PER_PRICE_LEVEL;
}

export function validateBudget(
  venues: readonly VenueResult[],
  budgetPerPerson: number | undefined,
): ValidationIssue[] {
  if (budgetPerPerson === undefined) return [];

  const over = venues.filter((v) => {
    const cost = estimatedCost(v);
    return cost !== undefined && cost > budgetPerPerson;
  }).length;

  if (over === venues.length) {
    return [issue(
      'warning',
      'budget',
      'All suggested venues may exceed budget',
      'Consider lower-priced alternatives or adjust budget',
    )];
  }
  if (over > 0) {
    return [issue(
      'info',
      'budget',
      `${String(over)} of ${String(venues.length)} venues may be above budget`,
      'Review menu prices before booking',
    )];
  }
  return [];
}

// ── Safety ───────────────────────────────────────────────────

export function assessSafety(
  venues: readonly VenueResult[],
  city: string,
): SafetyAssessment {
  const operatingHoursValid = !venues.some((v) => v.openNow === false);

  let safetyScore: number = SAFETY.BASE_SCORE;
  if (!operatingHoursValid) safetyScore -= SAFETY.HOURS_INVALID_PENALTY;
  if (venues.length === 0) safetyScore -= SAFETY.NO_VENUES_PENALTY;

  return {
    publicVenue: venues.length > 0,
    operatingHoursValid,
    crowdRating: SAFETY.CROWD_RATING,
    emergencyInfo: emergencyContacts(city),
    safetyScore: Math.max(0, safetyScore),
  };
}

// ── Scoring ──────────────────────────────────────────────────

function severityPenalty(severity: IssueSeverity): number {
  switch (severity) {
    case 'critical':
      return CONFIDENCE.CRITICAL;
    case 'warning':
      return CONFIDENCE.WARNING;
    case 'info':
      return CONFIDENCE.INFO;
  }
}

export function calculateConfidence(
  venueCount: number,
  hasWeather: boolean,
  issues: readonly ValidationIssue[],
): number {
  let score = 1;

  if (venueCount === 0) score -= CONFIDENCE.NO_VENUES;
  else if (venueCount < 3) score -= CONFIDENCE.FEW_VENUES;

  if (!hasWeather) score -= CONFIDENCE.NO_WEATHER;

  for (const i of issues) score -= severityPenalty(i.severity);

  return Math.max(0, Math.min(1, score));
}

export function isApproved(
  venueCount: number,
  issues: readonly ValidationIssue[],
): boolean {
  return venueCount > 0 && !issues.some((i) => i.severity === 'critical');
}

export function retryRecommendations(
  issues: readonly ValidationIssue[],
): string[] {
  return issues
    .filter((i) => i.severity === 'critical' && i.category === 'venues')
    .flatMap(() => [...RETRY_RECOMMENDATIONS]);
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Validate an execution report against the request. Deterministic apart
 * from the timestamps: the same inputs give the same approval, score and
 * issues.
 */
export function verifyPlan(
  plan: Plan,
  report: ExecutionReport,
  request: DatePlanRequest,
  options: VerifierOptions = {},
): VerificationReport {
  const now = options.now?.() ?? new Date();
  const { venues, weather, events, images } = extractResults(report);

  const issues = [
    ...validateVenues(venues, request),
    ...validateWeather(weather),
    ...validateBudget(venues, request.budgetPerPerson),
  ];

  const safetyCheck = assessSafety(venues, request.city);
  const approved = isApproved(venues.length, issues);
  const confidenceScore = calculateConfidence(venues.length, weather !== undefined, issues);

  log.verdict(approved, confidenceScore);
  for (const i of issues) {
    log.detail(`[${i.severity}/${i.category}] ${i.message}`);
  }

  const base = {
    planId: plan.planId,
    approved,
    confidenceScore,
    issues,
    safetyCheck,
    verifiedAt: now.toISOString(),
  };

  if (!approved) {
    return { ...base, retryRecommendations: retryRecommendations(issues) };
  }

  const finalOutput = composeFinalPlan({
    plan,
    request,
    when: parseDateTime(request.dateTime),
    venues,
    weather,
    events,
    images,
    currencySymbol: options.currencySymbol ?? DEFAULT_CURRENCY_SYMBOL,
    now,
  });

  return { ...base, finalOutput, retryRecommendations: [] };
}
