import type {
  DatePlanRequest,
  EventResult,
  FinalPlan,
  ImageResult,
  Plan,
  TimelineEntry,
  VenueResult,
  WeatherResult,
} from '../schema/index.js';
import {
  LATE_NIGHT,
  LATE_NIGHT_CHECKLIST,
  LIMITS,
  SAFETY_CHECKLIST,
  TRANSPORTATION_SUGGESTIONS,
  WEATHER_THRESHOLDS,
} from '../config/defaults.js';
import type { ParsedDateTime } from './requestContext.js';

// ── Public types ─────────────────────────────────────────────

export interface CompositionInput {
  plan: Plan;
  request: DatePlanRequest;
  when: ParsedDateTime;
  venues: readonly VenueResult[];
  weather: WeatherResult | undefined;
  events: readonly EventResult[];
  images: readonly ImageResult[];
  currencySymbol: string;
  now: Date;
}

// ── Timeline ─────────────────────────────────────────────────

const MINUTES_PER_DAY = 24 * 60;
const DEFAULT_START_MINUTES = 18 * 60 + 30;
const ARRIVE_EARLY_MINUTES = 30;

interface TimelineSlot {
  offset: number;
  activity: string;
  durationMinutes?: number;
  notes: string;
  atVenue: boolean;
}

const TIMELINE_SLOTS: readonly TimelineSlot[] = [
  { offset: 0, activity: 'Meet at venue', durationMinutes: 15, notes: 'Arrive a bit early to get a good table', atVenue: true },
  { offset: 15, activity: 'Order drinks/appetizers', durationMinutes: 30, notes: 'Start with light conversation', atVenue: true },
  { offset: 45, activity: 'Main course', durationMinutes: 60, notes: 'Enjoy your meal together', atVenue: true },
  { offset: 120, activity: 'Dessert/wrap up', durationMinutes: 30, notes: 'Optional: Explore nearby for a walk', atVenue: true },
  { offset: 150, activity: 'Head home', notes: 'Share your ride details with someone', atVenue: false },
];

export function formatClock(minutesOfDay: number): string {
  const normalized = ((minutesOfDay % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hour = Math.floor(normalized / 60);
  const minute = normalized % 60;
  const period = hour >= 12 ? 'PM' : 'AM';
  return `${String(hour % 12 || 12)}:${String(minute).padStart(2, '0')} ${period}`;
}

/**
 * Five fixed slots at the top venue. The first starts half an hour before
 * the requested time, or at 6:30 PM when no time could be parsed.
 */
export function buildTimeline(
  venues: readonly VenueResult[],
  when: ParsedDateTime,
): TimelineEntry[] {
  const venue = venues[0];
  if (!venue) return [];

  const start = when.hour !== null
    ? when.hour * 60 + (when.minute ?? 0) - ARRIVE_EARLY_MINUTES
    : DEFAULT_START_MINUTES;

  return TIMELINE_SLOTS.map((slot) => ({
    time: formatClock(start + slot.offset),
    activity: slot.activity,
    location: slot.atVenue ? venue.name : 'Safe return journey',
    ...(slot.durationMinutes !== undefined
      ? { durationMinutes: slot.durationMinutes }
      : {}),
    notes: slot.notes,
  }));
}

// ── Safety checklist ─────────────────────────────────────────

export function isLateNight(hour: number | null): boolean {
  if (hour === null) return false;
  return hour >= LATE_NIGHT.FROM_HOUR || hour <= LATE_NIGHT.UNTIL_HOUR;
}

export function buildSafetyChecklist(when: ParsedDateTime): string[] {
  const checklist: string[] = [...SAFETY_CHECKLIST];
  if (isLateNight(when.hour)) checklist.push(...LATE_NIGHT_CHECKLIST);
  return checklist;
}

// ── Budget display ───────────────────────────────────────────

const budgetFormat = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 0,
});

export function formatBudget(
  budgetPerPerson: number | undefined,
  currencySymbol: string,
): string {
  if (budgetPerPerson === undefined) return 'Flexible';
  return `${currencySymbol}${budgetFormat.format(budgetPerPerson * 2)}`;
}

// ── Final plan ───────────────────────────────────────────────

export function composeFinalPlan(input: CompositionInput): FinalPlan {
  const { plan, request, venues, weather } = input;
  const intent = plan.userIntent.replace(/[.!\s]+$/, '');

  const rain = weather?.rainProbability;
  const backupPlan = rain !== undefined && rain > WEATHER_THRESHOLDS.RAIN_BACKUP
    ? 'If it rains heavily, consider rescheduling or choosing a fully indoor venue with covered parking.'
    : undefined;

  return {
    title: `Date Night in ${request.city}`,
    summary: `${intent}. We've found ${String(venues.length)} great venue options for you!`,
    dateTime: request.dateTime,
    city: request.city,
    totalBudgetEstimate: formatBudget(request.budgetPerPerson, input.currencySymbol),
    venues: venues.slice(0, LIMITS.MAX_FINAL_VENUES),
    ...(weather ? { weatherForecast: weather } : {}),
    nearbyEvents: [...input.events],
    timeline: buildTimeline(venues, input.when),
    safetyChecklist: buildSafetyChecklist(input.when),
    transportationSuggestions: [...TRANSPORTATION_SUGGESTIONS],
    ...(backupPlan ? { backupPlan } : {}),
    venueImages: [...input.images],
    createdAt: input.now.toISOString(),
  };
}
