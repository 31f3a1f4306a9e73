import { describe, it, expect } from 'vitest';

import {
  buildSafetyChecklist,
  buildTimeline,
  composeFinalPlan,
  formatBudget,
  formatClock,
  isLateNight,
} from '../core/compose.js';
import type { CompositionInput } from '../core/compose.js';
import { parseDateTime } from '../core/requestContext.js';
import { request, venue, weather } from './fixtures.js';

function input(overrides: Partial<CompositionInput> = {}): CompositionInput {
  return {
    plan: {
      planId: 'plan_test',
      userIntent: 'Romantic dinner in Mumbai!',
      steps: [{ id: 'step_1', action: 'compose_final', params: {} }],
      safetyNotes: [],
    },
    request: request(),
    when: parseDateTime('Saturday 7pm'),
    venues: [venue({ name: 'Sea Lounge' })],
    weather: weather(),
    events: [],
    images: [],
    currencySymbol: '₹',
    now: new Date('2024-02-10T12:00:00.000Z'),
    ...overrides,
  };
}

// ── Timeline ─────────────────────────────────────────────────

describe('formatClock', () => {
  it('formats 12-hour times', () => {
    expect(formatClock(18 * 60 + 30)).toBe('6:30 PM');
    expect(formatClock(0)).toBe('12:00 AM');
    expect(formatClock(12 * 60 + 5)).toBe('12:05 PM');
  });

  it('wraps past midnight', () => {
    expect(formatClock(24 * 60 + 60)).toBe('1:00 AM');
  });
});

describe('buildTimeline', () => {
  it('starts half an hour before a 7pm date', () => {
    const timeline = buildTimeline([venue({ name: 'Sea Lounge' })], parseDateTime('Saturday 7pm'));

    expect(timeline.map((t) => t.time)).toEqual([
      '6:30 PM',
      '6:45 PM',
      '7:15 PM',
      '8:30 PM',
      '9:00 PM',
    ]);
    expect(timeline.map((t) => t.location)).toEqual([
      'Sea Lounge',
      'Sea Lounge',
      'Sea Lounge',
      'Sea Lounge',
      'Safe return journey',
    ]);
    expect(timeline[0]).toEqual({
      time: '6:30 PM',
      activity: 'Meet at venue',
      location: 'Sea Lounge',
      durationMinutes: 15,
      notes: 'Arrive a bit early to get a good table',
    });
    expect(timeline[4]?.durationMinutes).toBeUndefined();
  });

  it('defaults to 6:30 PM when no time was given', () => {
    const timeline = buildTimeline([venue()], parseDateTime('Saturday evening'));
    expect(timeline[0]?.time).toBe('6:30 PM');
  });

  it('runs past midnight for a late start', () => {
    const timeline = buildTimeline([venue()], parseDateTime('Saturday 11pm'));
    expect(timeline[0]?.time).toBe('10:30 PM');
    expect(timeline[4]?.time).toBe('1:00 AM');
  });

  it('is empty without venues', () => {
    expect(buildTimeline([], parseDateTime('Saturday 7pm'))).toEqual([]);
  });
});

// ── Safety checklist ─────────────────────────────────────────

describe('isLateNight', () => {
  it('covers 9pm through 4am', () => {
    expect(isLateNight(20)).toBe(false);
    expect(isLateNight(21)).toBe(true);
    expect(isLateNight(0)).toBe(true);
    expect(isLateNight(4)).toBe(true);
    expect(isLateNight(5)).toBe(false);
    expect(isLateNight(null)).toBe(false);
  });
});

describe('buildSafetyChecklist', () => {
  it('has five entries for an evening date', () => {
    const checklist = buildSafetyChecklist(parseDateTime('Saturday 7pm'));
    expect(checklist).toHaveLength(5);
    expect(checklist[1]).toBe('Choose a public, well-lit venue');
  });

  it('adds no late-night entries without a time', () => {
    expect(buildSafetyChecklist(parseDateTime('Saturday'))).toHaveLength(5);
  });
});

// ── Budget ───────────────────────────────────────────────────

describe('formatBudget', () => {
  it('doubles the per-person budget with grouping', () => {
    expect(formatBudget(1500, '₹')).toBe('₹3,000');
    expect(formatBudget(1234.5, '$')).toBe('$2,469');
  });

  it('reads Flexible without a budget', () => {
    expect(formatBudget(undefined, '₹')).toBe('Flexible');
  });
});

// ── Final plan ───────────────────────────────────────────────

describe('composeFinalPlan', () => {
  it('assembles the final plan', () => {
    const plan = composeFinalPlan(input());

    expect(plan.title).toBe('Date Night in Mumbai');
    expect(plan.summary).toBe("Romantic dinner in Mumbai. We've found 1 great venue options for you!");
    expect(plan.dateTime).toBe('Saturday 7pm');
    expect(plan.weatherForecast).toEqual(weather());
    expect(plan.transportationSuggestions).toHaveLength(4);
    expect(plan.backupPlan).toBeUndefined();
    expect(plan.createdAt).toBe('2024-02-10T12:00:00.000Z');
  });

  it('caps the venue list at five', () => {
    const venues = Array.from({ length: 7 }, (_, i) => venue({ name: `Venue ${String(i + 1)}` }));
    const plan = composeFinalPlan(input({ venues }));

    expect(plan.venues.map((v) => v.name)).toEqual([
      'Venue 1',
      'Venue 2',
      'Venue 3',
      'Venue 4',
      'Venue 5',
    ]);
    expect(plan.summary).toContain("We've found 7 great venue options");
  });

  it('adds a backup plan above 50% rain', () => {
    expect(composeFinalPlan(input({ weather: weather({ rainProbability: 60 }) })).backupPlan)
      .toBe('If it rains heavily, consider rescheduling or choosing a fully indoor venue with covered parking.');
    expect(composeFinalPlan(input({ weather: weather({ rainProbability: 50 }) })).backupPlan)
      .toBeUndefined();
  });

  it('omits the forecast when none was fetched', () => {
    const plan = composeFinalPlan(input({ weather: undefined }));
    expect('weatherForecast' in plan).toBe(false);
  });
});
