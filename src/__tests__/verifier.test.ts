import { describe, it, expect } from 'vitest';

import {
  assessSafety,
  calculateConfidence,
  extractResults,
  validateBudget,
  validateVenues,
  validateWeather,
  verifyPlan,
} from '../core/verifier.js';
import type { Plan, ValidationIssue } from '../schema/index.js';
import { report, request, success, venue, weather } from './fixtures.js';

const NOW = (): Date => new Date('2024-02-10T12:00:00.000Z');

const plan: Plan = {
  planId: 'plan_test',
  userIntent: 'Plan a date in Mumbai',
  steps: [{ id: 'step_1', action: 'compose_final', params: {} }],
  safetyNotes: [],
};

// ── Approval scenarios ───────────────────────────────────────

describe('verifyPlan', () => {
  it('approves two venues with good weather', () => {
    const venues = [
      venue({ name: 'Sea Lounge', rating: 4.5 }),
      venue({ name: 'Bay Bistro', rating: 4.2 }),
    ];
    const result = verifyPlan(plan, report(venues, weather()), request(), { now: NOW });

    expect(result.approved).toBe(true);
    expect(result.issues).toEqual([
      {
        severity: 'warning',
        category: 'venues',
        message: 'Only 2 venues found - limited options',
        suggestion: 'Consider alternative cuisines or venue types',
      },
    ]);
    expect(result.confidenceScore).toBeCloseTo(0.7);
    expect(result.confidenceScore).toBeGreaterThan(0.5);
    expect(result.retryRecommendations).toEqual([]);
    expect(result.verifiedAt).toBe('2024-02-10T12:00:00.000Z');

    const final = result.finalOutput;
    expect(final?.city).toBe('Mumbai');
    expect(final?.title).toBe('Date Night in Mumbai');
    expect(final?.summary).toBe("Plan a date in Mumbai. We've found 2 great venue options for you!");
    expect(final?.totalBudgetEstimate).toBe('₹3,000');
    expect(final?.timeline).toHaveLength(5);
    expect(final?.safetyChecklist).toHaveLength(5);
    expect(final?.backupPlan).toBeUndefined();
    expect(final?.createdAt).toBe('2024-02-10T12:00:00.000Z');
  });

  it('rejects a plan without venues', () => {
    const result = verifyPlan(plan, report([], weather()), request(), { now: NOW });

    expect(result.approved).toBe(false);
    expect(result.issues).toContainEqual(
      expect.objectContaining({ severity: 'critical', category: 'venues' }),
    );
    expect(result.finalOutput).toBeUndefined();
    expect(result.retryRecommendations).toContain('Retry venue search with broader criteria');
    expect(result.retryRecommendations).toEqual([
      'Retry venue search with broader criteria',
      'Increase search radius to 5000m',
    ]);
    expect(result.issues).toContainEqual(
      expect.objectContaining({
        severity: 'warning',
        category: 'budget',
        message: 'All suggested venues may exceed budget',
      }),
    );
    expect(result.confidenceScore).toBeCloseTo(0.1);
  });

  it('adds the late-night checklist entries at 11pm', () => {
    const result = verifyPlan(
      plan,
      report([venue(), venue(), venue()], weather()),
      request({ dateTime: 'Saturday 11pm' }),
      { now: NOW },
    );

    const checklist = result.finalOutput?.safetyChecklist;
    expect(checklist).toHaveLength(7);
    expect(checklist?.slice(5)).toEqual([
      'Inform someone about your expected return time',
      'Book a verified cab service for return journey',
    ]);
  });

  it('never approves without venues, whatever else succeeded', () => {
    for (const w of [weather(), undefined]) {
      const result = verifyPlan(plan, report([], w), request({ budgetPerPerson: undefined }));
      expect(result.approved).toBe(false);
    }
  });

  it('gives the same verdict for the same inputs', () => {
    const execution = report([venue(), venue({ priceLevel: 4 })], weather({ rainProbability: 80 }));
    const first = verifyPlan(plan, execution, request(), { now: NOW });
    const second = verifyPlan(plan, execution, request(), { now: NOW });
    expect(second).toEqual(first);
  });

  it('uses the configured currency symbol', () => {
    const result = verifyPlan(
      plan,
      report([venue(), venue(), venue()], weather()),
      request({ budgetPerPerson: 40 }),
      { currencySymbol: '$', now: NOW },
    );
    expect(result.finalOutput?.totalBudgetEstimate).toBe('$80');
  });
});

// ── Extraction ───────────────────────────────────────────────

describe('extractResults', () => {
  it('skips unparsable entries and non-success steps', () => {
    const execution = report([venue({ name: 'Good' })]);
    execution.results.push(
      success('step_9', 'search_venues', { venues: [{ name: '' }, venue({ name: 'Second' })] }),
      { ...success('step_8', 'fetch_weather', weather()), status: 'failed' },
    );

    const extracted = extractResults(execution);
    expect(extracted.venues.map((v) => v.name)).toEqual(['Good', 'Second']);
    expect(extracted.weather).toBeUndefined();
  });
});

// ── Validators ───────────────────────────────────────────────

describe('validateBudget', () => {
  it('warns when the only venue exceeds the budget', () => {
    const issues = validateBudget([venue({ priceLevel: 4 })], 1500);
    expect(issues).toEqual([
      {
        severity: 'warning',
        category: 'budget',
        message: 'All suggested venues may exceed budget',
        suggestion: 'Consider lower-priced alternatives or adjust budget',
      },
    ]);
  });

  it('notes when only some venues exceed the budget', () => {
    const issues = validateBudget(
      [venue({ priceLevel: 4 }), venue({ priceLevel: 1 }), venue({ priceLevel: undefined })],
      1500,
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]?.severity).toBe('info');
    expect(issues[0]?.message).toBe('1 of 3 venues may be above budget');
  });

  it('stays quiet without a budget', () => {
    expect(validateBudget([venue({ priceLevel: 4 })], undefined)).toEqual([]);
    expect(validateBudget([], undefined)).toEqual([]);
  });

  it('warns on an empty venue list when a budget is given', () => {
    const issues = validateBudget([], 100);
    expect(issues).toHaveLength(1);
    expect(issues[0]?.severity).toBe('warning');
    expect(issues[0]?.message).toBe('All suggested venues may exceed budget');
  });
});

describe('validateVenues', () => {
  it('flags missing ratings when fewer than half are rated', () => {
    const issues = validateVenues(
      [venue({ rating: undefined }), venue({ rating: 0 }), venue({ rating: 4 })],
      request(),
    );
    expect(issues.map((i) => i.message)).toEqual(['Some venues missing rating information']);
  });

  it('warns when no venue confirms wheelchair access', () => {
    const issues = validateVenues(
      [venue(), venue({ wheelchairAccessible: false }), venue()],
      request({ accessibilityNeeds: 'wheelchair access' }),
    );
    expect(issues).toContainEqual(
      expect.objectContaining({
        severity: 'warning',
        category: 'accessibility',
        message: 'No confirmed wheelchair-accessible venues found',
      }),
    );
  });

  it('accepts one accessible venue', () => {
    const issues = validateVenues(
      [venue(), venue({ wheelchairAccessible: true }), venue()],
      request({ accessibilityNeeds: 'wheelchair access' }),
    );
    expect(issues).toEqual([]);
  });
});

describe('validateWeather', () => {
  it('warns when the forecast is missing', () => {
    expect(validateWeather(undefined).map((i) => i.message)).toEqual(['Weather data unavailable']);
  });

  it('warns about heavy rain and notes extreme temperatures', () => {
    expect(validateWeather(weather({ rainProbability: 80, temperature: 38 }))).toEqual([
      expect.objectContaining({ severity: 'warning', message: 'High chance of rain (80%)' }),
      expect.objectContaining({ severity: 'info', message: 'Very hot weather expected' }),
    ]);
    expect(validateWeather(weather({ temperature: 5 })).map((i) => i.message)).toEqual([
      'Cold weather expected',
    ]);
  });

  it('does not warn at 70% rain', () => {
    expect(validateWeather(weather({ rainProbability: 70 }))).toEqual([]);
  });
});

// ── Safety and scoring ───────────────────────────────────────

describe('assessSafety', () => {
  it('penalises closed venues', () => {
    const safety = assessSafety([venue(), venue({ openNow: false })], 'Mumbai');
    expect(safety).toMatchObject({
      publicVenue: true,
      operatingHoursValid: false,
      crowdRating: 'Moderate',
      safetyScore: 7,
    });
    expect(safety.emergencyInfo).toContain("Local police: Search 'Mumbai police station'");
  });

  it('penalises an empty venue list', () => {
    const safety = assessSafety([], 'Pune');
    expect(safety.publicVenue).toBe(false);
    expect(safety.safetyScore).toBe(6);
  });
});

describe('calculateConfidence', () => {
  const critical: ValidationIssue = { severity: 'critical', category: 'venues', message: 'x' };

  it('clamps at zero', () => {
    expect(calculateConfidence(0, false, [critical, critical, critical])).toBe(0);
  });

  it('starts at one with no deductions', () => {
    expect(calculateConfidence(3, true, [])).toBe(1);
  });

  it('deducts per issue severity', () => {
    const issues: ValidationIssue[] = [
      { severity: 'warning', category: 'weather', message: 'w' },
      { severity: 'info', category: 'budget', message: 'i' },
    ];
    expect(calculateConfidence(5, true, issues)).toBeCloseTo(0.85);
  });
});
