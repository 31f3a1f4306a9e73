import { describe, it, expect } from 'vitest';

import { executePlan, executeStep } from '../core/executor.js';
import { computeOverallStatus } from '../schema/execution.js';
import type { ExecutablePlan, ExecutableStep } from '../schema/plan.js';
import { ProviderError } from '../providers/client.js';
import type { Providers } from '../providers/client.js';
import { fakeProviders, venue, weather } from './fixtures.js';

function step(id: string, action: string, params: Record<string, unknown> = {}): ExecutableStep {
  return { id, action, params };
}

// ── Handlers ─────────────────────────────────────────────────

describe('executeStep', () => {
  it('returns the forecast on success', async () => {
    const result = await executeStep(step('w', 'fetch_weather'), fakeProviders());

    expect(result.status).toBe('success');
    expect(result.source).toBe('fake_weather');
    expect(result.payload).toEqual(weather());
    expect(result.errorMessage).toBeUndefined();
  });

  it('fails the weather step when no forecast comes back', async () => {
    const result = await executeStep(
      step('w', 'fetch_weather'),
      fakeProviders({ weather: null }),
    );

    expect(result.status).toBe('failed');
    expect(result.errorMessage).toBe('Failed to fetch weather data');
    expect(result.payload).toEqual({});
  });

  it('maps loosely typed venue params', async () => {
    const providers = fakeProviders();
    const result = await executeStep(
      step('v', 'search_venues', {
        query: 'italian',
        latitude: '19.076',
        longitude: 72.8777,
        radius: '5000',
        max_results: 'many',
      }),
      providers,
    );

    expect(providers.searchVenues).toHaveBeenCalledWith({
      query: 'italian',
      latitude: 19.076,
      longitude: 72.8777,
      radius: 5000,
      venueType: 'restaurant',
      maxResults: 5,
    });
    expect(result.status).toBe('success');
    expect(result.payload).toEqual({ venues: [venue()] });
  });

  it('fills in weather defaults when params are missing', async () => {
    const providers = fakeProviders();
    await executeStep(step('w', 'fetch_weather'), providers);

    expect(providers.getForecast).toHaveBeenCalledWith(0, 0, undefined);
  });

  it('passes target_datetime through to the forecast', async () => {
    const providers = fakeProviders();
    await executeStep(
      step('w', 'fetch_weather', {
        latitude: 19.076,
        longitude: '72.8777',
        target_datetime: 'Saturday 7pm',
      }),
      providers,
    );

    expect(providers.getForecast).toHaveBeenCalledWith(19.076, 72.8777, 'Saturday 7pm');
  });

  it('fills in venue search defaults when params are missing', async () => {
    const providers = fakeProviders();
    await executeStep(step('v', 'search_venues'), providers);

    expect(providers.searchVenues).toHaveBeenCalledWith({
      query: 'restaurant',
      latitude: 0,
      longitude: 0,
      radius: 3000,
      venueType: 'restaurant',
      maxResults: 5,
    });
  });

  it('fills in image defaults when params are missing', async () => {
    const providers = fakeProviders();
    await executeStep(step('i', 'fetch_images'), providers);

    expect(providers.searchImages).toHaveBeenCalledWith('romantic date', 3);
  });

  it('marks an empty venue search as partial', async () => {
    const result = await executeStep(
      step('v', 'search_venues'),
      fakeProviders({ venues: [[]] }),
    );

    expect(result.status).toBe('partial');
    expect(result.payload).toEqual({ venues: [] });
    expect(result.errorMessage).toBe('No venues found matching criteria');
  });

  it('answers check_events with an empty placeholder', async () => {
    const result = await executeStep(step('e', 'check_events'), fakeProviders());

    expect(result.status).toBe('success');
    expect(result.source).toBe('events_placeholder');
    expect(result.payload).toEqual({ events: [] });
    expect(result.errorMessage).toBe('Events API not integrated (placeholder)');
  });

  it('marks an empty image search as partial', async () => {
    const result = await executeStep(step('i', 'fetch_images'), fakeProviders());

    expect(result.status).toBe('partial');
    expect(result.errorMessage).toBe('No images found');
  });

  it('returns images when found', async () => {
    const images = [{ url: 'https://img.test/1.jpg', photographer: 'A. Tester' }];
    const result = await executeStep(step('i', 'fetch_images'), fakeProviders({ images }));

    expect(result.status).toBe('success');
    expect(result.payload).toEqual({ images });
  });

  it('acknowledges compose_final', async () => {
    const result = await executeStep(step('c', 'compose_final'), fakeProviders());

    expect(result.status).toBe('success');
    expect(result.source).toBe('executor');
    expect(result.payload).toEqual({ readyForComposition: true });
  });

  it('fails unknown actions without calling providers', async () => {
    const providers = fakeProviders();
    const result = await executeStep(step('x', 'book_table'), providers);

    expect(result).toMatchObject({
      stepId: 'x',
      action: 'book_table',
      status: 'failed',
      source: 'executor',
      errorMessage: 'Unknown action: book_table',
    });
    expect(providers.searchVenues).not.toHaveBeenCalled();
  });

  it('turns a provider exception into a failed step', async () => {
    const providers: Providers = {
      ...fakeProviders(),
      weather: {
        source: 'openweather',
        getForecast: async () => {
          throw new ProviderError('openweather', 'OPENWEATHER_API_KEY is not set');
        },
      },
    };

    const result = await executeStep(step('w', 'fetch_weather'), providers);

    expect(result.status).toBe('failed');
    expect(result.source).toBe('executor');
    expect(result.errorMessage).toBe('openweather: OPENWEATHER_API_KEY is not set');
  });
});

// ── Plan execution ───────────────────────────────────────────

describe('executePlan', () => {
  const plan: ExecutablePlan = {
    planId: 'plan_test',
    steps: [
      step('a', 'fetch_weather'),
      step('b', 'search_venues'),
      step('c', 'compose_final'),
    ],
  };

  it('runs every step in order', async () => {
    const report = await executePlan(plan, fakeProviders());

    expect(report.planId).toBe('plan_test');
    expect(report.results.map((r) => r.stepId)).toEqual(['a', 'b', 'c']);
    expect(report.overallStatus).toBe('success');
    expect(report.executionTimeSeconds).toBeGreaterThanOrEqual(0);
  });

  it('keeps plan order when retrying a subset', async () => {
    const report = await executePlan(plan, fakeProviders(), ['c', 'a']);
    expect(report.results.map((r) => r.stepId)).toEqual(['a', 'c']);
  });

  it('reports partial success when a step falls short', async () => {
    const report = await executePlan(plan, fakeProviders({ venues: [[]] }));
    expect(report.overallStatus).toBe('partial_success');
  });
});

describe('computeOverallStatus', () => {
  it('needs every step to succeed for success', () => {
    expect(computeOverallStatus([{ status: 'success' }, { status: 'success' }])).toBe('success');
    expect(computeOverallStatus([{ status: 'success' }, { status: 'failed' }])).toBe('partial_success');
    expect(computeOverallStatus([{ status: 'partial' }, { status: 'failed' }])).toBe('failed');
  });

  it('treats an empty batch as failed', () => {
    expect(computeOverallStatus([])).toBe('failed');
  });
});
