import { vi } from 'vitest';
import type { Mock } from 'vitest';

import type {
  DatePlanRequest,
  ExecutionReport,
  ImageResult,
  StepResult,
  VenueResult,
  WeatherResult,
} from '../schema/index.js';
import type { Providers, VenueSearchParams } from '../providers/client.js';

// ── Test data builders ───────────────────────────────────────

export function venue(overrides: Partial<VenueResult> = {}): VenueResult {
  return {
    name: 'Test Venue',
    address: '1 Test Street',
    rating: 4.5,
    priceLevel: 2,
    openNow: true,
    photos: [],
    ...overrides,
  };
}

export function weather(overrides: Partial<WeatherResult> = {}): WeatherResult {
  return {
    temperature: 25,
    feelsLike: 26,
    condition: 'Clear',
    description: 'Clear sky',
    humidity: 60,
    windSpeed: 3,
    rainProbability: 10,
    suggestion: 'Perfect weather for outdoor dining',
    ...overrides,
  };
}

export function request(overrides: Partial<DatePlanRequest> = {}): DatePlanRequest {
  return {
    city: 'Mumbai',
    budgetPerPerson: 1500,
    dateTime: 'Saturday 7pm',
    ...overrides,
  };
}

// ── Execution reports ────────────────────────────────────────

const TIMESTAMP = '2024-02-10T12:00:00.000Z';

export function success(
  stepId: string,
  action: string,
  payload: Record<string, unknown>,
): StepResult {
  return {
    stepId,
    action,
    status: 'success',
    payload,
    source: 'test',
    timestamp: TIMESTAMP,
  };
}

export function report(
  venues: readonly VenueResult[],
  weatherResult?: WeatherResult,
): ExecutionReport {
  const results: StepResult[] = [];
  if (weatherResult) {
    results.push(success('step_1', 'fetch_weather', weatherResult));
  }
  results.push(
    venues.length > 0
      ? success('step_2', 'search_venues', { venues })
      : {
          stepId: 'step_2',
          action: 'search_venues',
          status: 'partial',
          payload: { venues: [] },
          source: 'test',
          errorMessage: 'No venues found matching criteria',
          timestamp: TIMESTAMP,
        },
  );
  return {
    planId: 'plan_test',
    results,
    overallStatus: 'partial_success',
    executionTimeSeconds: 0.01,
  };
}

// ── Fake providers ───────────────────────────────────────────

export interface FakeProviderData {
  venues?: VenueResult[][];
  weather?: WeatherResult | null;
  images?: ImageResult[];
}

/**
 * In-process providers. `venues` is consumed one batch per search, the
 * last batch repeating once the list runs out.
 */
export function fakeProviders(data: FakeProviderData = {}): Providers & {
  getForecast: Mock<
    (latitude: number, longitude: number, targetDateTime?: string) => Promise<WeatherResult | null>
  >;
  searchVenues: Mock<(params: VenueSearchParams) => Promise<VenueResult[]>>;
  searchImages: Mock<(query: string, count: number) => Promise<ImageResult[]>>;
} {
  const batches = data.venues ?? [[venue()]];
  let call = 0;

  const searchVenues = vi.fn(async (_params: VenueSearchParams) => {
    const batch = batches[Math.min(call, batches.length - 1)] ?? [];
    call++;
    return batch;
  });

  const getForecast = vi.fn(
    async (_latitude: number, _longitude: number, _targetDateTime?: string) =>
      data.weather === undefined ? weather() : data.weather,
  );
  const searchImages = vi.fn(
    async (_query: string, _count: number): Promise<ImageResult[]> => data.images ?? [],
  );

  return {
    getForecast,
    searchVenues,
    searchImages,
    weather: { source: 'fake_weather', getForecast },
    venues: { source: 'fake_venues', searchVenues },
    images: { source: 'fake_images', searchImages },
  };
}
