import { z } from 'zod';

import type {
  ImageResult,
  VenueResult,
  WeatherResult,
} from '../schema/providers.js';

// ── Provider contracts ───────────────────────────────────────
// Each client names its `source`, which the executor stamps on results.

export interface WeatherProvider {
  readonly source: string;
  getForecast(
    latitude: number,
    longitude: number,
    targetDateTime?: string,
  ): Promise<WeatherResult | null>;
}

export interface VenueSearchParams {
  query: string;
  latitude: number;
  longitude: number;
  radius: number;
  venueType: string;
  maxResults: number;
}

export interface VenueProvider {
  readonly source: string;
  searchVenues(params: VenueSearchParams): Promise<VenueResult[]>;
}

export interface ImageProvider {
  readonly source: string;
  searchImages(query: string, count: number): Promise<ImageResult[]>;
}

export interface Providers {
  weather: WeatherProvider;
  venues: VenueProvider;
  images: ImageProvider;
}

// ── Error ────────────────────────────────────────────────────

export class ProviderError extends Error {
  constructor(
    readonly source: string,
    message: string,
  ) {
    super(`${source}: ${message}`);
    this.name = 'ProviderError';
  }
}

// ── Config schema ────────────────────────────────────────────

export const providerConfigSchema = z.object({
  openWeatherApiKey: z.string().min(1).optional(),
  placesApiKey: z.string().min(1).optional(),
  unsplashAccessKey: z.string().min(1).optional(),
});

export type ProviderConfig = z.infer<typeof providerConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export function loadProviderConfig(
  env: NodeJS.ProcessEnv = process.env,
): ProviderConfig {
  return providerConfigSchema.parse({
    openWeatherApiKey: env['OPENWEATHER_API_KEY'] || undefined,
    placesApiKey: env['GOOGLE_PLACES_API_KEY'] || undefined,
    unsplashAccessKey: env['UNSPLASH_ACCESS_KEY'] || undefined,
  });
}

// ── Shared HTTP helper ───────────────────────────────────────

export async function fetchJSON(
  source: string,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<unknown> {
  const response = await fetch(url, {
    ...init,
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    const body = await response.text();
    throw new ProviderError(
      source,
      `HTTP ${String(response.status)}: ${body.slice(0, 200)}`,
    );
  }

  const body: unknown = await response.json();
  return body;
}
