import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';
import type { WeatherResult } from '../schema/providers.js';
import * as log from '../utils/logger.js';
import type { WeatherProvider } from './client.js';
import { ProviderError, fetchJSON } from './client.js';

// ── Constants ────────────────────────────────────────────────

const SOURCE = 'openweather';
const BASE_URL = 'https://api.openweathermap.org/data/2.5';

// ── Response validation ──────────────────────────────────────

export const currentWeatherSchema = z.object({
  main: z
    .object({
      temp: z.number().default(0),
      feels_like: z.number().optional(),
      humidity: z.number().default(0),
    })
    .default({}),
  weather: z
    .array(
      z.object({
        main: z.string().default('Unknown'),
        description: z.string().default(''),
      }),
    )
    .default([]),
  wind: z.object({ speed: z.number().default(0) }).default({}),
  rain: z.record(z.number()).optional(),
});

export type CurrentWeatherResponse = z.infer<typeof currentWeatherSchema>;

// ── Mapping ──────────────────────────────────────────────────

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export function deriveRainProbability(
  data: CurrentWeatherResponse,
): number | undefined {
  if (data.rain && Object.keys(data.rain).length > 0) return 80;

  const condition = (data.weather[0]?.main ?? '').toLowerCase();
  const description = (data.weather[0]?.description ?? '').toLowerCase();
  if (condition.includes('rain') || description.includes('drizzle')) return 60;

  return undefined;
}

export function weatherSuggestion(
  temperature: number,
  condition: string,
  rainProbability: number | undefined,
): string {
  const suggestions: string[] = [];
  const lowered = condition.toLowerCase();

  if (temperature < 15) {
    suggestions.push("Bring a jacket - it's quite cool");
  } else if (temperature < 20) {
    suggestions.push('Wear a light sweater');
  } else if (temperature > 32) {
    suggestions.push("Dress light - it's hot outside");
    suggestions.push('Choose an air-conditioned venue');
  }

  if (rainProbability !== undefined && rainProbability > 50) {
    suggestions.push('High chance of rain - carry an umbrella');
    suggestions.push('Consider indoor activities or venues with covered seating');
  } else if (lowered.includes('rain')) {
    suggestions.push('Rain expected - plan for indoor activities');
  }

  if (lowered.includes('clear') || lowered.includes('sunny')) {
    suggestions.push('Perfect weather for outdoor dining');
  } else if (lowered.includes('cloud')) {
    suggestions.push('Pleasant weather for a date');
  }

  return suggestions.length > 0
    ? suggestions.join(' | ')
    : 'Weather looks good for your date';
}

export function toWeatherResult(data: CurrentWeatherResponse): WeatherResult {
  const temperature = data.main.temp;
  const condition = data.weather[0]?.main ?? 'Unknown';
  const rainProbability = deriveRainProbability(data);

  return {
    temperature,
    feelsLike: data.main.feels_like ?? temperature,
    condition,
    description: capitalize(data.weather[0]?.description ?? ''),
    humidity: data.main.humidity,
    windSpeed: data.wind.speed,
    ...(rainProbability !== undefined ? { rainProbability } : {}),
    suggestion: weatherSuggestion(temperature, condition, rainProbability),
  };
}

// ── Provider factory ─────────────────────────────────────────

/**
 * OpenWeatherMap client. Uses the current-weather endpoint; the target
 * date/time is logged but not yet sent, since the free tier has no
 * hourly forecast for arbitrary times.
 */
export function createWeatherProvider(apiKey?: string): WeatherProvider {
  return {
    source: SOURCE,

    async getForecast(latitude, longitude, targetDateTime) {
      if (!apiKey) {
        throw new ProviderError(SOURCE, 'OPENWEATHER_API_KEY is not set');
      }

      log.detail(
        `Weather lookup lat=${String(latitude)} lon=${String(longitude)} at=${targetDateTime ?? 'now'}`,
      );

      const params = new URLSearchParams({
        lat: String(latitude),
        lon: String(longitude),
        appid: apiKey,
        units: 'metric',
      });

      try {
        const body = await fetchJSON(
          SOURCE,
          `${BASE_URL}/weather?${params.toString()}`,
          { method: 'GET' },
          TIMEOUTS.PROVIDER_REQUEST,
        );
        const result = toWeatherResult(currentWeatherSchema.parse(body));
        log.detail(`Weather: ${result.condition}, ${String(result.temperature)}°C`);
        return result;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.warn(`Weather lookup failed: ${message}`);
        return null;
      }
    },
  };
}
