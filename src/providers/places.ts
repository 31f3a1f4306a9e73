import { z } from 'zod';

import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import type { VenueResult } from '../schema/providers.js';
import * as log from '../utils/logger.js';
import type { VenueProvider, VenueSearchParams } from './client.js';
import { fetchJSON } from './client.js';

// ── Constants ────────────────────────────────────────────────

const SOURCE = 'google_places';
const BASE_URL = 'https://places.googleapis.com/v1';

const FIELD_MASK = [
  'places.id',
  'places.displayName',
  'places.formattedAddress',
  'places.rating',
  'places.priceLevel',
  'places.currentOpeningHours',
  'places.internationalPhoneNumber',
  'places.websiteUri',
  'places.photos',
  'places.types',
  'places.accessibilityOptions',
  'places.location',
].join(',');

const PRICE_LEVELS: Readonly<Record<string, number>> = {
  PRICE_LEVEL_FREE: 0,
  PRICE_LEVEL_INEXPENSIVE: 1,
  PRICE_LEVEL_MODERATE: 2,
  PRICE_LEVEL_EXPENSIVE: 3,
  PRICE_LEVEL_VERY_EXPENSIVE: 4,
};

const CUISINE_TYPES = ['restaurant', 'cafe', 'bar', 'bakery', 'food'];

// ── Response validation ──────────────────────────────────────

const placeSchema = z.object({
  id: z.string().optional(),
  displayName: z.object({ text: z.string() }).optional(),
  formattedAddress: z.string().optional(),
  rating: z.number().optional(),
  priceLevel: z.string().optional(),
  currentOpeningHours: z
    .object({
      openNow: z.boolean().optional(),
      weekdayDescriptions: z.array(z.string()).optional(),
    })
    .optional(),
  internationalPhoneNumber: z.string().optional(),
  websiteUri: z.string().optional(),
  photos: z.array(z.object({ name: z.string().optional() })).optional(),
  types: z.array(z.string()).optional(),
  accessibilityOptions: z
    .object({ wheelchairAccessibleEntrance: z.boolean().optional() })
    .optional(),
  location: z
    .object({ latitude: z.number(), longitude: z.number() })
    .optional(),
});

export type Place = z.infer<typeof placeSchema>;

const searchTextResponseSchema = z.object({
  places: z.array(z.unknown()).default([]),
});

// ── Mapping ──────────────────────────────────────────────────

function mapsUrl(place: Place): string | undefined {
  if (place.location) {
    const { latitude, longitude } = place.location;
    const suffix = place.id ? `&query_place_id=${place.id}` : '';
    return `https://www.google.com/maps/search/?api=1&query=${String(latitude)},${String(longitude)}${suffix}`;
  }
  if (place.id) {
    return `https://www.google.com/maps/place/?q=place_id:${place.id}`;
  }
  return undefined;
}

function titleCase(text: string): string {
  return text
    .split('_')
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');
}

export function toVenueResult(place: Place, apiKey: string): VenueResult {
  const priceLevel = place.priceLevel !== undefined
    ? PRICE_LEVELS[place.priceLevel]
    : undefined;
  const cuisine = place.types?.find((t) => CUISINE_TYPES.includes(t));
  const hours = place.currentOpeningHours;
  const url = mapsUrl(place);

  const photos = (place.photos ?? [])
    .slice(0, LIMITS.MAX_VENUE_PHOTOS)
    .flatMap((p) =>
      p.name
        ? [`${BASE_URL}/${p.name}/media?maxHeightPx=400&maxWidthPx=400&key=${apiKey}`]
        : [],
    );

  const wheelchair = place.accessibilityOptions?.wheelchairAccessibleEntrance;

  return {
    name: place.displayName?.text ?? 'Unknown',
    address: place.formattedAddress ?? 'Address not available',
    ...(place.rating !== undefined ? { rating: place.rating } : {}),
    ...(priceLevel !== undefined ? { priceLevel } : {}),
    ...(hours?.openNow !== undefined ? { openNow: hours.openNow } : {}),
    ...(hours?.weekdayDescriptions && hours.weekdayDescriptions.length > 0
      ? { openingHours: hours.weekdayDescriptions }
      : {}),
    ...(place.internationalPhoneNumber !== undefined
      ? { phone: place.internationalPhoneNumber }
      : {}),
    ...(place.websiteUri !== undefined ? { website: place.websiteUri } : {}),
    ...(url !== undefined ? { mapsUrl: url } : {}),
    photos,
    ...(cuisine !== undefined ? { cuisineType: titleCase(cuisine) } : {}),
    ...(wheelchair !== undefined ? { wheelchairAccessible: wheelchair } : {}),
  };
}

// ── Demo mode ────────────────────────────────────────────────

function guessCity(latitude: number, longitude: number): string {
  if (latitude > 18.5 && latitude < 19.5 && longitude > 72.5 && longitude < 73.5) {
    return 'Mumbai';
  }
  if (latitude > 12.5 && latitude < 13.5 && longitude > 77.0 && longitude < 78.0) {
    return 'Bangalore';
  }
  if (latitude > 18.3 && latitude < 18.7 && longitude > 73.5 && longitude < 74.0) {
    return 'Pune';
  }
  return 'City';
}

export function demoVenues(params: VenueSearchParams): VenueResult[] {
  const city = guessCity(params.latitude, params.longitude);
  const url = `https://www.google.com/maps/search/?api=1&query=${String(params.latitude)},${String(params.longitude)}`;

  const venues: VenueResult[] = [
    {
      name: `Sample Restaurant 1 - ${city}`,
      address: `123 Main Street, ${city}`,
      rating: 4.5,
      priceLevel: 2,
      openNow: true,
      openingHours: ['Monday-Sunday: 11:00 AM – 11:00 PM'],
      phone: '+00-0000000001',
      website: 'https://example.com/restaurant1',
      mapsUrl: url,
      photos: [],
      cuisineType: 'Indian Vegetarian',
      wheelchairAccessible: true,
    },
    {
      name: `Demo Cafe - ${city}`,
      address: `456 Park Avenue, ${city}`,
      rating: 4.3,
      priceLevel: 2,
      openNow: true,
      openingHours: ['Monday-Sunday: 10:00 AM – 10:00 PM'],
      phone: '+00-0000000002',
      website: 'https://example.com/cafe',
      mapsUrl: url,
      photos: [],
      cuisineType: 'Cafe',
      wheelchairAccessible: true,
    },
    {
      name: `Sample Bistro - ${city}`,
      address: `789 Garden Road, ${city}`,
      rating: 4.7,
      priceLevel: 3,
      openNow: true,
      openingHours: ['Monday-Sunday: 12:00 PM – 11:00 PM'],
      phone: '+00-0000000003',
      website: 'https://example.com/bistro',
      mapsUrl: url,
      photos: [],
      cuisineType: 'Continental',
      wheelchairAccessible: false,
    },
  ];

  return venues.slice(0, params.maxResults);
}

// ── Provider factory ─────────────────────────────────────────

/**
 * Google Places (New) text-search client.
 * Without an API key it serves sample venues so the pipeline stays usable.
 */
export function createVenueProvider(apiKey?: string): VenueProvider {
  if (!apiKey) {
    log.info('Google Places not configured, serving demo venues');
  }

  return {
    source: SOURCE,

    async searchVenues(params) {
      log.detail(
        `Venue search "${params.query}" near ${String(params.latitude)},${String(params.longitude)} r=${String(params.radius)}m`,
      );

      if (!apiKey) return demoVenues(params);

      try {
        const body = await fetchJSON(
          SOURCE,
          `${BASE_URL}/places:searchText`,
          {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
              'X-Goog-Api-Key': apiKey,
              'X-Goog-FieldMask': FIELD_MASK,
            },
            body: JSON.stringify({
              textQuery: `${params.query} ${params.venueType}`,
              locationBias: {
                circle: {
                  center: {
                    latitude: params.latitude,
                    longitude: params.longitude,
                  },
                  radius: params.radius,
                },
              },
              maxResultCount: params.maxResults,
            }),
          },
          TIMEOUTS.PROVIDER_REQUEST,
        );

        const venues: VenueResult[] = [];
        for (const raw of searchTextResponseSchema.parse(body).places) {
          const place = placeSchema.safeParse(raw);
          if (!place.success) {
            log.warn(`Skipping unparsable place: ${place.error.message}`);
            continue;
          }
          venues.push(toVenueResult(place.data, apiKey));
        }

        log.detail(`Found ${String(venues.length)} venues`);
        return venues;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.warn(`Venue search failed: ${message}`);
        return [];
      }
    },
  };
}
