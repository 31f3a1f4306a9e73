/**
 * Default configuration values.
 * Cities, price brackets and currency are overridable via config file.
 */

import type { CityCoordinates, PriceBracket } from '../schema/config.js';

export const TIMEOUTS = {
  PROVIDER_REQUEST: 30_000,
  LLM_REQUEST: 60_000,
  RATE_LIMIT_WAIT: 5_000,
} as const;

export const LIMITS = {
  MAX_VERIFY_RETRIES: 1,
  MAX_LLM_RETRIES: 3,
  MAX_FINAL_VENUES: 5,
  MAX_VENUE_PHOTOS: 3,
} as const;

export const STEP_DEFAULTS = {
  VENUE_QUERY: 'restaurant',
  VENUE_RADIUS: 3_000,
  VENUE_TYPE: 'restaurant',
  VENUE_MAX_RESULTS: 5,
  IMAGE_QUERY: 'romantic date',
  IMAGE_COUNT: 3,
  FALLBACK_IMAGE_QUERY: 'romantic restaurant dinner',
} as const;

// ── Planning data ───────────────────────────────────────────

export const UNKNOWN_CITY: CityCoordinates = {
  lat: 0,
  lon: 0,
  country: 'UNKNOWN',
};

export const CITY_COORDINATES: Readonly<Record<string, CityCoordinates>> = {
  mumbai: { lat: 19.076, lon: 72.8777, country: 'IN' },
  delhi: { lat: 28.7041, lon: 77.1025, country: 'IN' },
  bangalore: { lat: 12.9716, lon: 77.5946, country: 'IN' },
  bengaluru: { lat: 12.9716, lon: 77.5946, country: 'IN' },
  pune: { lat: 18.5204, lon: 73.8567, country: 'IN' },
  hyderabad: { lat: 17.385, lon: 78.4867, country: 'IN' },
  chennai: { lat: 13.0827, lon: 80.2707, country: 'IN' },
  kolkata: { lat: 22.5726, lon: 88.3639, country: 'IN' },
  ahmedabad: { lat: 23.0225, lon: 72.5714, country: 'IN' },
  jaipur: { lat: 26.9124, lon: 75.7873, country: 'IN' },
  goa: { lat: 15.2993, lon: 74.124, country: 'IN' },
};

export const PRICE_BRACKETS: readonly PriceBracket[] = [
  { below: 500, level: 1 },
  { below: 1_500, level: 2 },
  { below: 3_000, level: 3 },
];

export const MAX_PRICE_LEVEL = 4;
export const DEFAULT_PRICE_LEVEL = 2;

// ── Verification heuristics ─────────────────────────────────

export const COST_PER_PRICE_LEVEL = 750;
export const DEFAULT_CURRENCY_SYMBOL = '₹';

export const CONFIDENCE = {
  NO_VENUES: 0.5,
  FEW_VENUES: 0.2,
  NO_WEATHER: 0.1,
  CRITICAL: 0.3,
  WARNING: 0.1,
  INFO: 0.05,
} as const;

export const SAFETY = {
  BASE_SCORE: 8,
  HOURS_INVALID_PENALTY: 1,
  NO_VENUES_PENALTY: 2,
  CROWD_RATING: 'Moderate',
} as const;

export const WEATHER_THRESHOLDS = {
  RAIN_WARNING: 70,
  RAIN_BACKUP: 50,
  HOT: 35,
  COLD: 10,
} as const;

export const LATE_NIGHT = {
  FROM_HOUR: 21,
  UNTIL_HOUR: 4,
} as const;

export const RETRY_RECOMMENDATIONS = [
  'Retry venue search with broader criteria',
  'Increase search radius to 5000m',
] as const;

export const TRANSPORTATION_SUGGESTIONS = [
  'Book a cab through Uber/Ola for convenience',
  'Share ride details with a friend',
  'Metro is a safe and affordable option for major cities',
  'Arrive 10-15 minutes early',
] as const;

export const SAFETY_CHECKLIST = [
  'Share live location with a trusted friend or family member',
  'Choose a public, well-lit venue',
  'Arrange your own transportation',
  'Keep emergency contacts handy',
  'Trust your instincts - leave if uncomfortable',
] as const;

export const LATE_NIGHT_CHECKLIST = [
  'Inform someone about your expected return time',
  'Book a verified cab service for return journey',
] as const;

export const FALLBACK_SAFETY_NOTES = [
  'Choose a public, well-lit venue',
  'Share location with a trusted friend',
  'Arrange your own transportation',
] as const;

export function emergencyContacts(city: string): string[] {
  return [
    'Emergency: 112 (India)',
    `Local police: Search '${city} police station'`,
    "Women's helpline: 1091",
    'Ambulance: 108',
  ];
}
