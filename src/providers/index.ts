/**
 * Provider module.
 * Thin HTTP clients for weather, venues and images.
 * Each returns typed results; the executor owns failure handling.
 */

import type { ProviderConfig, Providers } from './client.js';
import { createImageProvider } from './images.js';
import { createVenueProvider } from './places.js';
import { createWeatherProvider } from './weather.js';

export * from './client.js';
export { createWeatherProvider } from './weather.js';
export { createVenueProvider, demoVenues } from './places.js';
export { createImageProvider } from './images.js';

export function createProviders(config: ProviderConfig): Providers {
  return {
    weather: createWeatherProvider(config.openWeatherApiKey),
    venues: createVenueProvider(config.placesApiKey),
    images: createImageProvider(config.unsplashAccessKey),
  };
}
