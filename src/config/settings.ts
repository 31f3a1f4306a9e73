import type {
  CityCoordinates,
  FileConfig,
  PriceBracket,
} from '../schema/config.js';
import {
  CITY_COORDINATES,
  DEFAULT_CURRENCY_SYMBOL,
  PRICE_BRACKETS,
} from './defaults.js';

// ── Resolved settings ───────────────────────────────────────

export interface Settings {
  cities: Readonly<Record<string, CityCoordinates>>;
  priceBrackets: readonly PriceBracket[];
  currencySymbol: string;
}

export const DEFAULT_SETTINGS: Settings = {
  cities: CITY_COORDINATES,
  priceBrackets: PRICE_BRACKETS,
  currencySymbol: DEFAULT_CURRENCY_SYMBOL,
};

/**
 * Merge a config file over the built-in defaults.
 * City keys are lower-cased so lookups stay case-insensitive;
 * file entries win over built-in ones. Price brackets replace the
 * defaults wholesale and are sorted by threshold.
 */
export function resolveSettings(file?: Partial<FileConfig>): Settings {
  const cities: Record<string, CityCoordinates> = { ...CITY_COORDINATES };
  for (const [name, coords] of Object.entries(file?.cities ?? {})) {
    cities[name.trim().toLowerCase()] = coords;
  }

  const priceBrackets = file?.priceBrackets
    ? [...file.priceBrackets].sort((a, b) => a.below - b.below)
    : PRICE_BRACKETS;

  return {
    cities,
    priceBrackets,
    currencySymbol: file?.currencySymbol ?? DEFAULT_CURRENCY_SYMBOL,
  };
}
