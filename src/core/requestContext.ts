import type { CityCoordinates, PriceBracket } from '../schema/config.js';
import {
  DEFAULT_PRICE_LEVEL,
  MAX_PRICE_LEVEL,
  UNKNOWN_CITY,
} from '../config/defaults.js';

// ── City lookup ──────────────────────────────────────────────
// Unknown cities resolve to (0, 0). Not a geocoding failure.

export function resolveCity(
  city: string,
  table: Readonly<Record<string, CityCoordinates>>,
): CityCoordinates {
  return table[city.trim().toLowerCase()] ?? UNKNOWN_CITY;
}

// ── Price bracket ────────────────────────────────────────────

export function priceBracket(
  budgetPerPerson: number | undefined,
  brackets: readonly PriceBracket[],
): number {
  if (budgetPerPerson === undefined) return DEFAULT_PRICE_LEVEL;

  for (const bracket of brackets) {
    if (budgetPerPerson < bracket.below) return bracket.level;
  }
  return MAX_PRICE_LEVEL;
}

// ── Date/time parsing (best effort) ──────────────────────────

export interface ParsedDateTime {
  original: string;
  day: string | null;
  date: string | null;
  time: string | null;
  hour: number | null;
  minute: number | null;
}

const WEEKDAYS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
];

const ISO_DATE_TIME = /(\d{4}-\d{2}-\d{2})[\sT]+(\d{2}):(\d{2})/i;
const MERIDIEM_TIME = /\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/;
const CLOCK_TIME = /\b(\d{1,2}):(\d{2})\b/;

function to24Hour(hour: number, meridiem: string): number {
  const base = hour % 12;
  return meridiem === 'pm' ? base + 12 : base;
}

/**
 * Extract a weekday and a clock time from free text such as
 * "Saturday 7pm" or "2024-02-10 19:00". Unmatched parts stay null.
 */
export function parseDateTime(input: string): ParsedDateTime {
  const text = input.trim().toLowerCase();
  const result: ParsedDateTime = {
    original: text,
    day: null,
    date: null,
    time: null,
    hour: null,
    minute: null,
  };

  const day = WEEKDAYS.find((d) => text.includes(d));
  if (day) result.day = day.charAt(0).toUpperCase() + day.slice(1);

  const iso = ISO_DATE_TIME.exec(text);
  if (iso?.[1] && iso[2] && iso[3]) {
    result.date = iso[1];
    result.time = iso[0];
    result.hour = Number(iso[2]);
    result.minute = Number(iso[3]);
    return result;
  }

  const meridiem = MERIDIEM_TIME.exec(text);
  if (meridiem?.[1] && meridiem[3]) {
    const hour = Number(meridiem[1]);
    if (hour >= 1 && hour <= 12) {
      result.time = meridiem[0];
      result.hour = to24Hour(hour, meridiem[3]);
      result.minute = meridiem[2] ? Number(meridiem[2]) : 0;
      return result;
    }
  }

  const clock = CLOCK_TIME.exec(text);
  if (clock?.[1] && clock[2]) {
    const hour = Number(clock[1]);
    const minute = Number(clock[2]);
    if (hour < 24 && minute < 60) {
      result.time = clock[0];
      result.hour = hour;
      result.minute = minute;
    }
  }

  return result;
}

// ── Plan id ──────────────────────────────────────────────────
// Second resolution: two plans created in the same second share an id.

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function generatePlanId(now: Date = new Date()): string {
  const date = `${String(now.getFullYear())}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `plan_${date}_${time}`;
}
