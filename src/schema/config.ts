import { z } from 'zod';

import { datePlanRequestSchema } from './request.js';

// ── City table entry ────────────────────────────────────────

export const cityCoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  country: z.string().min(1).optional(),
});

export type CityCoordinates = z.infer<typeof cityCoordinatesSchema>;

// ── Price bracket ───────────────────────────────────────────
// A budget strictly below `below` maps to `level`.

export const priceBracketSchema = z.object({
  below: z.number().positive(),
  level: z.number().int().min(1).max(4),
});

export type PriceBracket = z.infer<typeof priceBracketSchema>;

// ── Named request ───────────────────────────────────────────

export const namedRequestSchema = datePlanRequestSchema.extend({
  name: z.string().min(1),
});

export type NamedRequest = z.infer<typeof namedRequestSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  provider: z.enum(['anthropic', 'openai', 'mock']).optional(),
  model: z.string().min(1).optional(),
  currencySymbol: z.string().min(1).optional(),
  cities: z.record(cityCoordinatesSchema).optional(),
  priceBrackets: z.array(priceBracketSchema).min(1).optional(),
  requests: z.array(namedRequestSchema).optional().default([]),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
