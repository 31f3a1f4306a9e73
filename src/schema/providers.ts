import { z } from 'zod';

// ── VenueResult ──────────────────────────────────────────────

export const venueResultSchema = z.object({
  name: z.string().min(1),
  address: z.string(),
  rating: z.number().min(0).max(5).optional(),
  priceLevel: z.number().int().min(0).max(4).optional(),
  openNow: z.boolean().optional(),
  openingHours: z.array(z.string()).optional(),
  phone: z.string().optional(),
  website: z.string().optional(),
  mapsUrl: z.string().optional(),
  photos: z.array(z.string()).default([]),
  cuisineType: z.string().optional(),
  wheelchairAccessible: z.boolean().optional(),
});

export type VenueResult = z.infer<typeof venueResultSchema>;

// ── WeatherResult ────────────────────────────────────────────

export const weatherResultSchema = z.object({
  temperature: z.number(),
  feelsLike: z.number(),
  condition: z.string(),
  description: z.string(),
  humidity: z.number(),
  windSpeed: z.number(),
  rainProbability: z.number().min(0).max(100).optional(),
  suggestion: z.string(),
});

export type WeatherResult = z.infer<typeof weatherResultSchema>;

// ── EventResult ──────────────────────────────────────────────

export const eventResultSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  startTime: z.string(),
  endTime: z.string().optional(),
  venue: z.string(),
  ticketUrl: z.string().optional(),
  price: z.string().optional(),
  category: z.string().optional(),
});

export type EventResult = z.infer<typeof eventResultSchema>;

// ── ImageResult ──────────────────────────────────────────────

export const imageResultSchema = z.object({
  url: z.string().min(1),
  photographer: z.string(),
  description: z.string().optional(),
});

export type ImageResult = z.infer<typeof imageResultSchema>;
