import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';
import type { ImageResult } from '../schema/providers.js';
import * as log from '../utils/logger.js';
import type { ImageProvider } from './client.js';
import { ProviderError, fetchJSON } from './client.js';

// ── Constants ────────────────────────────────────────────────

const SOURCE = 'unsplash';
const BASE_URL = 'https://api.unsplash.com';

// ── Response validation ──────────────────────────────────────

const photoSchema = z.object({
  urls: z.object({ regular: z.string().optional() }).optional(),
  user: z.object({ name: z.string().optional() }).optional(),
  description: z.string().nullable().optional(),
  alt_description: z.string().nullable().optional(),
});

export type UnsplashPhoto = z.infer<typeof photoSchema>;

const searchResponseSchema = z.object({
  results: z.array(photoSchema).default([]),
});

// ── Mapping ──────────────────────────────────────────────────

export function toImageResult(photo: UnsplashPhoto): ImageResult | null {
  const url = photo.urls?.regular;
  if (!url) return null;

  const description = photo.description ?? photo.alt_description ?? undefined;

  return {
    url,
    photographer: photo.user?.name ?? 'Unknown',
    ...(description ? { description } : {}),
  };
}

// ── Provider factory ─────────────────────────────────────────

export function createImageProvider(accessKey?: string): ImageProvider {
  return {
    source: SOURCE,

    async searchImages(query, count) {
      if (!accessKey) {
        throw new ProviderError(SOURCE, 'UNSPLASH_ACCESS_KEY is not set');
      }

      log.detail(`Image search "${query}" x${String(count)}`);

      const params = new URLSearchParams({
        query,
        per_page: String(count),
        orientation: 'landscape',
      });

      try {
        const body = await fetchJSON(
          SOURCE,
          `${BASE_URL}/search/photos?${params.toString()}`,
          {
            method: 'GET',
            headers: { Authorization: `Client-ID ${accessKey}` },
          },
          TIMEOUTS.PROVIDER_REQUEST,
        );

        return searchResponseSchema
          .parse(body)
          .results.map(toImageResult)
          .filter((img): img is ImageResult => img !== null);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.warn(`Image search failed: ${message}`);
        return [];
      }
    },
  };
}
