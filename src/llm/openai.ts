import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import type { LLMClient } from './client.js';
import { RateLimitedError, withRateLimitRetry } from './retry.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_MAX_TOKENS = 2048;
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

const chatResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .nonempty(),
  usage: z
    .object({ prompt_tokens: z.number(), completion_tokens: z.number() })
    .optional(),
});

function retryAfterMs(response: Response): number | undefined {
  const header = response.headers.get('retry-after');
  if (header === null) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

async function postCompletion(apiKey: string, payload: unknown): Promise<unknown> {
  const response = await fetch(COMPLETIONS_URL, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${apiKey}`,
    },
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(TIMEOUTS.LLM_REQUEST),
  });

  if (response.status === 429) {
    throw new RateLimitedError('OpenAI HTTP 429', retryAfterMs(response));
  }
  if (!response.ok) {
    const body = await response.text();
    throw new Error(`OpenAI API error (${String(response.status)}): ${body.slice(0, 500)}`);
  }

  const body: unknown = await response.json();
  return body;
}

export function createOpenAIClient(
  apiKey: string,
  model: string = DEFAULT_MODEL,
): LLMClient {
  return {
    model,

    async generate(systemPrompt, userPrompt, options = {}) {
      const payload = {
        model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: 0,
        ...(options.json ? { response_format: { type: 'json_object' } } : {}),
      };

      const body = await withRateLimitRetry(
        'OpenAI',
        () => postCompletion(apiKey, payload),
        (err) => err instanceof RateLimitedError,
      );

      const parsed = chatResponseSchema.parse(body);
      if (parsed.usage) {
        log.detail(
          `${model}: ${String(parsed.usage.prompt_tokens)} tokens in, ${String(parsed.usage.completion_tokens)} out`,
        );
      }

      const content = parsed.choices[0].message.content;
      if (content === null || content === '') {
        throw new Error(`${model} returned no text content`);
      }
      return content;
    },
  };
}
