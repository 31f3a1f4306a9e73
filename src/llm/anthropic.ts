import Anthropic from '@anthropic-ai/sdk';

import { TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import type { LLMClient } from './client.js';
import { withRateLimitRetry } from './retry.js';

const DEFAULT_MODEL = 'claude-3-5-haiku-latest';
const DEFAULT_MAX_TOKENS = 2048;

// JSON mode is emulated by prefilling the assistant turn with "{".
const JSON_PREFILL = '{';

function isRateLimited(err: unknown): boolean {
  return err instanceof Anthropic.RateLimitError;
}

export function createAnthropicClient(
  apiKey: string,
  model: string = DEFAULT_MODEL,
): LLMClient {
  const sdk = new Anthropic({
    apiKey,
    timeout: TIMEOUTS.LLM_REQUEST,
    maxRetries: 0,
  });

  return {
    model,

    async generate(systemPrompt, userPrompt, options = {}) {
      const messages: Anthropic.MessageParam[] = [{ role: 'user', content: userPrompt }];
      if (options.json) {
        messages.push({ role: 'assistant', content: JSON_PREFILL });
      }

      const response = await withRateLimitRetry(
        'Anthropic',
        () =>
          sdk.messages.create({
            model,
            max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
            system: systemPrompt,
            messages,
            temperature: 0,
          }),
        isRateLimited,
      );

      log.detail(
        `${model}: ${String(response.usage.input_tokens)} tokens in, ${String(response.usage.output_tokens)} out`,
      );

      const text = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('');
      if (text === '') {
        throw new Error(`${model} returned no text content`);
      }

      return options.json ? JSON_PREFILL + text : text;
    },
  };
}
