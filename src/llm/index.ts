/**
 * LLM module.
 * The planner is the only caller; everything else is deterministic.
 */

import { ConfigError } from '../config/loader.js';
import type { LLMClient, LLMConfig } from './client.js';
import { API_KEY_ENV } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockClient, RecordedCall } from './mock.js';
export { RateLimitedError, withRateLimitRetry } from './retry.js';

function requireKey(config: LLMConfig, provider: keyof typeof API_KEY_ENV): string {
  if (!config.apiKey) {
    throw new ConfigError(
      `${API_KEY_ENV[provider]} is required when using the ${provider} provider`,
    );
  }
  return config.apiKey;
}

export function createLLMClient(config: LLMConfig): LLMClient {
  switch (config.provider) {
    case 'anthropic':
      return createAnthropicClient(requireKey(config, 'anthropic'), config.model);
    case 'openai':
      return createOpenAIClient(requireKey(config, 'openai'), config.model);
    case 'mock':
      return createMockClient();
  }
}
