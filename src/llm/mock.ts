import type { GenerateOptions, LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"result":"mock"}';

export interface RecordedCall {
  system: string;
  user: string;
  options: GenerateOptions;
}

export interface MockClient extends LLMClient {
  readonly calls: readonly RecordedCall[];
}

/**
 * Offline client that replays canned responses in order. Past the end,
 * it answers with a JSON object the planner rejects, so planning drops
 * to the fallback.
 */
export function createMockClient(responses: readonly string[] = []): MockClient {
  const calls: RecordedCall[] = [];

  return {
    model: 'mock',
    calls,
    async generate(system, user, options = {}) {
      const response = responses[calls.length] ?? DEFAULT_RESPONSE;
      calls.push({ system, user, options });
      return response;
    },
  };
}
