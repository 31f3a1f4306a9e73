import { z } from 'zod';

// ── Client contract ──────────────────────────────────────────

export interface GenerateOptions {
  /** Ask the provider for a bare JSON object. */
  json?: boolean | undefined;
  maxTokens?: number | undefined;
}

export interface LLMClient {
  readonly model: string;
  generate(
    systemPrompt: string,
    userPrompt: string,
    options?: GenerateOptions,
  ): Promise<string>;
}

// ── Config ───────────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

/** Env var holding the key for each hosted provider. */
export const API_KEY_ENV = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
} as const satisfies Partial<Record<LLMProvider, string>>;

export function loadLLMConfig(
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const provider = llmProviderSchema.parse(env['LLM_PROVIDER'] || 'anthropic');
  const keyVar = provider === 'mock' ? undefined : API_KEY_ENV[provider];

  return llmConfigSchema.parse({
    provider,
    apiKey: (keyVar && env[keyVar]) || undefined,
    model: env['LLM_MODEL'] || undefined,
  });
}
