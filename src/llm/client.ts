import { z } from 'zod';

// ── LLMClient interface ──────────────────────────────────────

export interface GenerateOptions {
  maxTokens?: number | undefined;
  temperature?: number | undefined;
}

export interface LLMClient {
  generate(
    systemPrompt: string,
    userPrompt: string,
    options?: GenerateOptions,
  ): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['openai', 'anthropic', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export function loadLLMConfig(env: NodeJS.ProcessEnv = process.env): LLMConfig {
  const provider = env['LLM_PROVIDER'] ?? 'openai';

  const apiKey = provider === 'anthropic'
    ? env['ANTHROPIC_API_KEY']
    : env['OPENAI_API_KEY'];

  return llmConfigSchema.parse({
    provider,
    apiKey: apiKey || undefined,
    model: env['LLM_MODEL'] || undefined,
  });
}
