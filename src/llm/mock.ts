import type { GenerateOptions, LLMClient } from './client.js';

const DEFAULT_RESPONSE = '# Mock README\n';

export interface MockCall {
  systemPrompt: string;
  userPrompt: string;
  options: GenerateOptions | undefined;
}

export interface MockLLMClient extends LLMClient {
  readonly calls: readonly MockCall[];
}

/**
 * Mock LLM provider for testing and dry runs.
 * Uses each canned response once, in order, then the default.
 * Records every call.
 */
export function createMockClient(
  responses?: readonly string[],
): MockLLMClient {
  const calls: MockCall[] = [];

  return {
    calls,
    async generate(
      systemPrompt: string,
      userPrompt: string,
      options?: GenerateOptions,
    ): Promise<string> {
      const response = responses?.[calls.length] ?? DEFAULT_RESPONSE;
      calls.push({ systemPrompt, userPrompt, options });
      return response;
    },
  };
}
