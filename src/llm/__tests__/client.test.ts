import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { createLLMClient, createMockClient, loadLLMConfig } from '../index.js';

describe('loadLLMConfig', () => {
  it('defaults to openai with its key', () => {
    expect(loadLLMConfig({ OPENAI_API_KEY: 'test-secret' })).toEqual({
      provider: 'openai',
      apiKey: 'test-secret',
    });
  });

  it('reads the anthropic key and shared model variable', () => {
    expect(
      loadLLMConfig({
        LLM_PROVIDER: 'anthropic',
        ANTHROPIC_API_KEY: 'test-secret',
        OPENAI_API_KEY: 'unused',
        LLM_MODEL: 'test-model',
      }),
    ).toEqual({ provider: 'anthropic', apiKey: 'test-secret', model: 'test-model' });
  });

  it('treats empty variables as unset', () => {
    expect(loadLLMConfig({ OPENAI_API_KEY: '', LLM_MODEL: '' })).toEqual({
      provider: 'openai',
    });
  });

  it('rejects unknown providers', () => {
    expect(() => loadLLMConfig({ LLM_PROVIDER: 'carrier-pigeon' })).toThrow(ZodError);
  });
});

describe('createLLMClient', () => {
  it('requires a key for hosted providers', () => {
    expect(() => createLLMClient({ provider: 'openai' })).toThrow(
      'OPENAI_API_KEY is required when using the openai provider',
    );
    expect(() => createLLMClient({ provider: 'anthropic' })).toThrow(
      'ANTHROPIC_API_KEY is required when using the anthropic provider',
    );
  });

  it('builds the mock provider without a key', async () => {
    const client = createLLMClient({ provider: 'mock' });

    expect(await client.generate('system', 'user')).toBe('# Mock README\n');
  });
});

describe('createMockClient', () => {
  it('uses each canned response once, then the default', async () => {
    const client = createMockClient(['first', 'second']);

    expect(await client.generate('s', 'u1')).toBe('first');
    expect(await client.generate('s', 'u2', { maxTokens: 10 })).toBe('second');
    expect(await client.generate('s', 'u3')).toBe('# Mock README\n');
    expect(client.calls.map((c) => c.userPrompt)).toEqual(['u1', 'u2', 'u3']);
    expect(client.calls[1]?.options).toEqual({ maxTokens: 10 });
  });
});
