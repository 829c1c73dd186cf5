import { describe, it, expect, vi, beforeEach } from 'vitest';

const { create, clientOptions } = vi.hoisted(() => {
  const clientOptions: unknown[] = [];
  return { create: vi.fn(), clientOptions };
});

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create } };

    constructor(options: unknown) {
      clientOptions.push(options);
    }
  },
}));

import { classifyLlmError, isUsableApiKey, llmErrorMessage, OpenAiChatClient } from '../src/llm/client';

const request = {
  systemPrompt: 'persona',
  userPrompt: 'User Question: What is bail?',
  temperature: 0.7,
  maxTokens: 500,
};

describe('isUsableApiKey', () => {
  it('rejects blank and placeholder keys', () => {
    expect(isUsableApiKey(undefined)).toBe(false);
    expect(isUsableApiKey('  ')).toBe(false);
    expect(isUsableApiKey('your_openai_key')).toBe(false);
    expect(isUsableApiKey('test-secret')).toBe(true);
  });
});

describe('classifyLlmError', () => {
  it.each([
    [{ status: 401 }, 'authentication'],
    [{ code: 'invalid_api_key' }, 'authentication'],
    [new Error('Authentication failed'), 'authentication'],
    [{ status: 429, code: 'insufficient_quota' }, 'quota'],
    [new Error('Check your plan and billing details'), 'quota'],
    [{ status: 429 }, 'rate_limit'],
    [{ code: 'rate_limit_exceeded' }, 'rate_limit'],
    [new Error('rate_limit hit'), 'rate_limit'],
    [new Error('socket hang up'), 'generic'],
    ['plain failure', 'generic'],
  ])('classifies %o as %s', (error, kind) => {
    expect(classifyLlmError(error)).toBe(kind);
  });
});

describe('llmErrorMessage', () => {
  it('includes the underlying message for generic errors', () => {
    expect(llmErrorMessage('generic', new Error('socket hang up'))).toBe('Language model API error: socket hang up');
    expect(llmErrorMessage('generic')).toBe('Language model API error: Unknown error');
  });
});

describe('OpenAiChatClient', () => {
  beforeEach(() => {
    create.mockReset();
    clientOptions.length = 0;
  });

  it('is unavailable without a usable key', async () => {
    const client = new OpenAiChatClient({ apiKey: 'your_key_here', model: 'gpt-3.5-turbo' });

    expect(client.available).toBe(false);
    await expect(client.complete(request)).rejects.toThrow('LLM API key not configured. Set OPENAI_API_KEY.');
    expect(clientOptions).toHaveLength(0);
  });

  it('sends the system and user prompts', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: 'Bail is release pending trial.' } }] });
    const client = new OpenAiChatClient({
      apiKey: 'test-secret',
      baseURL: 'http://llm.test/v1',
      model: 'gpt-3.5-turbo',
    });

    await expect(client.complete(request)).resolves.toBe('Bail is release pending trial.');
    expect(clientOptions).toEqual([{ apiKey: 'test-secret', baseURL: 'http://llm.test/v1', maxRetries: 0 }]);
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-3.5-turbo',
      temperature: 0.7,
      max_tokens: 500,
      messages: [
        { role: 'system', content: 'persona' },
        { role: 'user', content: 'User Question: What is bail?' },
      ],
    });
  });

  it('rejects empty completions', async () => {
    create.mockResolvedValue({ choices: [] });
    const client = new OpenAiChatClient({ apiKey: 'test-secret', model: 'gpt-3.5-turbo' });

    await expect(client.complete(request)).rejects.toThrow('LLM response did not contain any content.');
  });
});
