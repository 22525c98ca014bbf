import { beforeEach, describe, it, expect, vi } from 'vitest';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create } };
  },
}));

import { createRouterFromConfig, OpenAiLlmClient } from '@/services/llm-client';

describe('OpenAiLlmClient', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('routes main-model tasks to the main model with the task prompt', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: '{"lessons": []}' } }] });
    const client = new OpenAiLlmClient({ apiKey: 'test-secret', smallModel: 'small-model', mainModel: 'main-model' });

    const text = await client.complete('Reflect.', { task: 'reflection', model: 'main', maxTokens: 300 });

    expect(text).toBe('{"lessons": []}');
    expect(create).toHaveBeenCalledWith({
      model: 'main-model',
      messages: [
        { role: 'system', content: 'You assess whether a request was fulfilled and what to learn. Respond in JSON only.' },
        { role: 'user', content: 'Reflect.' },
      ],
      temperature: 0,
      max_tokens: 300,
    });
  });

  it('defaults to the small model', async () => {
    create.mockResolvedValue({ choices: [] });
    const client = new OpenAiLlmClient({ apiKey: 'test-secret', smallModel: 'small-model', mainModel: 'main-model' });

    expect(await client.complete('Hi')).toBe('');
    expect(create).toHaveBeenCalledWith(expect.objectContaining({ model: 'small-model', temperature: 0.5, max_tokens: 512 }));
  });
});

describe('createRouterFromConfig', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('returns no router without an API key', () => {
    expect(createRouterFromConfig({ smallModel: 'small-model', mainModel: 'main-model' })).toBeUndefined();
  });

  it('routes tasks to the configured models', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: '{}' } }] });
    const router = createRouterFromConfig({ apiKey: 'test-secret', smallModel: 'small-model', mainModel: 'main-model' });

    await router?.decompose('Split.');
    await router?.critique('Review.');

    expect(create.mock.calls.map(([body]) => [body.model, body.max_tokens])).toEqual([
      ['small-model', 512],
      ['main-model', 768],
    ]);
  });
});
