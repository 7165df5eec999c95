import { describe, it, expect, vi } from 'vitest';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { OpenAIGenerationApi, isChatModel } from '../../../src/services/ai/openaiClient';
import type { OpenAIClientLike } from '../../../src/services/ai/openaiClient';
import { RemoteCallFailedError } from '../../../src/utils/errors';

async function* modelPages(ids: string[]): AsyncGenerator<{ id: string }> {
  for (const id of ids) yield { id };
}

function fakeClient(ids: string[], content: string | null = 'generated') {
  const create = vi.fn(async (_body: ChatCompletionCreateParamsNonStreaming) => ({
    choices: [{ message: { content } }]
  }));
  const client: OpenAIClientLike = {
    models: { list: () => modelPages(ids) },
    chat: { completions: { create } }
  };
  return { client, create };
}

describe('isChatModel', () => {
  it.each([
    ['gpt-4o', true],
    ['gpt-4.1-mini', true],
    ['o3-mini', true],
    ['chatgpt-4o-latest', true],
    ['gpt-4o-audio-preview', false],
    ['gpt-3.5-turbo-instruct', false],
    ['text-embedding-3-small', false],
    ['dall-e-3', false]
  ])('%s -> %s', (id, expected) => {
    expect(isChatModel(id)).toBe(expected);
  });
});

describe('OpenAIGenerationApi', () => {
  it('marks chat models as able to generate', async () => {
    const { client } = fakeClient(['gpt-4o', 'whisper-1']);

    expect(await new OpenAIGenerationApi(client).listModels()).toEqual([
      { id: 'gpt-4o', supportsGeneration: true },
      { id: 'whisper-1', supportsGeneration: false }
    ]);
  });

  it('sends the prompt as the user message', async () => {
    const { client, create } = fakeClient([]);
    const handle = new OpenAIGenerationApi(client, { maxTokens: 500 }).createHandle('gpt-4o-mini');

    expect(await handle.generate('Write a post')).toBe('generated');
    expect(create).toHaveBeenCalledTimes(1);
    const body = create.mock.calls[0][0];
    expect(body.model).toBe('gpt-4o-mini');
    expect(body.max_completion_tokens).toBe(500);
    expect(body.messages[1]).toEqual({ role: 'user', content: 'Write a post' });
  });

  it('fails when the completion has no content', async () => {
    const { client } = fakeClient([], null);
    const handle = new OpenAIGenerationApi(client).createHandle('gpt-4o');

    await expect(handle.generate('x')).rejects.toThrow(RemoteCallFailedError);
  });
});
