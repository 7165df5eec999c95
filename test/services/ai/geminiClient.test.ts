import { describe, it, expect, vi } from 'vitest';
import type { GenerateContentParameters, Model } from '@google/genai';
import { GeminiGenerationApi } from '../../../src/services/ai/geminiClient';
import type { GeminiModels } from '../../../src/services/ai/geminiClient';
import { InvalidModelIdError, RemoteCallFailedError } from '../../../src/utils/errors';

async function* pages(models: Model[]): AsyncGenerator<Model> {
  yield* models;
}

function fakeModels(catalog: Model[], text: string | undefined = 'generated') {
  const generateContent = vi.fn(async (_params: GenerateContentParameters) => ({ text }));
  const models: GeminiModels = {
    list: async () => pages(catalog),
    generateContent
  };
  return { models, generateContent };
}

describe('GeminiGenerationApi', () => {
  it('lists models with their generation capability', async () => {
    const { models } = fakeModels([
      { name: 'models/gemini-2.5-flash', supportedActions: ['generateContent', 'countTokens'] },
      { name: 'models/text-embedding-004', supportedActions: ['embedContent'] },
      { name: 'models/legacy' },
      { displayName: 'nameless' }
    ]);

    const catalog = await new GeminiGenerationApi(models).listModels();

    expect(catalog).toEqual([
      { id: 'models/gemini-2.5-flash', supportsGeneration: true },
      { id: 'models/text-embedding-004', supportsGeneration: false },
      { id: 'models/legacy', supportsGeneration: false }
    ]);
  });

  it('sends the prompt to the bound model', async () => {
    const { models, generateContent } = fakeModels([]);
    const handle = new GeminiGenerationApi(models).createHandle('gemini-2.5-flash');

    expect(handle.modelId).toBe('gemini-2.5-flash');
    expect(await handle.generate('Hello')).toBe('generated');
    expect(generateContent).toHaveBeenCalledWith({ model: 'gemini-2.5-flash', contents: 'Hello' });
  });

  it('fails when the response carries no text', async () => {
    const { models } = fakeModels([], undefined);
    const handle = new GeminiGenerationApi(models).createHandle('gemini-2.5-flash');

    await expect(handle.generate('Hello')).rejects.toBeInstanceOf(RemoteCallFailedError);
  });

  it.each(['', 'gemini pro'])('refuses to bind %j', (id) => {
    const { models } = fakeModels([]);

    expect(() => new GeminiGenerationApi(models).createHandle(id)).toThrow(InvalidModelIdError);
  });
});
