import { GoogleGenAI } from '@google/genai';
import type { GenerateContentParameters, Model } from '@google/genai';
import type { ModelCandidate } from '../../utils/types';
import { RemoteCallFailedError } from '../../utils/errors';
import { assertModelId } from './generationApi';
import type { GenerationApi, GenerationHandle } from './generationApi';

export const GEMINI_PREFERRED_MODELS = [
  'gemini-2.5-pro',
  'gemini-2.5-flash',
  'gemini-1.5-pro',
  'gemini-1.5-flash',
  'gemini-2.0-flash-exp',
  'gemini-1.0-pro',
  'gemini-pro'
];

const GENERATE_ACTION = 'generateContent';

/** The slice of `GoogleGenAI['models']` this adapter calls. */
export interface GeminiModels {
  list(): Promise<AsyncIterable<Model>>;
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export class GeminiGenerationApi implements GenerationApi {
  readonly provider = 'gemini';

  constructor(private readonly models: GeminiModels) {}

  static fromApiKey(apiKey: string): GeminiGenerationApi {
    return new GeminiGenerationApi(new GoogleGenAI({ apiKey }).models);
  }

  async listModels(): Promise<ModelCandidate[]> {
    const candidates: ModelCandidate[] = [];
    const pager = await this.models.list();
    for await (const model of pager) {
      if (!model.name) continue;
      candidates.push({
        id: model.name,
        supportsGeneration: model.supportedActions?.includes(GENERATE_ACTION) ?? false
      });
    }
    return candidates;
  }

  createHandle(modelId: string): GenerationHandle {
    const model = assertModelId(modelId);
    const models = this.models;

    return {
      modelId: model,
      async generate(prompt: string): Promise<string> {
        const response = await models.generateContent({ model, contents: prompt });
        if (response.text === undefined) {
          throw new RemoteCallFailedError('generateContent', `model ${model} returned no text`);
        }
        return response.text;
      }
    };
  }
}
