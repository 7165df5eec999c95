import type { AiProvider } from '../../utils/types';
import type { GenerationApi } from './generationApi';
import { GEMINI_PREFERRED_MODELS, GeminiGenerationApi } from './geminiClient';
import { OPENAI_PREFERRED_MODELS, OpenAIGenerationApi } from './openaiClient';

export function createGenerationApi(provider: AiProvider, apiKey: string): GenerationApi {
  return provider === 'openai' ? OpenAIGenerationApi.fromApiKey(apiKey) : GeminiGenerationApi.fromApiKey(apiKey);
}

export function defaultPreferences(provider: AiProvider): string[] {
  return provider === 'openai' ? [...OPENAI_PREFERRED_MODELS] : [...GEMINI_PREFERRED_MODELS];
}

export { ModelResolver, resolveModel } from './modelResolver';
export type { ResolutionOutcome, StrategyName } from './modelResolver';
export type { GenerationApi, GenerationHandle } from './generationApi';
