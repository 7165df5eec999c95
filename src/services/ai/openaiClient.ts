import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { ModelCandidate } from '../../utils/types';
import { RemoteCallFailedError } from '../../utils/errors';
import { assertModelId } from './generationApi';
import type { GenerationApi, GenerationHandle } from './generationApi';

export const OPENAI_PREFERRED_MODELS = ['gpt-4.1', 'gpt-4.1-mini', 'gpt-4o', 'gpt-4o-mini'];

const SYSTEM_PROMPT = 'You are a content marketing assistant writing on behalf of a brand.';

const CHAT_FAMILY = /^(gpt-|chatgpt-|o\d)/;
const NON_CHAT_VARIANT = /(audio|realtime|tts|transcribe|image|search|embedding|instruct)/;

export function isChatModel(id: string): boolean {
  return CHAT_FAMILY.test(id) && !NON_CHAT_VARIANT.test(id);
}

/** The slice of the `OpenAI` client this adapter calls. */
export interface OpenAIClientLike {
  models: {
    list(): AsyncIterable<{ id: string }>;
  };
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export class OpenAIGenerationApi implements GenerationApi {
  readonly provider = 'openai';

  constructor(
    private readonly client: OpenAIClientLike,
    private readonly options: { maxTokens?: number } = {}
  ) {}

  static fromApiKey(apiKey: string): OpenAIGenerationApi {
    return new OpenAIGenerationApi(new OpenAI({ apiKey }));
  }

  async listModels(): Promise<ModelCandidate[]> {
    const candidates: ModelCandidate[] = [];
    for await (const model of this.client.models.list()) {
      candidates.push({ id: model.id, supportsGeneration: isChatModel(model.id) });
    }
    return candidates;
  }

  createHandle(modelId: string): GenerationHandle {
    const model = assertModelId(modelId);
    const completions = this.client.chat.completions;
    const maxTokens = this.options.maxTokens ?? 1600;

    return {
      modelId: model,
      async generate(prompt: string): Promise<string> {
        const res = await completions.create({
          model,
          max_completion_tokens: maxTokens,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: prompt }
          ]
        });

        const content = res.choices[0]?.message?.content;
        if (content === null || content === undefined) {
          throw new RemoteCallFailedError('chat.completions.create', `model ${model} returned no content`);
        }
        return content;
      }
    };
  }
}
