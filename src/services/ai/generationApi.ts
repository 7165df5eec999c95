import type { ModelCandidate } from '../../utils/types';
import { InvalidModelIdError } from '../../utils/errors';

/** A bound reference to one remote model, ready to accept prompts. */
export interface GenerationHandle {
  readonly modelId: string;
  generate(prompt: string): Promise<string>;
}

/**
 * The two capabilities the core consumes from a provider. `listModels` and
 * `generate` may reject; `createHandle` may throw for an identifier the
 * client refuses to bind.
 */
export interface GenerationApi {
  readonly provider: string;
  listModels(): Promise<ModelCandidate[]>;
  createHandle(modelId: string): GenerationHandle;
}

const MODEL_NAMESPACE_PREFIX = 'models/';

export function normalizeModelId(id: string): string {
  return id.startsWith(MODEL_NAMESPACE_PREFIX) ? id.slice(MODEL_NAMESPACE_PREFIX.length) : id;
}

export function assertModelId(modelId: string): string {
  if (!modelId || /\s/.test(modelId)) {
    throw new InvalidModelIdError(modelId);
  }
  return modelId;
}
