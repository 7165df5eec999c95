import type { BrandProfile, GenerationKind, GenerationRequest } from '../../utils/types';
import { describeError } from '../../utils/errors';
import type { Logger } from '../../utils/logger';
import { silentLogger } from '../../utils/logger';
import type { ModelResolver } from '../ai/modelResolver';
import type { GenerationHandle } from '../ai/generationApi';
import { renderBrandContext } from '../brand/profile';
import { contentPlanPrompt, ideasPrompt, postPrompt } from '../prompts';

export const CREDENTIAL_MISSING_MESSAGE = 'Error: API key is not set. Check .env, .env.local or env.local.';
export const MODEL_UNAVAILABLE_MESSAGE =
  'Error: no model is available. Check the API key and model availability.';

const TASK_LABELS: Record<GenerationKind, string> = {
  ideas: 'ideas',
  post: 'the post',
  plan: 'the content plan'
};

const FAILURE_PREFIXES = Object.values(TASK_LABELS).map((label) => `Error while generating ${label}: `);

/** True only for the messages this generator returns in place of content. */
export function isGenerationError(text: string): boolean {
  return (
    text === CREDENTIAL_MISSING_MESSAGE ||
    text === MODEL_UNAVAILABLE_MESSAGE ||
    FAILURE_PREFIXES.some((prefix) => text.startsWith(prefix))
  );
}

/** Keeps numbered or dashed lines, at most `count` of them; never pads. */
export function parseIdeas(text: string, count: number): string[] {
  const raw = text.trim();
  const ideas = raw
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => /^\d/.test(line) || line.startsWith('-'));

  if (ideas.length === 0) return [raw];
  return ideas.length > count ? ideas.slice(0, count) : ideas;
}

type HandleResult = { ok: true; handle: GenerationHandle } | { ok: false; message: string };
type CompletionResult = { ok: true; text: string } | { ok: false; message: string };

export class ContentGenerator {
  constructor(
    private readonly resolver: ModelResolver,
    private readonly logger: Logger = silentLogger
  ) {}

  async generateIdeas(profile: BrandProfile, count = 5): Promise<string[]> {
    const result = await this.complete('ideas', ideasPrompt(renderBrandContext(profile), count));
    return result.ok ? parseIdeas(result.text, count) : [result.message];
  }

  async generatePost(profile: BrandProfile, topic: string, platform = 'instagram', length = 'short'): Promise<string> {
    return this.text(
      await this.complete(
        'post',
        postPrompt({ brandContext: renderBrandContext(profile), topic, platform, length })
      )
    );
  }

  async generateContentPlan(profile: BrandProfile, period = 'week', count = 7): Promise<string> {
    return this.text(
      await this.complete('plan', contentPlanPrompt(renderBrandContext(profile), period, count))
    );
  }

  generate(profile: BrandProfile, request: GenerationRequest): Promise<string | string[]> {
    switch (request.kind) {
      case 'ideas':
        return this.generateIdeas(profile, request.count);
      case 'post':
        return this.generatePost(profile, request.topic, request.platform, request.length);
      case 'plan':
        return this.generateContentPlan(profile, request.period, request.count);
    }
  }

  private async acquireHandle(): Promise<HandleResult> {
    if (!this.resolver.hasCredential()) {
      return { ok: false, message: CREDENTIAL_MISSING_MESSAGE };
    }

    const outcome = await this.resolver.resolve();
    if (outcome.ok) return { ok: true, handle: outcome.handle };

    this.logger.warn('No generation model available', { error: outcome.error.message });
    return {
      ok: false,
      message: outcome.error.code === 'CREDENTIAL_MISSING' ? CREDENTIAL_MISSING_MESSAGE : MODEL_UNAVAILABLE_MESSAGE
    };
  }

  private text(result: CompletionResult): string {
    return result.ok ? result.text : result.message;
  }

  // Never rejects: every failure becomes a user-facing message
  private async complete(kind: GenerationKind, prompt: string): Promise<CompletionResult> {
    const acquired = await this.acquireHandle();
    if (!acquired.ok) return acquired;

    try {
      const text = await acquired.handle.generate(prompt);
      return { ok: true, text: text.trim() };
    } catch (err) {
      this.logger.error(`Generation of ${kind} failed`, { model: acquired.handle.modelId, error: err });
      return {
        ok: false,
        message: `Error while generating ${TASK_LABELS[kind]}: ${describeError(err)}`
      };
    }
  }
}
