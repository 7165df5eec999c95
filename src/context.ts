import { apiKeyFor } from './config/env';
import type { AppEnv } from './config/env';
import { createLogger } from './utils/logger';
import type { Logger } from './utils/logger';
import { createGenerationApi, defaultPreferences, ModelResolver } from './services/ai';
import type { GenerationApi } from './services/ai';
import { createProfileStore } from './services/brand/profileStore';
import type { ProfileStore } from './services/brand/profileStore';
import { ContentGenerator } from './services/content/generator';

/** Everything a command needs, built once by the host and passed explicitly. */
export interface AppContext {
  env: AppEnv;
  logger: Logger;
  profileStore: ProfileStore;
  resolver: ModelResolver;
  generator: ContentGenerator;
}

export interface AppContextOverrides {
  logger?: Logger;
  profileStore?: ProfileStore;
  connect?: (apiKey: string) => GenerationApi;
}

export function createAppContext(env: AppEnv, overrides: AppContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger(env.LOG_LEVEL);
  const provider = env.AI_PROVIDER;

  const resolver = new ModelResolver({
    apiKey: apiKeyFor(env),
    provider,
    connect: overrides.connect ?? ((apiKey) => createGenerationApi(provider, apiKey)),
    preferences: env.MODEL_PREFERENCE.length > 0 ? env.MODEL_PREFERENCE : defaultPreferences(provider),
    logger
  });

  return {
    env,
    logger,
    profileStore: overrides.profileStore ?? createProfileStore(env, logger),
    resolver,
    generator: new ContentGenerator(resolver, logger)
  };
}
