import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { isUsableCredential } from '../services/ai/credentials';
import { parseLogLevel } from '../utils/logger';

/** Checked in order; the first file holding a usable key wins over the process environment. */
export const ENV_FILES = ['env.local', '.env.local', '.env'] as const;

const commaList = z
  .string()
  .default('')
  .transform((s) =>
    s
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean)
  );

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.string().optional().transform(parseLogLevel),

  DISCORD_BOT_TOKEN: z.string().default(''),
  DISCORD_CLIENT_ID: z.string().default(''),
  DISCORD_GUILD_ID: z.string().default(''),

  AI_PROVIDER: z.enum(['gemini', 'openai']).catch('gemini'),
  MODEL_PREFERENCE: commaList,

  PROFILE_STORE: z.enum(['file', 'redis']).catch('file'),
  PROFILE_PATH: z
    .string()
    .default('')
    .transform((p) => p || 'brand_profile.json'),
  REDIS_URL: z.string().default(''),
  REDIS_PASSWORD: z.string().optional(),

  ADMIN_IDS: commaList,
  ADMIN_ROLE_ID: z.string().default('')
});

export type AppEnv = z.infer<typeof envSchema> & {
  GEMINI_API_KEY?: string;
  OPENAI_API_KEY?: string;
};

export interface LoadApiKeyOptions {
  cwd?: string;
  files?: readonly string[];
  processEnv?: NodeJS.ProcessEnv;
}

function readEnvFile(file: string): Record<string, string> | null {
  try {
    return dotenv.parse(fs.readFileSync(file, 'utf8'));
  } catch {
    return null;
  }
}

/**
 * Locates an API key: config files first (env.local, .env.local, .env),
 * then the process environment. Returns undefined when nothing usable is found.
 */
export function loadApiKey(variable: string, options: LoadApiKeyOptions = {}): string | undefined {
  const cwd = options.cwd ?? process.cwd();
  const files = options.files ?? ENV_FILES;
  const processEnv = options.processEnv ?? process.env;

  for (const file of files) {
    const parsed = readEnvFile(path.join(cwd, file));
    const candidate = parsed?.[variable]?.trim();
    if (isUsableCredential(candidate)) return candidate;
  }

  const fromProcess = processEnv[variable]?.trim();
  return fromProcess ? fromProcess : undefined;
}

export function loadEnv(processEnv: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppEnv {
  const parsed = envSchema.parse(processEnv);
  return {
    ...parsed,
    GEMINI_API_KEY: loadApiKey('GEMINI_API_KEY', { cwd, processEnv }),
    OPENAI_API_KEY: loadApiKey('OPENAI_API_KEY', { cwd, processEnv })
  };
}

export function apiKeyFor(config: AppEnv): string | undefined {
  return config.AI_PROVIDER === 'openai' ? config.OPENAI_API_KEY : config.GEMINI_API_KEY;
}

export function requireBotEnv(config: AppEnv): void {
  if (!config.DISCORD_BOT_TOKEN) {
    throw new Error('DISCORD_BOT_TOKEN is required');
  }
  if (!config.DISCORD_CLIENT_ID) {
    throw new Error('DISCORD_CLIENT_ID is required');
  }
}

export const env = loadEnv();
