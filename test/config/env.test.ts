import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { apiKeyFor, loadApiKey, loadEnv, requireBotEnv } from '../../src/config/env';
import { LogLevel } from '../../src/utils/logger';

const FILE_KEY = 'test-key-from-file';
const PROCESS_KEY = 'test-key-from-process';

describe('config/env', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'brand-env-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const write = (file: string, content: string) => fs.writeFile(path.join(dir, file), content, 'utf8');

  describe('loadApiKey', () => {
    it('prefers env.local over .env.local and .env', async () => {
      await write('env.local', 'GEMINI_API_KEY=test-key-env-local\n');
      await write('.env.local', 'GEMINI_API_KEY=test-key-dot-env-local\n');
      await write('.env', `GEMINI_API_KEY=${FILE_KEY}\n`);

      expect(loadApiKey('GEMINI_API_KEY', { cwd: dir, processEnv: {} })).toBe('test-key-env-local');
    });

    it('skips files whose key is a placeholder or too short', async () => {
      await write('env.local', 'GEMINI_API_KEY=your_api_key_here\n');
      await write('.env.local', 'GEMINI_API_KEY=short\n');
      await write('.env', `GEMINI_API_KEY="  ${FILE_KEY}  "\n`);

      expect(loadApiKey('GEMINI_API_KEY', { cwd: dir, processEnv: {} })).toBe(FILE_KEY);
    });

    it('falls back to the process environment', async () => {
      await write('.env', 'OTHER=value\n');

      expect(loadApiKey('GEMINI_API_KEY', { cwd: dir, processEnv: { GEMINI_API_KEY: ` ${PROCESS_KEY} ` } })).toBe(
        PROCESS_KEY
      );
    });

    it('lets a file win over the process environment', async () => {
      await write('.env.local', `GEMINI_API_KEY=${FILE_KEY}\n`);

      expect(loadApiKey('GEMINI_API_KEY', { cwd: dir, processEnv: { GEMINI_API_KEY: PROCESS_KEY } })).toBe(FILE_KEY);
    });

    it('returns undefined when nothing is set', () => {
      expect(loadApiKey('GEMINI_API_KEY', { cwd: dir, processEnv: { GEMINI_API_KEY: '   ' } })).toBeUndefined();
    });
  });

  describe('loadEnv', () => {
    it('applies defaults', () => {
      const config = loadEnv({}, dir);

      expect(config.AI_PROVIDER).toBe('gemini');
      expect(config.PROFILE_STORE).toBe('file');
      expect(config.PROFILE_PATH).toBe('brand_profile.json');
      expect(config.LOG_LEVEL).toBe(LogLevel.INFO);
      expect(config.ADMIN_IDS).toEqual([]);
      expect(config.MODEL_PREFERENCE).toEqual([]);
      expect(config.GEMINI_API_KEY).toBeUndefined();
    });

    it('parses lists, levels and providers', () => {
      const config = loadEnv(
        {
          AI_PROVIDER: 'openai',
          ADMIN_IDS: ' 111, 222 ,,',
          MODEL_PREFERENCE: 'gpt-4o-mini,gpt-4o',
          LOG_LEVEL: 'debug',
          OPENAI_API_KEY: PROCESS_KEY
        },
        dir
      );

      expect(config.AI_PROVIDER).toBe('openai');
      expect(config.ADMIN_IDS).toEqual(['111', '222']);
      expect(config.MODEL_PREFERENCE).toEqual(['gpt-4o-mini', 'gpt-4o']);
      expect(config.LOG_LEVEL).toBe(LogLevel.DEBUG);
      expect(apiKeyFor(config)).toBe(PROCESS_KEY);
    });

    it('falls back to defaults for unknown provider and store names', () => {
      const config = loadEnv({ AI_PROVIDER: 'claude', PROFILE_STORE: 'sqlite' }, dir);

      expect(config.AI_PROVIDER).toBe('gemini');
      expect(config.PROFILE_STORE).toBe('file');
    });

    it('picks the key that matches the provider', async () => {
      await write('.env', `GEMINI_API_KEY=${FILE_KEY}\n`);

      const config = loadEnv({ OPENAI_API_KEY: PROCESS_KEY }, dir);

      expect(apiKeyFor(config)).toBe(FILE_KEY);
      expect(config.OPENAI_API_KEY).toBe(PROCESS_KEY);
    });
  });

  describe('requireBotEnv', () => {
    it('requires the bot token and client id', () => {
      expect(() => requireBotEnv(loadEnv({}, dir))).toThrow('DISCORD_BOT_TOKEN is required');
      expect(() => requireBotEnv(loadEnv({ DISCORD_BOT_TOKEN: 'test-token' }, dir))).toThrow(
        'DISCORD_CLIENT_ID is required'
      );
      expect(() =>
        requireBotEnv(loadEnv({ DISCORD_BOT_TOKEN: 'test-token', DISCORD_CLIENT_ID: '123' }, dir))
      ).not.toThrow();
    });
  });
});
