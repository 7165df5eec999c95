import { env, requireBotEnv } from './config/env';
import { createAppContext } from './context';
import { startDiscordClient } from './discord/client';

async function main() {
  requireBotEnv(env);
  const ctx = createAppContext(env);

  ctx.logger.info(`[BOOT] Starting brand content bot in ${env.NODE_ENV} mode`, {
    provider: env.AI_PROVIDER,
    profileStore: ctx.profileStore.description
  });

  if (!ctx.resolver.hasCredential()) {
    ctx.logger.warn(
      `No usable ${env.AI_PROVIDER === 'openai' ? 'OPENAI_API_KEY' : 'GEMINI_API_KEY'} found in env.local, .env.local, .env or the environment; generation commands will report it`
    );
  }

  await startDiscordClient(ctx);
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('❌ Failed to start:', err);
  process.exitCode = 1;
});
