import { env, requireBotEnv } from './config/env';
import { registerCommands } from './discord/registerCommands';
import { createLogger } from './utils/logger';

const logger = createLogger(env.LOG_LEVEL);

async function main() {
  requireBotEnv(env);
  await registerCommands(env, logger);
}

main().catch((err: unknown) => {
  logger.error('❌ Failed to register commands', err);
  process.exitCode = 1;
});
