import { REST, Routes } from 'discord.js';
import type { AppEnv } from '../config/env';
import type { Logger } from '../utils/logger';
import { commandPayloads } from './interactions';

/** Registers to the dev guild when DISCORD_GUILD_ID is set, globally otherwise. */
export async function registerCommands(
  config: Pick<AppEnv, 'DISCORD_BOT_TOKEN' | 'DISCORD_CLIENT_ID' | 'DISCORD_GUILD_ID'>,
  logger: Logger
): Promise<void> {
  const rest = new REST({ version: '10' }).setToken(config.DISCORD_BOT_TOKEN);
  const body = commandPayloads();

  const route = config.DISCORD_GUILD_ID
    ? Routes.applicationGuildCommands(config.DISCORD_CLIENT_ID, config.DISCORD_GUILD_ID)
    : Routes.applicationCommands(config.DISCORD_CLIENT_ID);

  logger.info(`📡 Registering ${body.length} slash commands`, {
    scope: config.DISCORD_GUILD_ID ? 'guild' : 'global'
  });
  await rest.put(route, { body });
  logger.info('Slash commands registered');
}
