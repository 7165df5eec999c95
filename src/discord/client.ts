import { Client, Events, GatewayIntentBits } from 'discord.js';
import type { AppContext } from '../context';
import { handleInteraction } from './interactions';
import { registerCommands } from './registerCommands';

export function createDiscordClient(ctx: AppContext): Client {
  const client = new Client({ intents: [GatewayIntentBits.Guilds] });

  client.once(Events.ClientReady, (c) => {
    ctx.logger.info(`🤖 Logged in as ${c.user.tag}`);
    registerCommands(ctx.env, ctx.logger).catch((err: unknown) => {
      ctx.logger.error('Failed to register slash commands', err);
    });
  });

  client.on(Events.InteractionCreate, (interaction) => {
    handleInteraction(interaction, ctx).catch((err: unknown) => {
      ctx.logger.error('Interaction handling failed', err);
    });
  });

  return client;
}

export async function startDiscordClient(ctx: AppContext): Promise<Client> {
  const client = createDiscordClient(ctx);
  await client.login(ctx.env.DISCORD_BOT_TOKEN);
  return client;
}
