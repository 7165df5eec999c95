import { Collection } from 'discord.js';
import type {
  ChatInputCommandInteraction,
  Interaction,
  RESTPostAPIChatInputApplicationCommandsJSONBody
} from 'discord.js';
import type { AppContext } from '../context';
import { statusEmbed } from '../utils/embeds';
import * as profileCmd from './commands/user/profile';
import * as ideasCmd from './commands/user/ideas';
import * as postCmd from './commands/user/post';
import * as planCmd from './commands/user/plan';
import * as modelCmd from './commands/admin/model';

export interface SlashCommand {
  data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
  execute: (interaction: ChatInputCommandInteraction, ctx: AppContext) => Promise<void>;
}

const ALL_COMMANDS: SlashCommand[] = [profileCmd, ideasCmd, postCmd, planCmd, modelCmd];

export const commands = new Collection<string, SlashCommand>();
for (const cmd of ALL_COMMANDS) {
  commands.set(cmd.data.name, cmd);
}

export function commandPayloads(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return commands.map((cmd) => cmd.data.toJSON());
}

export async function handleInteraction(interaction: Interaction, ctx: AppContext): Promise<void> {
  if (!interaction.isChatInputCommand()) return;

  const command = commands.get(interaction.commandName);
  if (!command) {
    await interaction.reply({ content: '❌ Command not found.', ephemeral: true });
    return;
  }

  try {
    await command.execute(interaction, ctx);
  } catch (err) {
    ctx.logger.error(`Command /${interaction.commandName} failed`, err);

    const reply = { embeds: [statusEmbed('error', 'Error', 'Something went wrong while running this command.')] };
    if (interaction.deferred) {
      await interaction.editReply(reply);
    } else if (!interaction.replied) {
      await interaction.reply({ ...reply, ephemeral: true });
    }
  }
}
