import { ChatInputCommandInteraction, SlashCommandBuilder } from 'discord.js';
import type { AppContext } from '../../../context';
import { replyWithIdeas, requireFilledProfile } from '../../commandHelpers';

export const MIN_IDEAS = 3;
export const MAX_IDEAS = 10;
export const DEFAULT_IDEAS = 5;

export const data = new SlashCommandBuilder()
  .setName('ideas')
  .setDescription('Brainstorm content ideas from the brand profile')
  .addIntegerOption((opt) =>
    opt
      .setName('count')
      .setDescription(`How many ideas (default ${DEFAULT_IDEAS})`)
      .setMinValue(MIN_IDEAS)
      .setMaxValue(MAX_IDEAS)
  );

export async function execute(interaction: ChatInputCommandInteraction, ctx: AppContext) {
  const profile = await requireFilledProfile(interaction, ctx);
  if (!profile) return;

  const count = interaction.options.getInteger('count') ?? DEFAULT_IDEAS;

  await interaction.deferReply({ ephemeral: true });
  const ideas = await ctx.generator.generateIdeas(profile, count);
  await replyWithIdeas(interaction, ideas);
}
