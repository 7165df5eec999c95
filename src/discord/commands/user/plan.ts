import { ChatInputCommandInteraction, SlashCommandBuilder } from 'discord.js';
import type { AppContext } from '../../../context';
import { PLAN_PERIODS } from '../../../utils/types';
import { replyWithGeneratedText, requireFilledProfile } from '../../commandHelpers';

export const MIN_PLAN_POSTS = 3;
export const MAX_PLAN_POSTS = 30;

export function defaultPlanCount(period: string): number {
  return period === 'week' ? 7 : 15;
}

export const data = new SlashCommandBuilder()
  .setName('plan')
  .setDescription('Build a content plan for a week or a month')
  .addStringOption((opt) =>
    opt
      .setName('period')
      .setDescription('Planning period (default week)')
      .addChoices(...PLAN_PERIODS.map((value) => ({ name: value === 'week' ? 'Week' : 'Month', value })))
  )
  .addIntegerOption((opt) =>
    opt
      .setName('count')
      .setDescription('Number of posts (default 7 for a week, 15 for a month)')
      .setMinValue(MIN_PLAN_POSTS)
      .setMaxValue(MAX_PLAN_POSTS)
  );

export async function execute(interaction: ChatInputCommandInteraction, ctx: AppContext) {
  const profile = await requireFilledProfile(interaction, ctx);
  if (!profile) return;

  const period = interaction.options.getString('period') ?? 'week';
  const count = interaction.options.getInteger('count') ?? defaultPlanCount(period);

  await interaction.deferReply({ ephemeral: true });
  const plan = await ctx.generator.generateContentPlan(profile, period, count);
  await replyWithGeneratedText(interaction, `📅 Content plan: ${count} posts per ${period}`, plan);
}
