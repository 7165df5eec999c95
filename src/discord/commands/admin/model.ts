import { ChatInputCommandInteraction, SlashCommandBuilder } from 'discord.js';
import type { AppContext } from '../../../context';
import type { ResolutionOutcome } from '../../../services/ai';
import { isAdmin } from '../../../services/admin/adminAuth';
import { ephemeral, statusEmbed } from '../../../utils/embeds';

export const data = new SlashCommandBuilder()
  .setName('model')
  .setDescription('Admin: inspect or re-resolve the generation model')
  .addSubcommand((sub) => sub.setName('status').setDescription('Show the model in use'))
  .addSubcommand((sub) =>
    sub.setName('refresh').setDescription('Forget the resolved model and pick one again')
  );

export function describeOutcome(provider: string, outcome: ResolutionOutcome) {
  if (!outcome.ok) {
    return statusEmbed(
      'error',
      'No model available',
      `**Provider:** ${provider}\n**Reason:** ${outcome.error.message}`
    );
  }

  const failed = outcome.attempts.filter((a) => a.error).length;
  return statusEmbed('success', 'Generation model', `**Provider:** ${provider}`, [
    { name: 'Model', value: outcome.handle.modelId, inline: true },
    { name: 'Strategy', value: outcome.strategy, inline: true },
    { name: 'Failed attempts', value: String(failed), inline: true }
  ]);
}

export async function execute(interaction: ChatInputCommandInteraction, ctx: AppContext) {
  if (!isAdmin(interaction, ctx.env)) {
    await interaction.reply(ephemeral(statusEmbed('error', 'Forbidden', 'Admin only.')));
    return;
  }

  const sub = interaction.options.getSubcommand();
  await interaction.deferReply({ ephemeral: true });

  if (sub === 'refresh') {
    ctx.resolver.reset();
    ctx.logger.info('Model resolution reset', { by: interaction.user.id });
  }

  const outcome = await ctx.resolver.resolve();
  await interaction.editReply({ embeds: [describeOutcome(ctx.resolver.provider, outcome)] });
}
