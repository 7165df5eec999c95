import type { EmbedBuilder } from 'discord.js';
import type { AppContext } from '../context';
import type { BrandProfile } from '../utils/types';
import { isProfileFilled } from '../services/brand/profile';
import { isGenerationError } from '../services/content/generator';
import {
  EMBED_DESCRIPTION_LIMIT,
  ephemeral,
  fitsIdeasEmbed,
  ideasEmbed,
  longTextEmbeds,
  statusEmbed
} from '../utils/embeds';

/** The reply calls the helpers make; a `ChatInputCommandInteraction` satisfies it. */
export interface CommandReplies {
  reply(options: { embeds: EmbedBuilder[]; ephemeral?: boolean }): Promise<unknown>;
  editReply(options: { embeds: EmbedBuilder[] }): Promise<unknown>;
  followUp(options: { embeds: EmbedBuilder[]; ephemeral?: boolean }): Promise<unknown>;
}

/** Loads the profile, or replies with a warning and returns null when it is still empty. */
export async function requireFilledProfile(
  interaction: CommandReplies,
  ctx: Pick<AppContext, 'profileStore'>
): Promise<BrandProfile | null> {
  const profile = await ctx.profileStore.load();
  if (isProfileFilled(profile)) return profile;

  await interaction.reply(
    ephemeral(statusEmbed('warning', 'Brand profile is empty', 'Fill in the brand profile first with `/profile set`.'))
  );
  return null;
}

/** Shows generated text (split over several messages when long) or the generator's error text. */
export async function replyWithGeneratedText(interaction: CommandReplies, title: string, text: string): Promise<void> {
  if (isGenerationError(text)) {
    await interaction.editReply({
      embeds: [statusEmbed('error', 'Generation failed', text.slice(0, EMBED_DESCRIPTION_LIMIT))]
    });
    return;
  }

  const [first, ...rest] = longTextEmbeds(title, text);
  await interaction.editReply({ embeds: [first] });
  for (const embed of rest) {
    await interaction.followUp(ephemeral(embed));
  }
}

/** One field per idea when they fit; otherwise the ideas are shown as long text. */
export async function replyWithIdeas(interaction: CommandReplies, ideas: readonly string[]): Promise<void> {
  if (fitsIdeasEmbed(ideas)) {
    await interaction.editReply({ embeds: [ideasEmbed(ideas)] });
    return;
  }
  await replyWithGeneratedText(interaction, '💡 Content ideas', ideas.join('\n'));
}
