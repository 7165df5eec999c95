import { ChatInputCommandInteraction, SlashCommandBuilder } from 'discord.js';
import type { AppContext } from '../../../context';
import { POST_LENGTHS, POST_PLATFORMS } from '../../../utils/types';
import type { PostLength, PostPlatform } from '../../../utils/types';
import { replyWithGeneratedText, requireFilledProfile } from '../../commandHelpers';

const PLATFORM_NAMES: Record<PostPlatform, string> = {
  instagram: 'Instagram',
  facebook: 'Facebook',
  telegram: 'Telegram',
  blog: 'Blog'
};

const LENGTH_NAMES: Record<PostLength, string> = {
  short: 'Short (2-3 sentences)',
  medium: 'Medium (4-6 sentences)',
  long: 'Long (7+ sentences)'
};

export const data = new SlashCommandBuilder()
  .setName('post')
  .setDescription('Write a ready-to-publish post in the brand voice')
  .addStringOption((opt) =>
    opt.setName('topic').setDescription('What the post is about').setRequired(true).setMaxLength(300)
  )
  .addStringOption((opt) =>
    opt
      .setName('platform')
      .setDescription('Where it will be published (default Instagram)')
      .addChoices(...POST_PLATFORMS.map((value) => ({ name: PLATFORM_NAMES[value], value })))
  )
  .addStringOption((opt) =>
    opt
      .setName('length')
      .setDescription('Post length (default short)')
      .addChoices(...POST_LENGTHS.map((value) => ({ name: LENGTH_NAMES[value], value })))
  );

export async function execute(interaction: ChatInputCommandInteraction, ctx: AppContext) {
  const profile = await requireFilledProfile(interaction, ctx);
  if (!profile) return;

  const topic = interaction.options.getString('topic', true).trim();
  const platform = interaction.options.getString('platform') ?? 'instagram';
  const length = interaction.options.getString('length') ?? 'short';

  await interaction.deferReply({ ephemeral: true });
  const post = await ctx.generator.generatePost(profile, topic, platform, length);
  await replyWithGeneratedText(interaction, `✍️ ${platform} post: ${topic}`.slice(0, 256), post);
}
