import { ChatInputCommandInteraction, SlashCommandBuilder } from 'discord.js';
import type { AppContext } from '../../../context';
import type { BrandProfile, BrandProfileField } from '../../../utils/types';
import { BRAND_PROFILE_FIELDS } from '../../../utils/types';
import { FIELD_LABELS, renderBrandContext } from '../../../services/brand/profile';
import { EMBED_DESCRIPTION_LIMIT, ephemeral, statusEmbed } from '../../../utils/embeds';

/** Slash option name for each profile field. */
export const PROFILE_OPTIONS: Record<BrandProfileField, string> = {
  companyName: 'company_name',
  companyDescription: 'description',
  targetAudience: 'audience',
  toneOfVoice: 'tone',
  brandValues: 'values',
  keyMessages: 'key_messages'
};

const OPTION_MAX_LENGTH = 600;

export const data = new SlashCommandBuilder()
  .setName('profile')
  .setDescription('View or replace the brand profile')
  .addSubcommand((sub) => sub.setName('view').setDescription('Show the current brand profile'))
  .addSubcommand((sub) => {
    sub
      .setName('set')
      .setDescription('Replace the brand profile (omitted fields are cleared)');
    for (const field of BRAND_PROFILE_FIELDS) {
      sub.addStringOption((opt) =>
        opt
          .setName(PROFILE_OPTIONS[field])
          .setDescription(FIELD_LABELS[field])
          .setMaxLength(OPTION_MAX_LENGTH)
      );
    }
    return sub;
  });

export function profileFromOptions(read: (option: string) => string | null): BrandProfile {
  const profile: BrandProfile = {};
  for (const field of BRAND_PROFILE_FIELDS) {
    profile[field] = read(PROFILE_OPTIONS[field])?.trim() ?? '';
  }
  return profile;
}

export async function execute(interaction: ChatInputCommandInteraction, ctx: AppContext) {
  const sub = interaction.options.getSubcommand();

  if (sub === 'view') {
    const profile = await ctx.profileStore.load();
    await interaction.reply(
      ephemeral(statusEmbed('success', 'Brand profile', renderBrandContext(profile).slice(0, EMBED_DESCRIPTION_LIMIT)))
    );
    return;
  }

  if (sub === 'set') {
    const profile = profileFromOptions((option) => interaction.options.getString(option));
    const saved = await ctx.profileStore.save(profile);

    if (!saved) {
      await interaction.reply(
        ephemeral(statusEmbed('error', 'Save failed', 'The brand profile could not be saved. Try again later.'))
      );
      return;
    }

    ctx.logger.info('Brand profile replaced', { by: interaction.user.id });
    await interaction.reply(
      ephemeral(statusEmbed('success', '✅ Brand profile saved', renderBrandContext(profile)))
    );
  }
}
