import { EmbedBuilder } from 'discord.js';
import type { APIEmbedField } from 'discord.js';

export const EMBED_DESCRIPTION_LIMIT = 4096;
export const EMBED_FIELD_LIMIT = 1024;
// Discord caps the combined text of one embed
export const EMBED_TOTAL_LIMIT = 6000;

// Discord rejects empty descriptions and field values
const EMPTY_TEXT = '(empty response)';

export type EmbedTone = 'success' | 'error' | 'warning';

const TONES: Record<EmbedTone, { color: number; icon: string }> = {
  success: { color: 0x00ff85, icon: '' },
  error: { color: 0xff2e2e, icon: '❌ ' },
  warning: { color: 0xffb020, icon: '⚠ ' }
};

/** Titled status embed; the tone picks the color and the title icon. */
export function statusEmbed(tone: EmbedTone, title: string, description: string, fields: APIEmbedField[] = []) {
  const { color, icon } = TONES[tone];
  const embed = new EmbedBuilder()
    .setTitle(`${icon}${title}`)
    .setDescription(description || EMPTY_TEXT)
    .setColor(color);
  return fields.length > 0 ? embed.addFields(fields) : embed;
}

export function ephemeral(...embeds: EmbedBuilder[]) {
  return { embeds, ephemeral: true };
}

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

// Moves the cut back one unit when it would separate a surrogate pair
function cutIndex(line: string, limit: number): number {
  return limit > 1 && isHighSurrogate(line.charCodeAt(limit - 1)) ? limit - 1 : limit;
}

/**
 * Split text into chunks no longer than `limit`, breaking on line boundaries
 * where possible. Lines longer than the limit are cut on code point boundaries.
 */
export function splitText(text: string, limit = EMBED_DESCRIPTION_LIMIT): string[] {
  const chunks: string[] = [];
  let current = '';

  const flush = () => {
    if (current) chunks.push(current);
    current = '';
  };

  for (const line of text.split('\n')) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    flush();
    let rest = line;
    while (rest.length > limit) {
      const end = cutIndex(rest, limit);
      chunks.push(rest.slice(0, end));
      rest = rest.slice(end);
    }
    current = rest;
  }
  flush();

  return chunks.length > 0 ? chunks : [''];
}

/** One embed per chunk; only the first carries the title. */
export function longTextEmbeds(title: string, text: string): EmbedBuilder[] {
  return splitText(text || EMPTY_TEXT).map((chunk, i) =>
    i === 0
      ? statusEmbed('success', title, chunk)
      : new EmbedBuilder().setDescription(chunk).setColor(TONES.success.color)
  );
}

export const IDEAS_DESCRIPTION = 'Generated from your brand profile:';

export function ideasTitle(count: number): string {
  return `💡 ${count} content ideas`;
}

/** Whether the ideas fit one embed as separate fields without cutting any of them. */
export function fitsIdeasEmbed(ideas: readonly string[]): boolean {
  if (ideas.length < 2) return false;
  if (ideas.some((idea) => !idea || idea.length > EMBED_FIELD_LIMIT)) return false;

  const total = ideas.reduce(
    (sum, idea, i) => sum + idea.length + `Idea ${i + 1}`.length,
    ideasTitle(ideas.length).length + IDEAS_DESCRIPTION.length
  );
  return total <= EMBED_TOTAL_LIMIT;
}

export function ideasEmbed(ideas: readonly string[]) {
  return statusEmbed(
    'success',
    ideasTitle(ideas.length),
    IDEAS_DESCRIPTION,
    ideas.map((idea, i) => ({ name: `Idea ${i + 1}`, value: idea }))
  );
}
