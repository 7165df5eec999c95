import type { PostLength, PostPlatform } from '../utils/types';

export const LENGTH_GUIDANCE: Record<PostLength, string> = {
  short: 'a short post (2-3 sentences, up to 150 words)',
  medium: 'a medium post (4-6 sentences, 150-300 words)',
  long: 'a long post (7+ sentences, 300+ words)'
};

export const PLATFORM_GUIDANCE: Record<PostPlatform, string> = {
  instagram: 'Use emoji, put hashtags at the end, keep paragraphs short. The style should be visual and engaging.',
  facebook: 'Use a fuller format; lists are welcome. Suited to more detailed content.',
  telegram: 'Informal style, emoji are fine. Short paragraphs work well.',
  blog: 'Long-form, structured text with subheadings and lists. A more formal style.'
};

function hasKey<T extends object>(record: T, key: string): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(record, key);
}

export function lengthGuidance(length: string): string {
  return hasKey(LENGTH_GUIDANCE, length) ? LENGTH_GUIDANCE[length] : LENGTH_GUIDANCE.medium;
}

export function platformGuidance(platform: string): string {
  return hasKey(PLATFORM_GUIDANCE, platform) ? PLATFORM_GUIDANCE[platform] : '';
}

export function periodLabel(period: string): 'week' | 'month' {
  return period === 'week' ? 'week' : 'month';
}

export function ideasPrompt(brandContext: string, count: number): string {
  return `
You are a content marketing expert. Based on the brand information below, come up with ${count} creative content ideas (posts, articles, videos and so on).

Brand information:
${brandContext}

Requirements:
- Ideas must be relevant to the target audience
- Respect the brand's tone of voice and values
- Ideas must be practical and doable
- Vary the formats (text, video, infographics, etc.)

Return a list of ${count} ideas. Put each idea on its own line, starting with its number (1., 2., 3. and so on).
Be specific and creative.
`.trim();
}

export function postPrompt(params: {
  brandContext: string;
  topic: string;
  platform: string;
  length: string;
}): string {
  return `
You are a professional copywriter. Write a post for ${params.platform} about "${params.topic}".

Brand information:
${params.brandContext}

Post requirements:
- Length: ${lengthGuidance(params.length)}
- Platform: ${params.platform}
- ${platformGuidance(params.platform)}
- Keep to the brand's tone of voice
- Speak to the target audience
- Include a call to action (CTA)
- The post must be interesting and useful

Write a finished post that can be published as is.
`.trim();
}

export function contentPlanPrompt(brandContext: string, period: string, count: number): string {
  return `
You are a content planning expert. Create a detailed content plan for one ${periodLabel(period)} (${count} posts) for the brand.

Brand information:
${brandContext}

Requirements:
- Plan ${count} days
- For each day give: the date or weekday, the post topic, the format (text/video/infographic) and a short description
- Topics must be varied and relevant
- Consider the target audience and brand values
- Spread the content evenly across the days

Return a structured plan in this format:
Day 1 (Monday):
Topic: [topic]
Format: [format]
Description: [short description]

And so on for every day.
`.trim();
}
