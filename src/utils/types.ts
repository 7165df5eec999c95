export const BRAND_PROFILE_FIELDS = [
  'companyName',
  'companyDescription',
  'targetAudience',
  'toneOfVoice',
  'brandValues',
  'keyMessages'
] as const;

export type BrandProfileField = (typeof BRAND_PROFILE_FIELDS)[number];

/**
 * The single stored brand profile. Every field is optional free text; an
 * empty or missing field is left out of generated prompts.
 */
export type BrandProfile = Partial<Record<BrandProfileField, string>>;

export interface ModelCandidate {
  id: string;
  supportsGeneration: boolean;
}

export const POST_PLATFORMS = ['instagram', 'facebook', 'telegram', 'blog'] as const;
export type PostPlatform = (typeof POST_PLATFORMS)[number];

export const POST_LENGTHS = ['short', 'medium', 'long'] as const;
export type PostLength = (typeof POST_LENGTHS)[number];

export const PLAN_PERIODS = ['week', 'month'] as const;

export type GenerationRequest =
  | { kind: 'ideas'; count: number }
  | { kind: 'post'; topic: string; platform: string; length: string }
  | { kind: 'plan'; period: string; count: number };

export type GenerationKind = GenerationRequest['kind'];

export type AiProvider = 'gemini' | 'openai';
