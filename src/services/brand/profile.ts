import { z } from 'zod';
import { BRAND_PROFILE_FIELDS } from '../../utils/types';
import type { BrandProfile, BrandProfileField } from '../../utils/types';

export const brandProfileSchema = z.object({
  companyName: z.string().optional(),
  companyDescription: z.string().optional(),
  targetAudience: z.string().optional(),
  toneOfVoice: z.string().optional(),
  brandValues: z.string().optional(),
  keyMessages: z.string().optional()
}) satisfies z.ZodType<BrandProfile>;

export const FIELD_LABELS: Record<BrandProfileField, string> = {
  companyName: 'Company name',
  companyDescription: 'Company description',
  targetAudience: 'Target audience',
  toneOfVoice: 'Tone of voice',
  brandValues: 'Brand values',
  keyMessages: 'Key messages'
};

export const EMPTY_CONTEXT = 'Brand information has not been filled in.';

export function emptyProfile(): BrandProfile {
  return {};
}

export function isProfileFilled(profile: BrandProfile): boolean {
  return BRAND_PROFILE_FIELDS.some((field) => Boolean(profile[field]));
}

export function renderBrandContext(profile: BrandProfile | null | undefined): string {
  if (!profile) return EMPTY_CONTEXT;

  const lines = BRAND_PROFILE_FIELDS.filter((field) => profile[field]).map(
    (field) => `${FIELD_LABELS[field]}: ${profile[field]}`
  );

  return lines.length > 0 ? lines.join('\n') : EMPTY_CONTEXT;
}
