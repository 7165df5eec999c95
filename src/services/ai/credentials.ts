export const MIN_CREDENTIAL_LENGTH = 11;

const PLACEHOLDER_KEYS = new Set(['your_api_key_here']);

export function isUsableCredential(key: string | undefined | null): key is string {
  if (!key) return false;
  const trimmed = key.trim();
  return trimmed.length >= MIN_CREDENTIAL_LENGTH && !PLACEHOLDER_KEYS.has(trimmed);
}
