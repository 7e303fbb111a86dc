/**
 * Normalize a taxonomy token for lookup: trim, lowercase, and turn spaces and hyphens
 * into underscores. Empty (or whitespace-only) input gives an empty token.
 */
export function normalizeToken(raw: string | null | undefined): string {
  const value = (raw ?? '').trim().toLowerCase();
  if (!value) return '';
  return value.replace(/[- ]/g, '_');
}
