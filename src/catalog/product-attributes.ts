import { hasText } from '../pipeline/stage-gate';

const BRAND_KEYS = ['brand', 'marca', 'manufacturer', 'fabricante'];

/** First non-empty value under a brand-like key, matched case-insensitively. */
export function findBrand(specs: Record<string, string> | null): string | null {
  if (!specs) return null;
  for (const [key, value] of Object.entries(specs)) {
    if (BRAND_KEYS.includes(key.trim().toLowerCase()) && hasText(value)) {
      return value.trim();
    }
  }
  return null;
}
