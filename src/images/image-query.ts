import { CatalogProduct } from '../catalog/catalog.types';
import { findBrand } from '../catalog/product-attributes';

const NOISY_TERMS = /\b(cop|si|no|precio|stock|garantia|3yb|w11pro)\b/gi;
export const IMAGE_QUERY_SUFFIX = 'official product image white background';
const MAX_QUERY_LENGTH = 100;
const DESCRIPTION_WORDS = 6;

/**
 * Image search query for a product: brand and model when known, otherwise the first
 * words of the supplier description. Returns null when there is nothing to search for.
 */
export function buildImageQuery(product: CatalogProduct): string | null {
  const brand = findBrand(product.Specs);
  const model = product.ModelName ?? product.Specs?.model ?? null;

  let base: string;
  if (brand && model) {
    base = [brand, model, product.Category ?? ''].join(' ');
  } else {
    base = product.Description.replace(NOISY_TERMS, '').split(/\s+/).filter(Boolean).slice(0, DESCRIPTION_WORDS).join(' ');
  }
  if (!base.replace(/[^\p{L}\p{N}]/gu, '')) {
    return null;
  }

  const cleaned = `${base} ${IMAGE_QUERY_SUFFIX}`.replace(/[^\p{L}\p{N}_\s]/gu, '');
  return cleaned.split(/\s+/).filter(Boolean).join(' ').slice(0, MAX_QUERY_LENGTH).trim();
}
