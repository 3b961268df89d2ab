import { CatalogProduct, DetailScrapeRecord } from '../catalog/catalog.types';
import { findBrand } from '../catalog/product-attributes';
import { GenerationService } from '../generation/generation.types';
import { hasText } from '../pipeline/stage-gate';
import { Strategy, StrategyResolver } from '../pipeline/strategy-resolver';

export interface GtinContext {
  product: CatalogProduct;
  latestScrape: DetailScrapeRecord | null;
}

export const GTIN_PATTERN = /^\d{8,14}$/;

const MAX_DESCRIPTION_PARTS = 5;

export function isValidGtin(candidate: string): boolean {
  return GTIN_PATTERN.test(candidate);
}

/** Query text synthesized from a supplier scrape: name first, then attributes as "key: value". */
export function describeScrape(scrape: DetailScrapeRecord): string {
  const parts: string[] = [];
  if (hasText(scrape.Name)) parts.push(scrape.Name.trim());
  for (const [key, value] of Object.entries(scrape.Attributes ?? {})) {
    if (hasText(value)) parts.push(`${key}: ${value.trim()}`);
  }
  return parts.slice(0, MAX_DESCRIPTION_PARTS).join(' | ');
}

/**
 * GTIN strategies, most precise first.
 */
export function buildGtinStrategies(generation: GenerationService): Strategy<GtinContext, string>[] {
  return [
    {
      name: 'sku_normalized_name',
      trigger: ({ product }) => hasText(product.Sku) && hasText(product.NormalizedName),
      execute: ({ product }) => generation.searchGtin(`SKU: ${product.Sku}, Product: ${product.NormalizedName}`),
    },
    {
      name: 'model_brand',
      trigger: ({ product }) => hasText(product.ModelName) && findBrand(product.Specs) !== null,
      execute: ({ product }) =>
        generation.searchGtin(`Brand: ${findBrand(product.Specs)}, Model: ${product.ModelName}`),
    },
    {
      name: 'raw_description',
      trigger: ({ latestScrape }) => latestScrape !== null,
      execute: async ({ latestScrape }) => {
        const description = latestScrape ? describeScrape(latestScrape) : '';
        return description ? generation.searchGtin(description) : null;
      },
    },
  ];
}

export function createGtinResolver(generation: GenerationService): StrategyResolver<GtinContext, string> {
  return new StrategyResolver('gtin', buildGtinStrategies(generation), isValidGtin);
}
