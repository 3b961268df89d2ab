import { Inject, Injectable, Logger } from '@nestjs/common';
import { CatalogRepository, ListingRepository } from '../catalog/catalog.repository';
import { CatalogProduct, MarketplaceListing } from '../catalog/catalog.types';
import { RecoverableError } from '../common/errors';
import { PIPELINE_SETTINGS, PipelineSettings, SettingKey } from '../config/pipeline-settings';
import { hasText, StageGate } from '../pipeline/stage-gate';
import { CandidateQuery, EnrichmentStage, ItemOutcome, outcome, StageItemOptions } from '../pipeline/pipeline.types';
import { CategoryPredictor } from './category-predictor';
import { calculateListingPrice, ListingPrice } from './price-engine';

/**
 * Creates the marketplace listing of an eligible product: category predicted from the SEO title,
 * price from the product cost. New listings start PENDING for the publish stage.
 */
@Injectable()
export class ListingPreparationService implements EnrichmentStage<CatalogProduct> {
  readonly name = 'listings' as const;
  readonly requiredSettings: readonly SettingKey[] = [
    'SUPABASE_URL',
    'SUPABASE_SERVICE_ROLE_KEY',
    'CREDENTIALS_ENCRYPTION_SECRET',
    'MARKETPLACE_CLIENT_ID',
    'MARKETPLACE_CLIENT_SECRET',
    'MARKETPLACE_ACCOUNT_ID',
  ];

  private readonly logger = new Logger(ListingPreparationService.name);

  constructor(
    private readonly catalog: CatalogRepository,
    private readonly listings: ListingRepository,
    private readonly predictor: CategoryPredictor,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {}

  selectCandidates(query: CandidateQuery): Promise<CatalogProduct[]> {
    return this.catalog.findProducts({ limit: query.limit, force: query.force, missing: 'listing', eligibleOnly: true });
  }

  describe(product: CatalogProduct): string {
    return product.Code;
  }

  async processOne(product: CatalogProduct, options: StageItemOptions): Promise<ItemOutcome> {
    const existing = await this.listings.findByProductId(product.Id);
    const gate = new StageGate<CatalogProduct>('listings', () => existing !== null);
    if (!gate.shouldRun(product, options.force)) {
      return outcome('skipped', false);
    }
    if (!hasText(product.SeoTitle)) {
      return outcome('skipped', false, 'no SEO title');
    }
    if (product.Price === null || product.Price <= 0) {
      this.logger.warn(`[${product.Code}] No base price; listing not prepared`);
      return outcome('skipped', false, 'no base price');
    }

    try {
      const prediction = await this.predictor.predict(product.SeoTitle, options.sandbox);
      if (!prediction) {
        return outcome('failed', false, 'no category predicted');
      }
      const price = calculateListingPrice(product.Price, this.settings.pricing);
      const detail = `${prediction.categoryId} @ ${price.finalPrice.toFixed(2)}`;

      if (!options.persist) {
        this.logger.log(`[${product.Code}] Dry run, not saved: ${detail}`);
        return outcome('generated', false, detail);
      }

      await this.save(product, existing, prediction.categoryId, price);
      this.logger.log(`[${product.Code}] Listing prepared: ${detail}${prediction.categoryName ? ` (${prediction.categoryName})` : ''}`);
      return outcome('generated', true, detail);
    } catch (error) {
      if (!(error instanceof RecoverableError)) throw error;
      this.logger.warn(`[${product.Code}] Category prediction failed: ${error.message}`);
      return outcome('failed', false, error.message);
    }
  }

  private async save(
    product: CatalogProduct,
    existing: MarketplaceListing | null,
    categoryId: string,
    price: ListingPrice,
  ): Promise<void> {
    const pricing = { CategoryId: categoryId, Price: price.finalPrice, NetPrice: price.netPrice, Profit: price.profit };
    if (!existing) {
      await this.listings.insert({
        ProductId: product.Id,
        MarketplaceItemId: null,
        Status: 'PENDING',
        ...pricing,
        AvailableQuantity: Math.max(product.Stock ?? 0, 0),
        Attributes: [],
        LastSyncedAt: null,
        SyncError: null,
      });
      return;
    }
    // A listing in ERROR goes back to PENDING once it has a fresh category and price.
    if (existing.Status === 'ERROR') {
      await this.listings.update(existing.Id, { Status: 'PENDING', SyncError: null, ...pricing });
      return;
    }
    await this.listings.update(existing.Id, { Status: existing.Status, ...pricing });
  }
}
