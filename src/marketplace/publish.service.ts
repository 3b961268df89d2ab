import { Injectable, Logger } from '@nestjs/common';
import { CatalogRepository, ListingRepository } from '../catalog/catalog.repository';
import { CatalogProduct, MarketplaceListing } from '../catalog/catalog.types';
import { ListingUpdate } from '../catalog/catalog.repository';
import { errorMessage, MarketplaceApiError, PersistenceError, RecoverableError } from '../common/errors';
import { validateResponse } from '../common/json-response';
import { SettingKey } from '../config/pipeline-settings';
import { CandidateQuery, EnrichmentStage, ItemOutcome, outcome, StageItemOptions, SummaryLabels } from '../pipeline/pipeline.types';
import { hasText } from '../pipeline/stage-gate';
import { buildItemPayload, ItemPayload, toItemUpdate } from './item-payload';
import { MarketplaceApiClient } from './marketplace-api.client';
import { TokenRequest } from './marketplace-token.service';
import { CreatedItemDto } from './marketplace.dto';

export interface PublishCandidate {
  listing: MarketplaceListing;
  product: CatalogProduct | null;
}

@Injectable()
export class PublishService implements EnrichmentStage<PublishCandidate> {
  readonly name = 'publish' as const;
  readonly requiredSettings: readonly SettingKey[] = [
    'SUPABASE_URL',
    'SUPABASE_SERVICE_ROLE_KEY',
    'CREDENTIALS_ENCRYPTION_SECRET',
    'MARKETPLACE_CLIENT_ID',
    'MARKETPLACE_CLIENT_SECRET',
    'MARKETPLACE_ACCOUNT_ID',
  ];
  readonly summaryLabels: SummaryLabels = { succeeded: 'published', failed: 'errors', skipped: 'skipped' };

  private readonly logger = new Logger(PublishService.name);

  constructor(
    private readonly catalog: CatalogRepository,
    private readonly listings: ListingRepository,
    private readonly marketplace: MarketplaceApiClient,
  ) {}

  async selectCandidates(query: CandidateQuery): Promise<PublishCandidate[]> {
    const pending = await this.listings.findByStatus('PENDING', query.limit);
    const candidates: PublishCandidate[] = [];
    for (const listing of pending) {
      candidates.push({ listing, product: await this.catalog.findProductById(listing.ProductId) });
    }
    return candidates;
  }

  describe({ listing, product }: PublishCandidate): string {
    return product?.Code ?? listing.Id;
  }

  async processOne({ listing, product }: PublishCandidate, options: StageItemOptions): Promise<ItemOutcome> {
    if (hasText(listing.MarketplaceItemId) && !options.force) {
      return outcome('skipped', false, 'already on marketplace');
    }
    if (!product || !product.IsEligible || !hasText(product.SeoTitle)) {
      return outcome('skipped', false, 'product not ready');
    }
    const images = await this.catalog.findImages(product.Id);
    if (images.length === 0) {
      return outcome('skipped', false, 'no images');
    }

    let itemId = listing.MarketplaceItemId;
    try {
      const payload = buildItemPayload({ listing, product, images, sandbox: options.sandbox });
      if (!options.persist) {
        this.logger.log(`[${product.Code}] Dry run payload: ${JSON.stringify(payload)}`);
        return outcome('generated', false, payload.title);
      }

      const token: TokenRequest = { sandbox: options.sandbox };
      if (hasText(listing.MarketplaceItemId)) {
        return await this.updateExisting(listing, product, listing.MarketplaceItemId, payload, token);
      }

      const created = validateResponse(
        await this.marketplace.post<unknown>('items', payload, token),
        CreatedItemDto,
        'Marketplace item creation',
      );
      itemId = created.id;
      // The item exists from here on; record its id before anything else can fail.
      await this.recordCreatedItem(listing, product, created.id, { Status: listing.Status, MarketplaceItemId: created.id });
      await this.marketplace.post<unknown>(
        `items/${created.id}/description`,
        { plain_text: product.SeoDescription ?? product.Description },
        token,
      );

      await this.recordCreatedItem(listing, product, created.id, {
        Status: 'ACTIVE',
        MarketplaceItemId: created.id,
        LastSyncedAt: new Date().toISOString(),
        SyncError: null,
      });
      this.logger.log(`[${product.Code}] Published as ${created.id}`);
      return outcome('generated', true, created.id);
    } catch (error) {
      if (!(error instanceof RecoverableError)) throw error;
      this.logger.warn(`[${product.Code}] Publish failed: ${error.message}`);
      if (error instanceof MarketplaceApiError) {
        await this.listings.update(listing.Id, {
          Status: 'ERROR',
          SyncError: error.message,
          ...(itemId ? { MarketplaceItemId: itemId } : {}),
        });
        return outcome('failed', true, error.message);
      }
      return outcome('failed', false, error.message);
    }
  }

  /** A forced run over a listing that already has an item updates it in place. */
  private async updateExisting(
    listing: MarketplaceListing,
    product: CatalogProduct,
    itemId: string,
    payload: ItemPayload,
    token: TokenRequest,
  ): Promise<ItemOutcome> {
    await this.marketplace.put<unknown>(`items/${itemId}`, toItemUpdate(payload), token);
    await this.listings.update(listing.Id, {
      Status: 'ACTIVE',
      MarketplaceItemId: itemId,
      LastSyncedAt: new Date().toISOString(),
      SyncError: null,
    });
    this.logger.log(`[${product.Code}] Updated existing item ${itemId}`);
    return outcome('generated', true, itemId);
  }

  /** Listing writes after item creation get one retry; the created id is logged if both fail. */
  private async recordCreatedItem(
    listing: MarketplaceListing,
    product: CatalogProduct,
    itemId: string,
    update: ListingUpdate,
  ): Promise<void> {
    try {
      await this.listings.update(listing.Id, update);
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      this.logger.warn(`[${product.Code}] Listing ${listing.Id} write failed after creating ${itemId}, retrying: ${error.message}`);
      try {
        await this.listings.update(listing.Id, update);
      } catch (retryError) {
        this.logger.error(
          `[${product.Code}] Marketplace item ${itemId} exists but listing ${listing.Id} could not be updated: ${errorMessage(retryError)}`,
        );
        throw retryError;
      }
    }
  }
}
