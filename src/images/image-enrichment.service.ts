import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { CatalogRepository, ListingRepository } from '../catalog/catalog.repository';
import { CatalogProduct, NewProductImage } from '../catalog/catalog.types';
import { RecoverableError } from '../common/errors';
import { PIPELINE_SETTINGS, PipelineSettings, SettingKey } from '../config/pipeline-settings';
import { StageGate } from '../pipeline/stage-gate';
import { StrategyResolver } from '../pipeline/strategy-resolver';
import { CandidateQuery, EnrichmentStage, ItemOutcome, outcome, StageItemOptions } from '../pipeline/pipeline.types';
import { ImageDownloader } from './image-downloader';
import { ImageProcessor } from './image-processor';
import { buildImageQuery } from './image-query';
import { ImageSearchService } from './image-search.service';
import { ImageStorage } from './image-storage';

const MAX_IMAGES = 5;

/**
 * Finds, processes and stores product images.
 *
 * Orders are assigned from the number of successful uploads, so a failed URL never leaves
 * a gap. Background removal runs at most once per product, for the first image that reaches
 * processing; when that image fails later on, the next one is stored without it.
 */
@Injectable()
export class ImageEnrichmentService implements EnrichmentStage<CatalogProduct> {
  readonly name = 'images' as const;
  readonly requiredSettings: readonly SettingKey[] = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', 'SERPAPI_KEY'];

  private readonly logger = new Logger(ImageEnrichmentService.name);
  private readonly resolver: StrategyResolver<CatalogProduct, string[]>;

  constructor(
    private readonly catalog: CatalogRepository,
    private readonly listings: ListingRepository,
    private readonly search: ImageSearchService,
    private readonly downloader: ImageDownloader,
    private readonly processor: ImageProcessor,
    private readonly storage: ImageStorage,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {
    const maxResults = Math.min(this.settings.images.searchCount, MAX_IMAGES);
    this.resolver = new StrategyResolver<CatalogProduct, string[]>(
      'images',
      [
        {
          name: 'image_search',
          trigger: (product) => buildImageQuery(product) !== null,
          execute: async (product) => {
            const query = buildImageQuery(product);
            return query ? this.search.searchImages(query, maxResults) : null;
          },
        },
      ],
      (urls) => urls.length > 0,
    );
  }

  selectCandidates(query: CandidateQuery): Promise<CatalogProduct[]> {
    return this.catalog.findProducts({ limit: query.limit, force: query.force, missing: 'images', eligibleOnly: true });
  }

  describe(product: CatalogProduct): string {
    return product.Code;
  }

  async processOne(product: CatalogProduct, options: StageItemOptions): Promise<ItemOutcome> {
    const existing = await this.catalog.findImages(product.Id);
    const gate = new StageGate<CatalogProduct>('images', () => existing.length > 0);
    if (!gate.shouldRun(product, options.force)) {
      return outcome('skipped', false);
    }

    const found = await this.resolver.resolve(product, product.Code);
    const urls = (found.value ?? []).slice(0, MAX_IMAGES);

    if (!options.persist) {
      this.logger.log(`[${product.Code}] Dry run, found ${urls.length} image URL(s): ${urls.join(', ')}`);
      return outcome(urls.length > 0 ? 'generated' : 'failed', false, urls.join(', '));
    }

    const images: NewProductImage[] = [];
    let backgroundAttempted = false;
    for (const url of urls) {
      const order = images.length;
      const removeBackground = order === 0 && !backgroundAttempted;
      try {
        const original = await this.downloader.download(url);
        if (removeBackground) backgroundAttempted = true;
        const processed = await this.processor.process(original, removeBackground);
        const publicUrl = await this.storage.upload(processed, `${product.Code}/${order}-${uuidv4()}.jpg`);
        images.push({
          ProductId: product.Id,
          Url: publicUrl,
          SortOrder: order,
          IsProcessed: true,
          BackgroundRemoved: removeBackground,
        });
      } catch (error) {
        if (!(error instanceof RecoverableError)) throw error;
        this.logger.warn(`[${product.Code}] Skipping image ${url}: ${error.message}`);
      }
    }

    if (images.length === 0) {
      await this.markListingError(product, 'No images could be found or processed');
      return outcome('failed', true, 'no images');
    }

    // Existing images are only replaced once at least one new image is stored.
    await this.catalog.replaceImages(product.Id, images);
    this.logger.log(`[${product.Code}] Stored ${images.length} of ${urls.length} image(s)`);
    return outcome('generated', true, `${images.length} image(s)`);
  }

  private async markListingError(product: CatalogProduct, reason: string): Promise<void> {
    const listing = await this.listings.findByProductId(product.Id);
    if (!listing) {
      this.logger.debug(`[${product.Code}] ${reason}; no listing to flag`);
      return;
    }
    await this.listings.update(listing.Id, { Status: 'ERROR', SyncError: reason });
    this.logger.warn(`[${product.Code}] ${reason}; listing ${listing.Id} marked ERROR`);
  }
}
