import { Injectable, Logger } from '@nestjs/common';
import { CatalogRepository } from '../catalog/catalog.repository';
import { CatalogProduct } from '../catalog/catalog.types';
import { errorStack, RecoverableError } from '../common/errors';
import { SettingKey } from '../config/pipeline-settings';
import { StageGate } from '../pipeline/stage-gate';
import { CandidateQuery, EnrichmentStage, ItemOutcome, outcome, StageItemOptions } from '../pipeline/pipeline.types';
import { DetailScraper } from './detail-scraper';

/**
 * Fetches one supplier detail scrape per product. Scrapes are append-only;
 * forced runs add a newer record rather than replacing the old one.
 */
@Injectable()
export class DetailsEnrichmentService implements EnrichmentStage<CatalogProduct> {
  readonly name = 'details' as const;
  readonly requiredSettings: readonly SettingKey[] = [
    'SUPABASE_URL',
    'SUPABASE_SERVICE_ROLE_KEY',
    'FIRECRAWL_API_KEY',
    'SUPPLIER_DETAIL_URL_TEMPLATE',
  ];

  private readonly logger = new Logger(DetailsEnrichmentService.name);

  constructor(
    private readonly catalog: CatalogRepository,
    private readonly scraper: DetailScraper,
  ) {}

  selectCandidates(query: CandidateQuery): Promise<CatalogProduct[]> {
    return this.catalog.findProducts({ limit: query.limit, force: query.force, missing: 'details' });
  }

  describe(product: CatalogProduct): string {
    return product.Code;
  }

  async processOne(product: CatalogProduct, options: StageItemOptions): Promise<ItemOutcome> {
    const latest = await this.catalog.findLatestScrape(product.Id);
    const gate = new StageGate<CatalogProduct>('details', () => latest !== null);
    if (!gate.shouldRun(product, options.force)) {
      return outcome('skipped', false);
    }

    try {
      const detail = await this.scraper.fetchDetail(product.Code);
      const summary = `${Object.keys(detail.Attributes).length} attribute(s), ${detail.ImageUrls.length} image(s)`;
      if (!options.persist) {
        this.logger.log(`[${product.Code}] Dry run, not saved: ${detail.Name ?? '(no name)'}, ${summary}`);
        return outcome('generated', false, summary);
      }
      await this.catalog.insertScrape({ ...detail, ProductId: product.Id });
      return outcome('generated', true, summary);
    } catch (error) {
      if (!(error instanceof RecoverableError)) throw error;
      this.logger.error(`[details] Scrape failed for ${product.Code}: ${error.message}`, errorStack(error));
      return outcome('failed', false, error.message);
    }
  }
}
