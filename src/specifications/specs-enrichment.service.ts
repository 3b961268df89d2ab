import { Injectable, Logger } from '@nestjs/common';
import { CatalogRepository } from '../catalog/catalog.repository';
import { CatalogProduct, DetailScrapeRecord } from '../catalog/catalog.types';
import { CandidateRejectedError, errorStack, RecoverableError } from '../common/errors';
import { SettingKey } from '../config/pipeline-settings';
import { GenerationService, ProductContext } from '../generation/generation.types';
import { hasEntries, StageGate } from '../pipeline/stage-gate';
import { CandidateQuery, EnrichmentStage, ItemOutcome, outcome, StageItemOptions } from '../pipeline/pipeline.types';

@Injectable()
export class SpecsEnrichmentService implements EnrichmentStage<CatalogProduct> {
  readonly name = 'specs' as const;
  readonly requiredSettings: readonly SettingKey[] = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', 'GROQ_API_KEY'];

  private readonly logger = new Logger(SpecsEnrichmentService.name);
  readonly gate = new StageGate<CatalogProduct>('specs', (p) => hasEntries(p.Specs));

  constructor(
    private readonly catalog: CatalogRepository,
    private readonly generation: GenerationService,
  ) {}

  selectCandidates(query: CandidateQuery): Promise<CatalogProduct[]> {
    return this.catalog.findProducts({ limit: query.limit, force: query.force, missing: 'specs' });
  }

  describe(product: CatalogProduct): string {
    return product.Code;
  }

  async processOne(product: CatalogProduct, options: StageItemOptions): Promise<ItemOutcome> {
    if (!this.gate.shouldRun(product, options.force)) {
      this.logger.debug(`[${product.Code}] Specifications already present`);
      return outcome('skipped', false);
    }

    const scrape = await this.catalog.findLatestScrape(product.Id);
    try {
      const generated = await this.generation.generateSpecs(toSpecsContext(product, scrape));
      if (!hasEntries(generated.specs)) {
        throw new CandidateRejectedError('No specifications could be extracted');
      }

      const summary = `${Object.keys(generated.specs).length} spec(s)`;
      if (!options.persist) {
        this.logger.log(`[${product.Code}] Dry run, not saved: ${JSON.stringify(generated.specs)}`);
        return outcome('generated', false, summary);
      }

      await this.catalog.updateProduct(product.Id, {
        Specs: generated.specs,
        NormalizedName: generated.normalizedName ?? product.NormalizedName,
        ModelName: generated.modelName ?? product.ModelName,
      });
      return outcome('generated', true, summary);
    } catch (error) {
      if (!(error instanceof RecoverableError)) throw error;
      this.logger.error(`[specs] Extraction failed for ${product.Code}: ${error.message}`, errorStack(error));
      return outcome('failed', false, error.message);
    }
  }
}

function toSpecsContext(product: CatalogProduct, scrape: DetailScrapeRecord | null): ProductContext {
  return {
    code: product.Code,
    description: product.Description,
    category: product.Category,
    name: scrape?.Name ?? product.NormalizedName,
    attributes: scrape?.Attributes ?? null,
  };
}
