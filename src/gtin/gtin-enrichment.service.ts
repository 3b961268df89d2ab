import { Injectable, Logger } from '@nestjs/common';
import { CatalogRepository } from '../catalog/catalog.repository';
import { CatalogProduct, GTIN_NOT_FOUND } from '../catalog/catalog.types';
import { SettingKey } from '../config/pipeline-settings';
import { GenerationService } from '../generation/generation.types';
import { hasText, StageGate } from '../pipeline/stage-gate';
import { StrategyResolver } from '../pipeline/strategy-resolver';
import { CandidateQuery, EnrichmentStage, ItemOutcome, outcome, StageItemOptions } from '../pipeline/pipeline.types';
import { createGtinResolver, GtinContext } from './gtin-strategies';

@Injectable()
export class GtinEnrichmentService implements EnrichmentStage<CatalogProduct> {
  readonly name = 'gtin' as const;
  readonly requiredSettings: readonly SettingKey[] = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', 'GROQ_API_KEY'];

  private readonly logger = new Logger(GtinEnrichmentService.name);
  private readonly resolver: StrategyResolver<GtinContext, string>;
  // An exhausted search counts as output so it is not retried without force.
  readonly gate = new StageGate<CatalogProduct>(
    'gtin',
    (p) => hasText(p.Gtin) || p.GtinSource === GTIN_NOT_FOUND,
  );

  constructor(
    private readonly catalog: CatalogRepository,
    generation: GenerationService,
  ) {
    this.resolver = createGtinResolver(generation);
  }

  selectCandidates(query: CandidateQuery): Promise<CatalogProduct[]> {
    return this.catalog.findProducts({ limit: query.limit, force: query.force, missing: 'gtin', eligibleOnly: true });
  }

  describe(product: CatalogProduct): string {
    return product.Code;
  }

  async processOne(product: CatalogProduct, options: StageItemOptions): Promise<ItemOutcome> {
    if (!this.gate.shouldRun(product, options.force)) {
      this.logger.debug(`[${product.Code}] GTIN already resolved (${product.GtinSource ?? 'unknown source'})`);
      return outcome('skipped', false);
    }

    const latestScrape = await this.catalog.findLatestScrape(product.Id);
    const result = await this.resolver.resolve({ product, latestScrape }, product.Code);

    if (!options.persist) {
      this.logger.log(`[${product.Code}] Dry run, not saved: ${result.value ?? 'no GTIN'} (${result.strategy})`);
      return outcome(result.value ? 'generated' : 'failed', false, result.strategy);
    }

    if (result.value === null) {
      await this.catalog.updateProduct(product.Id, { Gtin: null, GtinSource: GTIN_NOT_FOUND });
      this.logger.warn(`[${product.Code}] No GTIN found; marked ${GTIN_NOT_FOUND}`);
      return outcome('failed', true, GTIN_NOT_FOUND);
    }

    await this.catalog.updateProduct(product.Id, { Gtin: result.value, GtinSource: result.strategy });
    this.logger.log(`[${product.Code}] GTIN ${result.value} found via ${result.strategy}`);
    return outcome('generated', true, result.strategy);
  }
}
