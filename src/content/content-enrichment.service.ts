import { Injectable, Logger } from '@nestjs/common';
import { CatalogRepository } from '../catalog/catalog.repository';
import { CatalogProduct, ProductPatch } from '../catalog/catalog.types';
import { CandidateRejectedError, errorStack, RecoverableError } from '../common/errors';
import { SettingKey } from '../config/pipeline-settings';
import { GenerationService, ProductContext } from '../generation/generation.types';
import { hasText, StageGate } from '../pipeline/stage-gate';
import { CandidateQuery, EnrichmentStage, ItemOutcome, outcome, StageItemOptions } from '../pipeline/pipeline.types';
import { TitlePolicy } from './title-policy';

export interface ContentResult {
  title: string;
  description: string;
}

/**
 * SEO title and description. With force=false only the missing half is generated.
 */
@Injectable()
export class ContentEnrichmentService implements EnrichmentStage<CatalogProduct> {
  readonly name = 'content' as const;
  readonly requiredSettings: readonly SettingKey[] = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', 'GROQ_API_KEY'];

  private readonly logger = new Logger(ContentEnrichmentService.name);
  private readonly titlePolicy = new TitlePolicy();
  readonly gate = new StageGate<CatalogProduct>(
    'content',
    (p) => hasText(p.SeoTitle) && hasText(p.SeoDescription),
  );

  constructor(
    private readonly catalog: CatalogRepository,
    private readonly generation: GenerationService,
  ) {}

  selectCandidates(query: CandidateQuery): Promise<CatalogProduct[]> {
    return this.catalog.findProducts({ limit: query.limit, force: query.force, missing: 'content' });
  }

  describe(product: CatalogProduct): string {
    return product.Code;
  }

  async processOne(product: CatalogProduct, options: StageItemOptions): Promise<ItemOutcome> {
    if (!this.gate.shouldRun(product, options.force)) {
      this.logger.debug(`[${product.Code}] SEO title and description already present`);
      return outcome('skipped', false);
    }

    const needsTitle = options.force || !hasText(product.SeoTitle);
    const needsDescription = options.force || !hasText(product.SeoDescription);
    const context = toContentContext(product);

    let result: ContentResult;
    const patch: ProductPatch = {};
    try {
      const title = needsTitle ? this.titlePolicy.apply(await this.generation.generateTitle(context)) : product.SeoTitle;
      const description = needsDescription ? await this.generation.generateDescription(context) : product.SeoDescription;
      if (!hasText(title) || !hasText(description)) {
        throw new CandidateRejectedError('Generated content is empty');
      }
      if (needsTitle) patch.SeoTitle = title;
      if (needsDescription) patch.SeoDescription = description;
      result = { title, description };
    } catch (error) {
      if (!(error instanceof RecoverableError)) throw error;
      const fallback = this.fallback(product);
      this.logger.error(
        `[content] Generation failed for ${product.Code}: ${error.message}. Keeping original description (fallback title "${fallback.title}")`,
        errorStack(error),
      );
      return outcome('failed', false, fallback.title);
    }

    if (!options.persist) {
      this.logger.log(`[${product.Code}] Dry run, not saved. Title: "${result.title}"`);
      return outcome('generated', false, result.title);
    }

    await this.catalog.updateProduct(product.Id, patch);
    this.logger.log(`[${product.Code}] Saved ${Object.keys(patch).join(', ')}`);
    return outcome('generated', true, result.title);
  }

  /** Original supplier text the product keeps when generation fails. */
  fallback(product: CatalogProduct): ContentResult {
    return {
      title: product.SeoTitle ?? this.titlePolicy.fallback(product.NormalizedName ?? product.Description),
      description: product.SeoDescription ?? product.Description,
    };
  }
}

function toContentContext(product: CatalogProduct): ProductContext {
  return {
    code: product.Code,
    description: product.Description,
    category: product.Category,
    name: product.NormalizedName,
    specs: product.Specs,
  };
}
