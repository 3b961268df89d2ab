import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { MalformedResponseError } from '../common/errors';
import { validateResponse } from '../common/json-response';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline-settings';
import { MarketplaceApiClient } from '../marketplace/marketplace-api.client';

export class CategoryPredictionDto {
  @IsString()
  @IsNotEmpty()
  category_id!: string;

  @IsOptional()
  @IsString()
  category_name?: string | null;

  @IsOptional()
  @IsString()
  domain_id?: string | null;
}

export interface CategoryPrediction {
  categoryId: string;
  categoryName: string | null;
}

/** Predicts a marketplace category from a listing title through the site's domain discovery search. */
@Injectable()
export class CategoryPredictor {
  private readonly logger = new Logger(CategoryPredictor.name);

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    private readonly marketplace: MarketplaceApiClient,
  ) {}

  async predict(title: string, sandbox: boolean): Promise<CategoryPrediction | null> {
    const query = new URLSearchParams({ q: title, limit: '1' });
    const path = `sites/${this.settings.marketplace.siteId}/domain_discovery/search?${query.toString()}`;
    const body = await this.marketplace.get<unknown>(path, { sandbox });

    if (!Array.isArray(body)) {
      throw new MalformedResponseError('Category prediction did not return a list');
    }
    if (body.length === 0) {
      this.logger.debug(`No category predicted for "${title}"`);
      return null;
    }
    const best: unknown = body[0];
    const prediction = validateResponse(best, CategoryPredictionDto, 'Category prediction');
    return { categoryId: prediction.category_id, categoryName: prediction.category_name ?? null };
  }
}
