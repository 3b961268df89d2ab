import { Inject, Injectable, Logger } from '@nestjs/common';
import { PIPELINE_SETTINGS, PipelineSettings, requireSetting } from '../config/pipeline-settings';
import { MalformedResponseError, UpstreamServiceError, UpstreamTimeoutError } from '../common/errors';
import { isRecord } from '../common/json-response';
import { DetailScraper, ScrapedDetail } from './detail-scraper';

const DETAIL_SCHEMA = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    price: { type: 'number' },
    attributes: {
      type: 'array',
      items: {
        type: 'object',
        properties: { key: { type: 'string' }, value: { type: 'string' } },
        required: ['key', 'value'],
      },
    },
    imageUrls: { type: 'array', items: { type: 'string' } },
  },
  required: ['name'],
};

const EXTRACTION_PROMPT =
  'Extract the product name, unit price, every technical attribute from the specification table as key/value pairs, and the absolute URLs of the product gallery images.';

export const FETCH = Symbol('FETCH');

@Injectable()
export class FirecrawlDetailScraper extends DetailScraper {
  private readonly logger = new Logger(FirecrawlDetailScraper.name);
  private readonly baseUrl = 'https://api.firecrawl.dev/v1';

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    @Inject(FETCH) private readonly fetchFn: typeof fetch,
  ) {
    super();
  }

  detailUrl(productCode: string): string {
    const template = requireSetting(this.settings, 'SUPPLIER_DETAIL_URL_TEMPLATE');
    return template.replace('{code}', encodeURIComponent(productCode));
  }

  async fetchDetail(productCode: string): Promise<ScrapedDetail> {
    const apiKey = requireSetting(this.settings, 'FIRECRAWL_API_KEY');
    const url = this.detailUrl(productCode);
    this.logger.log(`Scraping supplier detail for ${productCode}: ${url}`);

    let res: Response;
    try {
      res = await this.fetchFn(`${this.baseUrl}/scrape`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          url,
          formats: ['json'],
          jsonOptions: { schema: DETAIL_SCHEMA, prompt: EXTRACTION_PROMPT },
          onlyMainContent: true,
        }),
        signal: AbortSignal.timeout(this.settings.httpTimeoutMs),
      });
    } catch (error) {
      // fetch rejects with a TimeoutError DOMException or a TypeError for network failures.
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new UpstreamTimeoutError(`Firecrawl scrape of ${productCode} timed out`);
      }
      if (error instanceof TypeError) {
        throw new UpstreamServiceError(`Firecrawl scrape of ${productCode} failed: ${error.message}`);
      }
      throw error;
    }

    if (!res.ok) {
      const text = await res.text();
      this.logger.error(`Firecrawl scrape error ${res.status}: ${text.slice(0, 500)}`);
      throw new UpstreamServiceError(`Firecrawl scrape of ${productCode} failed: ${res.status}`, { status: res.status });
    }

    const body: unknown = await res.json();
    return toScrapedDetail(body, url, productCode);
  }
}

export function toScrapedDetail(body: unknown, sourceUrl: string, productCode: string): ScrapedDetail {
  const data = isRecord(body) && isRecord(body.data) ? body.data : null;
  const json = data && isRecord(data.json) ? data.json : null;
  if (!json) {
    throw new MalformedResponseError(`Firecrawl returned no structured data for ${productCode}`);
  }

  const attributes: Record<string, string> = {};
  if (Array.isArray(json.attributes)) {
    for (const entry of json.attributes) {
      if (isRecord(entry) && typeof entry.key === 'string' && typeof entry.value === 'string') {
        const key = entry.key.trim();
        const value = entry.value.trim();
        if (key && value) attributes[key] = value;
      }
    }
  }

  const imageUrls = Array.isArray(json.imageUrls)
    ? json.imageUrls.filter((u): u is string => typeof u === 'string' && /^https?:\/\//i.test(u))
    : [];

  const name = typeof json.name === 'string' && json.name.trim() ? json.name.trim() : null;
  if (!name && Object.keys(attributes).length === 0) {
    throw new MalformedResponseError(`Firecrawl detail for ${productCode} has neither name nor attributes`);
  }

  return {
    Name: name,
    Price: typeof json.price === 'number' && Number.isFinite(json.price) ? json.price : null,
    Attributes: attributes,
    ImageUrls: [...new Set(imageUrls)],
    SourceUrl: sourceUrl,
  };
}
