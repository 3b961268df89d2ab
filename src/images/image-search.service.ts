import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { PIPELINE_SETTINGS, PipelineSettings, requireSetting } from '../config/pipeline-settings';
import { toRecoverableError, UpstreamServiceError } from '../common/errors';

export const IMAGES_HTTP = Symbol('IMAGES_HTTP');

/** Hosts whose images are watermarked, stock or social content. Matched as substrings of the hostname. */
export const BLOCKED_IMAGE_DOMAINS: readonly string[] = [
  'facebook',
  'twitter',
  'instagram',
  'pinterest',
  'linkedin',
  'reddit',
  'amazon',
  'ebay',
  'aliexpress',
  'walmart',
  'istockphoto',
  'shutterstock',
  'gettyimages',
  'pexels',
  'unsplash',
  'wikipedia',
  'wikimedia',
];

export abstract class ImageSearchService {
  /** Ranked image URLs, best first, at most maxResults. */
  abstract searchImages(query: string, maxResults: number): Promise<string[]>;
}

interface SerpApiImagesResponse {
  error?: string;
  images_results?: Array<{ original?: unknown; position?: number }>;
}

export function filterImageUrls(urls: readonly string[], maxResults: number): string[] {
  const accepted: string[] = [];
  for (const url of urls) {
    let hostname: string;
    try {
      const parsed = new URL(url);
      if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') continue;
      hostname = parsed.hostname.toLowerCase();
    } catch {
      continue;
    }
    if (BLOCKED_IMAGE_DOMAINS.some((domain) => hostname.includes(domain))) continue;
    if (!accepted.includes(url)) accepted.push(url);
    if (accepted.length >= maxResults) break;
  }
  return accepted;
}

@Injectable()
export class SerpApiImageSearchService extends ImageSearchService {
  private readonly logger = new Logger(SerpApiImageSearchService.name);

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    @Inject(IMAGES_HTTP) private readonly http: AxiosInstance,
  ) {
    super();
  }

  async searchImages(query: string, maxResults: number): Promise<string[]> {
    const apiKey = requireSetting(this.settings, 'SERPAPI_KEY');
    this.logger.log(`Searching images for "${query}"`);

    let data: SerpApiImagesResponse;
    try {
      const response = await this.http.get<SerpApiImagesResponse>('https://serpapi.com/search.json', {
        params: { engine: 'google_images', q: query, api_key: apiKey, safe: 'active' },
        timeout: this.settings.httpTimeoutMs,
      });
      data = response.data;
    } catch (error) {
      throw toRecoverableError(error, 'SerpApi image search') ?? error;
    }
    if (data.error) {
      throw new UpstreamServiceError(`SerpApi image search failed: ${data.error}`);
    }

    const urls = (data.images_results ?? [])
      .map((result) => result.original)
      .filter((url): url is string => typeof url === 'string');
    const accepted = filterImageUrls(urls, maxResults);
    this.logger.log(`Found ${accepted.length} usable image URL(s) out of ${urls.length} for "${query}"`);
    return accepted;
  }
}
