import { Logger } from '@nestjs/common';
import { ConfigurationError, MalformedResponseError, UpstreamServiceError, UpstreamTimeoutError } from '../common/errors';
import { createTestSettings } from '../config/testing/test-settings';
import { FirecrawlDetailScraper, toScrapedDetail } from './firecrawl-detail.scraper';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('FirecrawlDetailScraper', () => {
  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  it('posts the supplier URL and maps the structured result', async () => {
    const fetchFn = jest.fn<Promise<Response>, Parameters<typeof fetch>>(async () =>
      jsonResponse({
        success: true,
        data: {
          json: {
            name: ' Mouse Acme M20 ',
            price: 12.5,
            attributes: [
              { key: 'Marca', value: 'Acme' },
              { key: 'Color', value: ' ' },
            ],
            imageUrls: ['https://cdn.supplier.test/m20.jpg', 'https://cdn.supplier.test/m20.jpg', 'data:image/png;base64,AAA'],
          },
        },
      }),
    );
    const scraper = new FirecrawlDetailScraper(createTestSettings(), fetchFn);

    const detail = await scraper.fetchDetail('M 20');

    expect(detail).toEqual({
      Name: 'Mouse Acme M20',
      Price: 12.5,
      Attributes: { Marca: 'Acme' },
      ImageUrls: ['https://cdn.supplier.test/m20.jpg'],
      SourceUrl: 'https://supplier.test/products/M%2020',
    });
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://api.firecrawl.dev/v1/scrape');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-firecrawl-key' });
  });

  it('maps non-2xx responses to UpstreamServiceError', async () => {
    const fetchFn = jest.fn<Promise<Response>, Parameters<typeof fetch>>(async () => new Response('busy', { status: 503 }));
    const scraper = new FirecrawlDetailScraper(createTestSettings(), fetchFn);

    await expect(scraper.fetchDetail('A-1')).rejects.toBeInstanceOf(UpstreamServiceError);
  });

  it('maps aborted requests to UpstreamTimeoutError', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const fetchFn = jest.fn<Promise<Response>, Parameters<typeof fetch>>(async () => {
      throw timeout;
    });
    const scraper = new FirecrawlDetailScraper(createTestSettings(), fetchFn);

    await expect(scraper.fetchDetail('A-1')).rejects.toBeInstanceOf(UpstreamTimeoutError);
  });

  it('requires the Firecrawl key', async () => {
    const fetchFn = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    const scraper = new FirecrawlDetailScraper(createTestSettings({ firecrawl: { apiKey: undefined } }), fetchFn);

    await expect(scraper.fetchDetail('A-1')).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetchFn).not.toHaveBeenCalled();
  });
});

describe('toScrapedDetail', () => {
  it('rejects a response without structured data', () => {
    expect(() => toScrapedDetail({ success: true, data: {} }, 'u', 'A-1')).toThrow(MalformedResponseError);
  });
});
