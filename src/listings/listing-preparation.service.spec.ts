import { Logger } from '@nestjs/common';
import { CatalogProduct, MarketplaceListing } from '../catalog/catalog.types';
import {
  buildListing,
  buildProduct,
  InMemoryCatalogRepository,
  InMemoryListingRepository,
} from '../catalog/testing/in-memory-catalog.repository';
import { createAxiosStub, StubHandler, timeoutError } from '../common/testing/axios-stub';
import { createTestSettings } from '../config/testing/test-settings';
import { StageItemOptions } from '../pipeline/pipeline.types';
import { MarketplaceApiClient } from '../marketplace/marketplace-api.client';
import { MarketplaceOAuthClient } from '../marketplace/marketplace-oauth.client';
import { MarketplaceTokenService } from '../marketplace/marketplace-token.service';
import { FixedClock } from '../marketplace/testing/fixed-clock';
import { buildTokenRecord, InMemoryTokenRepository } from '../marketplace/testing/in-memory-token.repository';
import { CategoryPredictor } from './category-predictor';
import { ListingPreparationService } from './listing-preparation.service';

const PERSIST: StageItemOptions = { force: false, persist: true, sandbox: false };

const predicted: StubHandler = () => ({
  status: 200,
  data: [{ domain_id: 'MEC-COMPUTER_MICE', domain_name: 'Mouses', category_id: 'MEC1714', category_name: 'Mouses' }],
});

function setup(handler: StubHandler, products: CatalogProduct[], listings: MarketplaceListing[] = []) {
  const settings = createTestSettings();
  const { http, requests } = createAxiosStub(handler);
  const listingRepository = new InMemoryListingRepository(listings);
  const catalog = new InMemoryCatalogRepository(products, listingRepository);
  const tokens = new MarketplaceTokenService(
    settings,
    new InMemoryTokenRepository([buildTokenRecord()]),
    new MarketplaceOAuthClient(settings, http),
    new FixedClock(new Date('2026-01-01T00:00:00.000Z')),
  );
  const predictor = new CategoryPredictor(settings, new MarketplaceApiClient(settings, http, tokens));
  const service = new ListingPreparationService(catalog, listingRepository, predictor, settings);
  return { service, listings: listingRepository, requests };
}

const mouse = (overrides: Partial<CatalogProduct> = {}) =>
  buildProduct({ Id: 'prod-1', Code: 'M20', SeoTitle: 'Mouse Acme M20', Price: 100, Stock: 7, ...overrides });

describe('ListingPreparationService', () => {
  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  it('selects eligible products that have no listing yet', async () => {
    const { service } = setup(
      predicted,
      [mouse(), buildProduct({ Id: 'prod-2', Code: 'K1' }), buildProduct({ Id: 'prod-3', Code: 'X9', IsEligible: false })],
      [buildListing({ ProductId: 'prod-2' })],
    );

    const candidates = await service.selectCandidates({ force: false, limit: 10 });

    expect(candidates.map((p) => p.Code)).toEqual(['M20']);
  });

  it('creates a pending listing with the predicted category and calculated price', async () => {
    const { service, listings, requests } = setup(predicted, [mouse()]);

    const result = await service.processOne(mouse(), PERSIST);

    expect(result).toEqual({ status: 'generated', saved: true, detail: 'MEC1714 @ 180.52' });
    const url = new URL(String(requests[0].url));
    expect(url.pathname).toBe('/sites/MEC/domain_discovery/search');
    expect(url.searchParams.get('q')).toBe('Mouse Acme M20');
    expect(url.searchParams.get('limit')).toBe('1');
    expect([...listings.listings.values()]).toEqual([
      expect.objectContaining({
        ProductId: 'prod-1',
        Status: 'PENDING',
        MarketplaceItemId: null,
        CategoryId: 'MEC1714',
        Price: 180.52,
        NetPrice: 161.18,
        Profit: 22,
        AvailableQuantity: 7,
      }),
    ]);
  });

  it('predicts and prices without writing on a dry run', async () => {
    const { service, listings, requests } = setup(predicted, [mouse()]);

    const result = await service.processOne(mouse(), { ...PERSIST, persist: false });

    expect(result).toEqual({ status: 'generated', saved: false, detail: 'MEC1714 @ 180.52' });
    expect(requests).toHaveLength(1);
    expect(listings.listings.size).toBe(0);
  });

  it('fails without writing when no category is predicted', async () => {
    const { service, listings } = setup(() => ({ status: 200, data: [] }), [mouse()]);

    await expect(service.processOne(mouse(), PERSIST)).resolves.toEqual({
      status: 'failed',
      saved: false,
      detail: 'no category predicted',
    });
    expect(listings.listings.size).toBe(0);
  });

  it('counts a malformed or timed out prediction as a failed item', async () => {
    const malformed = setup(() => ({ status: 200, data: { category_id: 'MEC1714' } }), [mouse()]);
    const timedOut = setup((config) => timeoutError(config), [mouse()]);

    await expect(malformed.service.processOne(mouse(), PERSIST)).resolves.toMatchObject({ status: 'failed', saved: false });
    await expect(timedOut.service.processOne(mouse(), PERSIST)).resolves.toMatchObject({ status: 'failed', saved: false });
    expect(malformed.listings.listings.size + timedOut.listings.listings.size).toBe(0);
  });

  it('skips products without a SEO title or a base price', async () => {
    const { service, requests } = setup(predicted, [mouse()]);

    await expect(service.processOne(mouse({ SeoTitle: null }), PERSIST)).resolves.toEqual({
      status: 'skipped',
      saved: false,
      detail: 'no SEO title',
    });
    await expect(service.processOne(mouse({ Price: null }), PERSIST)).resolves.toEqual({
      status: 'skipped',
      saved: false,
      detail: 'no base price',
    });
    expect(requests).toHaveLength(0);
  });

  it('leaves an existing listing alone unless forced', async () => {
    const existing = buildListing({ Id: 'l-1', ProductId: 'prod-1', Status: 'ERROR', SyncError: 'No images', CategoryId: null });
    const { service, listings, requests } = setup(predicted, [mouse()], [existing]);

    await expect(service.processOne(mouse(), PERSIST)).resolves.toEqual({ status: 'skipped', saved: false });
    expect(requests).toHaveLength(0);

    await service.processOne(mouse(), { ...PERSIST, force: true });

    expect(listings.listings.size).toBe(1);
    expect(listings.listings.get('l-1')).toMatchObject({
      Status: 'PENDING',
      SyncError: null,
      CategoryId: 'MEC1714',
      Price: 180.52,
    });
  });

  it('keeps the status of an active listing when re-priced', async () => {
    const existing = buildListing({ Id: 'l-1', ProductId: 'prod-1', Status: 'ACTIVE', MarketplaceItemId: 'MEC900' });
    const { service, listings } = setup(predicted, [mouse()], [existing]);

    await service.processOne(mouse(), { ...PERSIST, force: true });

    expect(listings.listings.get('l-1')).toMatchObject({ Status: 'ACTIVE', MarketplaceItemId: 'MEC900', Price: 180.52 });
  });
});
