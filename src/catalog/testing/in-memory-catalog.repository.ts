import { CatalogRepository, ListingRepository, ListingUpdate } from '../catalog.repository';
import {
  CatalogProduct,
  DetailScrapeRecord,
  GTIN_NOT_FOUND,
  ListingStatus,
  MarketplaceListing,
  NewDetailScrape,
  NewListing,
  NewProductImage,
  ProductImageRecord,
  ProductPatch,
  ProductQuery,
} from '../catalog.types';

let sequence = 0;
const nextId = (prefix: string) => `${prefix}-${++sequence}`;

export function buildProduct(overrides: Partial<CatalogProduct> = {}): CatalogProduct {
  const id = overrides.Id ?? nextId('prod');
  return {
    Id: id,
    Code: overrides.Code ?? `CODE-${id}`,
    Description: 'Portatil Acme Book 14 Intel Core i5 8GB RAM 512GB SSD',
    Category: 'Laptops',
    Price: 650,
    Stock: 4,
    IsActive: true,
    IsEligible: true,
    NormalizedName: null,
    ModelName: null,
    Sku: null,
    Specs: null,
    Gtin: null,
    GtinSource: null,
    SeoTitle: null,
    SeoDescription: null,
    UpdatedAt: null,
    ...overrides,
  };
}

const isBlank = (value: string | null) => value === null || value.trim() === '';

/** Mirrors the Supabase repository's selection rules over plain arrays. */
export class InMemoryCatalogRepository extends CatalogRepository {
  readonly products = new Map<string, CatalogProduct>();
  readonly scrapes: DetailScrapeRecord[] = [];
  readonly images: ProductImageRecord[] = [];
  readonly updates: Array<{ id: string; patch: ProductPatch }> = [];

  constructor(
    products: CatalogProduct[] = [],
    private readonly listingStore: InMemoryListingRepository | null = null,
  ) {
    super();
    products.forEach((p) => this.products.set(p.Id, { ...p }));
  }

  get writeCount(): number {
    return this.updates.length;
  }

  async findProducts(query: ProductQuery): Promise<CatalogProduct[]> {
    const missing = query.force ? undefined : query.missing;
    return [...this.products.values()]
      .filter((p) => p.IsActive && p.Code !== '')
      .filter((p) => !query.eligibleOnly || p.IsEligible)
      .filter((p) => {
        switch (missing) {
          case 'specs':
            return !p.Specs || Object.keys(p.Specs).length === 0;
          case 'content':
            return isBlank(p.SeoTitle) || isBlank(p.SeoDescription);
          case 'gtin':
            return p.Gtin === null && p.GtinSource !== GTIN_NOT_FOUND;
          case 'images':
            return !this.images.some((i) => i.ProductId === p.Id);
          case 'details':
            return !this.scrapes.some((s) => s.ProductId === p.Id);
          case 'listing':
            return ![...(this.listingStore?.listings.values() ?? [])].some((l) => l.ProductId === p.Id);
          default:
            return true;
        }
      })
      .sort((a, b) => a.Code.localeCompare(b.Code))
      .slice(0, query.limit)
      .map((p) => ({ ...p }));
  }

  async findProductById(id: string): Promise<CatalogProduct | null> {
    const product = this.products.get(id);
    return product ? { ...product } : null;
  }

  async updateProduct(id: string, patch: ProductPatch): Promise<void> {
    const product = this.products.get(id);
    if (!product) throw new Error(`Unknown product ${id}`);
    this.updates.push({ id, patch });
    this.products.set(id, { ...product, ...patch, UpdatedAt: new Date().toISOString() });
  }

  async findLatestScrape(productId: string): Promise<DetailScrapeRecord | null> {
    const own = this.scrapes.filter((s) => s.ProductId === productId);
    return own.length > 0 ? own[own.length - 1] : null;
  }

  async insertScrape(record: NewDetailScrape): Promise<DetailScrapeRecord> {
    const stored: DetailScrapeRecord = { ...record, Id: nextId('scrape'), CreatedAt: new Date().toISOString() };
    this.scrapes.push(stored);
    return stored;
  }

  async findImages(productId: string): Promise<ProductImageRecord[]> {
    return this.images.filter((i) => i.ProductId === productId).sort((a, b) => a.SortOrder - b.SortOrder);
  }

  async replaceImages(productId: string, images: NewProductImage[]): Promise<ProductImageRecord[]> {
    for (let i = this.images.length - 1; i >= 0; i--) {
      if (this.images[i].ProductId === productId) this.images.splice(i, 1);
    }
    const stored = images.map((image) => ({ ...image, Id: nextId('img'), CreatedAt: new Date().toISOString() }));
    this.images.push(...stored);
    return stored;
  }
}

export function buildListing(overrides: Partial<MarketplaceListing> = {}): MarketplaceListing {
  return {
    Id: overrides.Id ?? nextId('listing'),
    ProductId: 'prod-unknown',
    MarketplaceItemId: null,
    Status: 'PENDING',
    CategoryId: 'MEC1652',
    Price: 650,
    NetPrice: null,
    Profit: null,
    AvailableQuantity: 4,
    Attributes: [],
    LastSyncedAt: null,
    SyncError: null,
    ...overrides,
  };
}

export class InMemoryListingRepository extends ListingRepository {
  readonly listings = new Map<string, MarketplaceListing>();

  constructor(listings: MarketplaceListing[] = []) {
    super();
    listings.forEach((l) => this.listings.set(l.Id, { ...l }));
  }

  async findByStatus(status: ListingStatus, limit: number): Promise<MarketplaceListing[]> {
    return [...this.listings.values()].filter((l) => l.Status === status).slice(0, limit);
  }

  async findByProductId(productId: string): Promise<MarketplaceListing | null> {
    return [...this.listings.values()].find((l) => l.ProductId === productId) ?? null;
  }

  async insert(listing: NewListing): Promise<MarketplaceListing> {
    const created: MarketplaceListing = { ...listing, Id: nextId('listing') };
    this.listings.set(created.Id, created);
    return { ...created };
  }

  async update(listingId: string, update: ListingUpdate): Promise<void> {
    const listing = this.listings.get(listingId);
    if (!listing) throw new Error(`Unknown listing ${listingId}`);
    this.listings.set(listingId, { ...listing, ...update });
  }
}
