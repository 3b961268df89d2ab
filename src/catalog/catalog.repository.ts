import {
  CatalogProduct,
  DetailScrapeRecord,
  ListingStatus,
  MarketplaceListing,
  NewDetailScrape,
  NewListing,
  NewProductImage,
  ProductImageRecord,
  ProductPatch,
  ProductQuery,
} from './catalog.types';

/**
 * Catalog persistence. Every write is a single statement committed on its own,
 * so an interrupted batch leaves completed items saved.
 */
export abstract class CatalogRepository {
  abstract findProducts(query: ProductQuery): Promise<CatalogProduct[]>;
  abstract findProductById(id: string): Promise<CatalogProduct | null>;
  abstract updateProduct(id: string, patch: ProductPatch): Promise<void>;

  abstract findLatestScrape(productId: string): Promise<DetailScrapeRecord | null>;
  abstract insertScrape(record: NewDetailScrape): Promise<DetailScrapeRecord>;

  abstract findImages(productId: string): Promise<ProductImageRecord[]>;
  /** Replaces every image of the product with the given set. */
  abstract replaceImages(productId: string, images: NewProductImage[]): Promise<ProductImageRecord[]>;
}

export interface ListingUpdate {
  Status: ListingStatus;
  MarketplaceItemId?: string | null;
  LastSyncedAt?: string | null;
  SyncError?: string | null;
  CategoryId?: string | null;
  Price?: number | null;
  NetPrice?: number | null;
  Profit?: number | null;
}

export abstract class ListingRepository {
  abstract findByStatus(status: ListingStatus, limit: number): Promise<MarketplaceListing[]>;
  abstract findByProductId(productId: string): Promise<MarketplaceListing | null>;
  abstract insert(listing: NewListing): Promise<MarketplaceListing>;
  abstract update(listingId: string, update: ListingUpdate): Promise<void>;
}
