export const GTIN_NOT_FOUND = 'NOT_FOUND';

/** Product master record (`Products`). Enrichment fields stay null until their stage succeeds. */
export interface CatalogProduct {
  Id: string;
  Code: string;
  Description: string;
  Category: string | null;
  Price: number | null;
  Stock: number | null;
  IsActive: boolean;
  IsEligible: boolean;
  NormalizedName: string | null;
  ModelName: string | null;
  Sku: string | null;
  Specs: Record<string, string> | null;
  Gtin: string | null;
  /** Strategy that produced Gtin, or NOT_FOUND once every strategy was exhausted. */
  GtinSource: string | null;
  SeoTitle: string | null;
  SeoDescription: string | null;
  UpdatedAt: string | null;
}

export type ProductPatch = Partial<
  Pick<
    CatalogProduct,
    'NormalizedName' | 'ModelName' | 'Sku' | 'Specs' | 'Gtin' | 'GtinSource' | 'SeoTitle' | 'SeoDescription'
  >
>;

/** Raw supplier scrape (`ProductDetailScrapes`). Append-only. */
export interface DetailScrapeRecord {
  Id: string;
  ProductId: string;
  Name: string | null;
  Price: number | null;
  Attributes: Record<string, string>;
  ImageUrls: string[];
  SourceUrl: string | null;
  CreatedAt: string;
}

export type NewDetailScrape = Omit<DetailScrapeRecord, 'Id' | 'CreatedAt'>;

/** Processed image (`ProductImages`). SortOrder 0 is the primary image. */
export interface ProductImageRecord {
  Id: string;
  ProductId: string;
  Url: string;
  SortOrder: number;
  IsProcessed: boolean;
  BackgroundRemoved: boolean;
  CreatedAt: string;
}

export type NewProductImage = Omit<ProductImageRecord, 'Id' | 'CreatedAt'>;

export type ListingStatus = 'PENDING' | 'ACTIVE' | 'PAUSED' | 'ERROR';

/** Marketplace listing (`MarketplaceListings`), one per product. */
export interface MarketplaceListing {
  Id: string;
  ProductId: string;
  MarketplaceItemId: string | null;
  Status: ListingStatus;
  CategoryId: string | null;
  /** Final selling price, tax included. */
  Price: number | null;
  NetPrice: number | null;
  Profit: number | null;
  AvailableQuantity: number;
  Attributes: ListingAttribute[];
  LastSyncedAt: string | null;
  SyncError: string | null;
}

export type NewListing = Omit<MarketplaceListing, 'Id'>;

export interface ListingAttribute {
  id: string;
  value_name: string;
}

/** Which enrichment output a candidate query should be missing. */
export type MissingOutput = 'details' | 'specs' | 'content' | 'gtin' | 'images' | 'listing';

export interface ProductQuery {
  limit: number;
  /** When set, only products without this output are returned (ignored when force is true). */
  missing?: MissingOutput;
  force?: boolean;
  eligibleOnly?: boolean;
}
