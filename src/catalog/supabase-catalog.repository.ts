import { Injectable, Logger } from '@nestjs/common';
import { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { SupabaseService } from '../common/supabase.service';
import { PersistenceError } from '../common/errors';
import { CatalogRepository, ListingRepository, ListingUpdate } from './catalog.repository';
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
} from './catalog.types';

const PRODUCT_COLUMNS =
  'Id, Code, Description, Category, Price, Stock, IsActive, IsEligible, NormalizedName, ModelName, Sku, Specs, Gtin, GtinSource, SeoTitle, SeoDescription, UpdatedAt';

function persistenceError(action: string, error: PostgrestError): PersistenceError {
  return new PersistenceError(`${action}: ${error.message}`, { code: error.code, hint: error.hint });
}

@Injectable()
export class SupabaseCatalogRepository extends CatalogRepository {
  private readonly logger = new Logger(SupabaseCatalogRepository.name);

  constructor(private readonly supabaseService: SupabaseService) {
    super();
  }

  private getSupabaseClient(): SupabaseClient {
    return this.supabaseService.getServiceClient();
  }

  async findProducts(query: ProductQuery): Promise<CatalogProduct[]> {
    const supabase = this.getSupabaseClient();
    const missing = query.force ? undefined : query.missing;

    // Anti-joins go through an embedded relation filtered to null.
    let columns = PRODUCT_COLUMNS;
    if (missing === 'images') columns += ', ProductImages!left(Id)';
    if (missing === 'details') columns += ', ProductDetailScrapes!left(Id)';
    if (missing === 'listing') columns += ', MarketplaceListings!left(Id)';

    let builder = supabase
      .from('Products')
      .select(columns)
      .eq('IsActive', true)
      .neq('Code', '');
    if (query.eligibleOnly) builder = builder.eq('IsEligible', true);

    switch (missing) {
      case 'specs':
        builder = builder.or('Specs.is.null,Specs.eq.{}');
        break;
      case 'content':
        builder = builder.or('SeoTitle.is.null,SeoTitle.eq.,SeoDescription.is.null,SeoDescription.eq.');
        break;
      case 'gtin':
        builder = builder.is('Gtin', null).or(`GtinSource.is.null,GtinSource.neq.${GTIN_NOT_FOUND}`);
        break;
      case 'images':
        builder = builder.is('ProductImages', null);
        break;
      case 'details':
        builder = builder.is('ProductDetailScrapes', null);
        break;
      case 'listing':
        builder = builder.is('MarketplaceListings', null);
        break;
      default:
        break;
    }

    const { data, error } = await builder
      .order('Code', { ascending: true })
      .limit(query.limit)
      .returns<CatalogProduct[]>();
    if (error) {
      this.logger.error(`Error selecting products (missing=${missing ?? 'none'}): ${error.message}`);
      throw persistenceError('Could not select products', error);
    }
    return data ?? [];
  }

  async findProductById(id: string): Promise<CatalogProduct | null> {
    const { data, error } = await this.getSupabaseClient()
      .from('Products')
      .select(PRODUCT_COLUMNS)
      .eq('Id', id)
      .maybeSingle();
    if (error) throw persistenceError(`Could not load product ${id}`, error);
    const product: CatalogProduct | null = data;
    return product;
  }

  async updateProduct(id: string, patch: ProductPatch): Promise<void> {
    const { error } = await this.getSupabaseClient()
      .from('Products')
      .update({ ...patch, UpdatedAt: new Date().toISOString() })
      .eq('Id', id);
    if (error) {
      this.logger.error(`Error updating product ${id}: ${error.message}`);
      throw persistenceError(`Could not update product ${id}`, error);
    }
  }

  async findLatestScrape(productId: string): Promise<DetailScrapeRecord | null> {
    const { data, error } = await this.getSupabaseClient()
      .from('ProductDetailScrapes')
      .select('*')
      .eq('ProductId', productId)
      .order('CreatedAt', { ascending: false })
      .limit(1)
      .maybeSingle();
    if (error) throw persistenceError(`Could not load scrape for product ${productId}`, error);
    const scrape: DetailScrapeRecord | null = data;
    return scrape;
  }

  async insertScrape(record: NewDetailScrape): Promise<DetailScrapeRecord> {
    const { data, error } = await this.getSupabaseClient()
      .from('ProductDetailScrapes')
      .insert(record)
      .select()
      .single();
    if (error) throw persistenceError(`Could not store scrape for product ${record.ProductId}`, error);
    const scrape: DetailScrapeRecord = data;
    return scrape;
  }

  async findImages(productId: string): Promise<ProductImageRecord[]> {
    const { data, error } = await this.getSupabaseClient()
      .from('ProductImages')
      .select('*')
      .eq('ProductId', productId)
      .order('SortOrder', { ascending: true });
    if (error) throw persistenceError(`Could not load images for product ${productId}`, error);
    const images: ProductImageRecord[] = data ?? [];
    return images;
  }

  /**
   * Inserts the new set first and only then deletes the previous rows by Id,
   * so a failed write never leaves the product without images.
   */
  async replaceImages(productId: string, images: NewProductImage[]): Promise<ProductImageRecord[]> {
    const supabase = this.getSupabaseClient();
    const previous = await this.findImages(productId);

    const { data, error } = await supabase.from('ProductImages').insert(images).select();
    if (error) throw persistenceError(`Could not store images for product ${productId}`, error);
    const stored: ProductImageRecord[] = data ?? [];

    if (previous.length > 0) {
      const { error: deleteError } = await supabase
        .from('ProductImages')
        .delete()
        .in('Id', previous.map((image) => image.Id));
      if (deleteError) {
        this.logger.error(`Error removing previous images of product ${productId}: ${deleteError.message}`);
        throw persistenceError(`Could not remove previous images for product ${productId}`, deleteError);
      }
    }
    return stored;
  }
}

@Injectable()
export class SupabaseListingRepository extends ListingRepository {
  private readonly logger = new Logger(SupabaseListingRepository.name);

  constructor(private readonly supabaseService: SupabaseService) {
    super();
  }

  async findByStatus(status: ListingStatus, limit: number): Promise<MarketplaceListing[]> {
    const { data, error } = await this.supabaseService
      .getServiceClient()
      .from('MarketplaceListings')
      .select('*')
      .eq('Status', status)
      .order('Id', { ascending: true })
      .limit(limit);
    if (error) throw persistenceError(`Could not select ${status} listings`, error);
    const listings: MarketplaceListing[] = data ?? [];
    return listings;
  }

  async findByProductId(productId: string): Promise<MarketplaceListing | null> {
    const { data, error } = await this.supabaseService
      .getServiceClient()
      .from('MarketplaceListings')
      .select('*')
      .eq('ProductId', productId)
      .maybeSingle();
    if (error) throw persistenceError(`Could not load listing for product ${productId}`, error);
    const listing: MarketplaceListing | null = data;
    return listing;
  }

  async insert(listing: NewListing): Promise<MarketplaceListing> {
    const { data, error } = await this.supabaseService
      .getServiceClient()
      .from('MarketplaceListings')
      .insert(listing)
      .select()
      .single();
    if (error) {
      this.logger.error(`Error creating listing for product ${listing.ProductId}: ${error.message}`);
      throw persistenceError(`Could not create listing for product ${listing.ProductId}`, error);
    }
    const created: MarketplaceListing = data;
    return created;
  }

  async update(listingId: string, update: ListingUpdate): Promise<void> {
    const { error } = await this.supabaseService
      .getServiceClient()
      .from('MarketplaceListings')
      .update(update)
      .eq('Id', listingId);
    if (error) {
      this.logger.error(`Error updating listing ${listingId}: ${error.message}`);
      throw persistenceError(`Could not update listing ${listingId}`, error);
    }
  }
}
