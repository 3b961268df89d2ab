import { CandidateRejectedError } from '../common/errors';
import { findBrand } from '../catalog/product-attributes';
import { CatalogProduct, ListingAttribute, MarketplaceListing, ProductImageRecord } from '../catalog/catalog.types';

/** Title used for every item created against a test account. */
export const SANDBOX_ITEM_TITLE = 'Item de test - No ofertar';

export interface ItemPayload {
  title: string;
  category_id: string;
  price: number;
  currency_id: 'USD';
  available_quantity: number;
  buying_mode: 'buy_it_now';
  listing_type_id: string;
  condition: 'new';
  pictures: Array<{ source: string }>;
  attributes: ListingAttribute[];
}

export interface PayloadInput {
  listing: MarketplaceListing;
  product: CatalogProduct;
  images: ProductImageRecord[];
  sandbox: boolean;
}

/** Throws CandidateRejectedError when the listing lacks a category or a positive price. */
export function buildItemPayload({ listing, product, images, sandbox }: PayloadInput): ItemPayload {
  const price = listing.Price ?? product.Price;
  if (!listing.CategoryId) {
    throw new CandidateRejectedError(`Listing ${listing.Id} has no marketplace category`);
  }
  if (price === null || price <= 0) {
    throw new CandidateRejectedError(`Listing ${listing.Id} has no valid price`);
  }

  const attributes: ListingAttribute[] = [...listing.Attributes];
  const addAttribute = (id: string, value: string | null) => {
    if (value && !attributes.some((a) => a.id === id)) {
      attributes.push({ id, value_name: value });
    }
  };
  addAttribute('BRAND', findBrand(product.Specs));
  addAttribute('MODEL', product.ModelName);
  addAttribute('GTIN', product.Gtin);

  return {
    title: sandbox ? SANDBOX_ITEM_TITLE : (product.SeoTitle ?? product.Description),
    category_id: listing.CategoryId,
    price,
    currency_id: 'USD',
    available_quantity: sandbox ? 1 : Math.max(listing.AvailableQuantity, 0),
    buying_mode: 'buy_it_now',
    listing_type_id: 'gold_special',
    condition: 'new',
    pictures: [...images].sort((a, b) => a.SortOrder - b.SortOrder).map((image) => ({ source: image.Url })),
    attributes,
  };
}

/** Fields the marketplace accepts on an item that already exists. */
export type ItemUpdatePayload = Pick<ItemPayload, 'price' | 'available_quantity' | 'pictures' | 'attributes'>;

export function toItemUpdate({ price, available_quantity, pictures, attributes }: ItemPayload): ItemUpdatePayload {
  return { price, available_quantity, pictures, attributes };
}
