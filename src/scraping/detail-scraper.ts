import { NewDetailScrape } from '../catalog/catalog.types';

export type ScrapedDetail = Omit<NewDetailScrape, 'ProductId'>;

/** Fetches a supplier's detail page for a product code. Raises RecoverableError on failure. */
export abstract class DetailScraper {
  abstract fetchDetail(productCode: string): Promise<ScrapedDetail>;
}
