import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { DetailScraper } from './detail-scraper';
import { DetailsEnrichmentService } from './details-enrichment.service';
import { FETCH, FirecrawlDetailScraper } from './firecrawl-detail.scraper';

@Module({
  imports: [CatalogModule],
  providers: [
    { provide: FETCH, useValue: fetch },
    { provide: DetailScraper, useClass: FirecrawlDetailScraper },
    DetailsEnrichmentService,
  ],
  exports: [DetailsEnrichmentService],
})
export class ScrapingModule {}
