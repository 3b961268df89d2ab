import { Module } from '@nestjs/common';
import { ContentEnrichmentService } from '../content/content-enrichment.service';
import { ContentModule } from '../content/content.module';
import { GtinEnrichmentService } from '../gtin/gtin-enrichment.service';
import { GtinModule } from '../gtin/gtin.module';
import { ImageEnrichmentService } from '../images/image-enrichment.service';
import { ImagesModule } from '../images/images.module';
import { ListingPreparationService } from '../listings/listing-preparation.service';
import { ListingsModule } from '../listings/listings.module';
import { MarketplaceModule } from '../marketplace/marketplace.module';
import { PublishService } from '../marketplace/publish.service';
import { NotificationsModule } from '../notifications/notifications.module';
import { sleep } from '../pipeline/batch-runner';
import { EnrichmentStage } from '../pipeline/pipeline.types';
import { DetailsEnrichmentService } from '../scraping/details-enrichment.service';
import { ScrapingModule } from '../scraping/scraping.module';
import { SpecificationsModule } from '../specifications/specifications.module';
import { SpecsEnrichmentService } from '../specifications/specs-enrichment.service';
import { BATCH_SLEEP, ENRICHMENT_STAGES, StageRunnerService } from './stage-runner.service';
import { TasksService } from './tasks.service';

@Module({
  imports: [
    ScrapingModule,
    SpecificationsModule,
    ContentModule,
    GtinModule,
    ImagesModule,
    ListingsModule,
    MarketplaceModule,
    NotificationsModule,
  ],
  providers: [
    {
      provide: ENRICHMENT_STAGES,
      useFactory: (...stages: EnrichmentStage<unknown>[]) => stages,
      inject: [
        DetailsEnrichmentService,
        SpecsEnrichmentService,
        ContentEnrichmentService,
        GtinEnrichmentService,
        ImageEnrichmentService,
        ListingPreparationService,
        PublishService,
      ],
    },
    { provide: BATCH_SLEEP, useValue: sleep },
    StageRunnerService,
    TasksService,
  ],
  exports: [StageRunnerService],
})
export class TasksModule {}
