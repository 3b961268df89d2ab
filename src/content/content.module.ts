import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { GenerationModule } from '../generation/generation.module';
import { ContentEnrichmentService } from './content-enrichment.service';

@Module({
  imports: [CatalogModule, GenerationModule],
  providers: [ContentEnrichmentService],
  exports: [ContentEnrichmentService],
})
export class ContentModule {}
