import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { GenerationModule } from '../generation/generation.module';
import { SpecsEnrichmentService } from './specs-enrichment.service';

@Module({
  imports: [CatalogModule, GenerationModule],
  providers: [SpecsEnrichmentService],
  exports: [SpecsEnrichmentService],
})
export class SpecificationsModule {}
