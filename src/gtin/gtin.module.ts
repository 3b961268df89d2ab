import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { GenerationModule } from '../generation/generation.module';
import { GtinEnrichmentService } from './gtin-enrichment.service';

@Module({
  imports: [CatalogModule, GenerationModule],
  providers: [GtinEnrichmentService],
  exports: [GtinEnrichmentService],
})
export class GtinModule {}
