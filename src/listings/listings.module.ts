import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { MarketplaceModule } from '../marketplace/marketplace.module';
import { CategoryPredictor } from './category-predictor';
import { ListingPreparationService } from './listing-preparation.service';

@Module({
  imports: [CatalogModule, MarketplaceModule],
  providers: [CategoryPredictor, ListingPreparationService],
  exports: [ListingPreparationService],
})
export class ListingsModule {}
