import { Module } from '@nestjs/common';
import { CatalogRepository, ListingRepository } from './catalog.repository';
import { SupabaseCatalogRepository, SupabaseListingRepository } from './supabase-catalog.repository';

@Module({
  providers: [
    { provide: CatalogRepository, useClass: SupabaseCatalogRepository },
    { provide: ListingRepository, useClass: SupabaseListingRepository },
  ],
  exports: [CatalogRepository, ListingRepository],
})
export class CatalogModule {}
