import { Module } from '@nestjs/common';
import axios from 'axios';
import { CatalogModule } from '../catalog/catalog.module';
import { MarketplaceApiClient } from './marketplace-api.client';
import { MARKETPLACE_HTTP, MarketplaceOAuthClient } from './marketplace-oauth.client';
import { MarketplaceTokenService } from './marketplace-token.service';
import { MarketplaceVerificationService } from './marketplace-verification.service';
import { Clock, SystemClock } from './marketplace.types';
import { PublishService } from './publish.service';
import { SupabaseTokenRepository } from './supabase-token.repository';
import { MarketplaceTokenRepository } from './token.repository';

@Module({
  imports: [CatalogModule],
  providers: [
    { provide: MARKETPLACE_HTTP, useFactory: () => axios.create() },
    { provide: MarketplaceTokenRepository, useClass: SupabaseTokenRepository },
    { provide: Clock, useClass: SystemClock },
    MarketplaceOAuthClient,
    MarketplaceTokenService,
    MarketplaceApiClient,
    MarketplaceVerificationService,
    PublishService,
  ],
  exports: [MarketplaceApiClient, MarketplaceTokenService, MarketplaceVerificationService, PublishService],
})
export class MarketplaceModule {}
