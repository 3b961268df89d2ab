import { Injectable, Logger } from '@nestjs/common';
import { validateResponse } from '../common/json-response';
import { MarketplaceApiClient } from './marketplace-api.client';
import { MarketplaceUserDto } from './marketplace.dto';
import { MarketplaceUser } from './marketplace.types';

/** Confirms that stored credentials can call the marketplace as the expected account. */
@Injectable()
export class MarketplaceVerificationService {
  private readonly logger = new Logger(MarketplaceVerificationService.name);

  constructor(private readonly marketplace: MarketplaceApiClient) {}

  async verify(sandbox: boolean): Promise<MarketplaceUser> {
    const body = await this.marketplace.get<unknown>('users/me', { sandbox });
    const user = validateResponse(body, MarketplaceUserDto, 'Marketplace user lookup');
    this.logger.log(`Authenticated as ${user.nickname} (${user.id})${sandbox ? ' [sandbox]' : ''}`);
    return { id: user.id, nickname: user.nickname, siteId: user.site_id ?? null };
  }
}
