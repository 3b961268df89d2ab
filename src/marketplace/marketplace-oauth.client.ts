import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { MarketplaceAuthError, toRecoverableError } from '../common/errors';
import { validateResponse } from '../common/json-response';
import { PIPELINE_SETTINGS, PipelineSettings, requireSetting } from '../config/pipeline-settings';
import { TokenResponseDto } from './marketplace.dto';
import { TokenGrant } from './marketplace.types';

export const MARKETPLACE_HTTP = Symbol('MARKETPLACE_HTTP');

/** Exchanges refresh tokens at the marketplace authorization endpoint. */
@Injectable()
export class MarketplaceOAuthClient {
  private readonly logger = new Logger(MarketplaceOAuthClient.name);

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    @Inject(MARKETPLACE_HTTP) private readonly http: AxiosInstance,
  ) {}

  /**
   * A 400 or 401 answer means the grant itself was rejected and raises MarketplaceAuthError.
   * Transport failures and 5xx answers stay recoverable.
   */
  async refresh(refreshToken: string, accountId: string): Promise<TokenGrant> {
    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: requireSetting(this.settings, 'MARKETPLACE_CLIENT_ID'),
      client_secret: requireSetting(this.settings, 'MARKETPLACE_CLIENT_SECRET'),
      refresh_token: refreshToken,
    });

    let data: unknown;
    try {
      const response = await this.http.post<unknown>(`${this.settings.marketplace.baseUrl}/oauth/token`, body, {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
        timeout: this.settings.httpTimeoutMs,
      });
      data = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      if (status === 400 || status === 401) {
        this.logger.warn(`Refresh grant rejected for account ${accountId} (status ${status})`);
        throw new MarketplaceAuthError(`Refresh token rejected for account ${accountId}`, accountId);
      }
      throw toRecoverableError(error, 'Marketplace token refresh') ?? error;
    }

    const token = validateResponse(data, TokenResponseDto, 'Marketplace token refresh');
    return {
      accessToken: token.access_token,
      refreshToken: token.refresh_token,
      expiresIn: token.expires_in,
      userId: token.user_id,
    };
  }
}
