import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigurationError, MarketplaceAuthError } from '../common/errors';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline-settings';
import { MarketplaceOAuthClient } from './marketplace-oauth.client';
import { Clock, TokenGrant, TokenRecord } from './marketplace.types';
import { MarketplaceTokenRepository } from './token.repository';

export interface TokenRequest {
  /** Defaults to the configured account. Ignored in sandbox mode. */
  accountId?: string;
  sandbox?: boolean;
}

/**
 * Hands out access tokens that stay valid for at least the refresh margin.
 * Refreshes are single-flight per record inside the process and compare-and-swap on Version across processes.
 */
@Injectable()
export class MarketplaceTokenService {
  private readonly logger = new Logger(MarketplaceTokenService.name);
  private readonly inflight = new Map<string, Promise<TokenRecord>>();

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    private readonly tokens: MarketplaceTokenRepository,
    private readonly oauth: MarketplaceOAuthClient,
    private readonly clock: Clock,
  ) {}

  async getValidToken(request: TokenRequest = {}): Promise<TokenRecord> {
    const record = await this.findRecord(request);
    this.assertValid(record);
    if (!this.isExpiring(record)) {
      return record;
    }
    return this.refreshOnce(record);
  }

  /**
   * Refreshes a token the marketplace rejected before its stored expiry.
   * A newer stored token wins over a second refresh.
   */
  async refreshRejected(rejected: TokenRecord): Promise<TokenRecord> {
    const current = (await this.tokens.findById(rejected.Id)) ?? rejected;
    this.assertValid(current);
    if (current.Version !== rejected.Version && !this.isExpiring(current)) {
      return current;
    }
    this.logger.warn(`Access token for account ${current.AccountId} was rejected before expiry`);
    return this.refreshOnce(current);
  }

  isExpiring(record: TokenRecord): boolean {
    const remainingMs = new Date(record.ExpiresAt).getTime() - this.clock.now().getTime();
    return Number.isNaN(remainingMs) || remainingMs <= this.settings.marketplace.refreshMarginSeconds * 1000;
  }

  private assertValid(record: TokenRecord): void {
    if (record.Status === 'INVALID') {
      throw new MarketplaceAuthError(
        `Marketplace account ${record.AccountId} needs re-authorization: ${record.InvalidReason ?? 'token invalid'}`,
        record.AccountId,
      );
    }
  }

  private async findRecord(request: TokenRequest): Promise<TokenRecord> {
    if (request.sandbox) {
      const siteId = this.settings.marketplace.siteId;
      const record = await this.tokens.findTestAccount(siteId);
      if (!record) {
        // Sandbox runs must never fall back to a production seller.
        throw new MarketplaceAuthError(`No marketplace test account registered for site ${siteId}`);
      }
      return record;
    }

    const accountId = request.accountId ?? this.settings.marketplace.accountId;
    if (!accountId) {
      throw new ConfigurationError('MARKETPLACE_ACCOUNT_ID is not configured');
    }
    const record = await this.tokens.findByAccount(accountId, false);
    if (!record) {
      throw new MarketplaceAuthError(`No marketplace token stored for account ${accountId}`, accountId);
    }
    return record;
  }

  private refreshOnce(record: TokenRecord): Promise<TokenRecord> {
    const pending = this.inflight.get(record.Id);
    if (pending) {
      return pending;
    }
    const refresh = this.refresh(record).finally(() => this.inflight.delete(record.Id));
    this.inflight.set(record.Id, refresh);
    return refresh;
  }

  private async refresh(record: TokenRecord): Promise<TokenRecord> {
    this.logger.log(`Refreshing marketplace token for account ${record.AccountId}`);

    let grant: TokenGrant;
    try {
      grant = await this.oauth.refresh(record.RefreshToken, record.AccountId);
    } catch (error) {
      if (!(error instanceof MarketplaceAuthError)) {
        throw error;
      }
      return this.recoverFromRejectedRefresh(record, error);
    }

    const saved = await this.tokens.saveRefreshed(record.Id, record.Version, {
      AccessToken: grant.accessToken,
      RefreshToken: grant.refreshToken,
      ExpiresAt: new Date(this.clock.now().getTime() + grant.expiresIn * 1000).toISOString(),
    });
    if (saved) {
      return saved;
    }

    const current = await this.tokens.findById(record.Id);
    if (current && this.isUsable(current)) {
      this.logger.log(`Token for account ${record.AccountId} was refreshed concurrently; using stored value`);
      return current;
    }
    throw new MarketplaceAuthError(`Token for account ${record.AccountId} changed during refresh`, record.AccountId);
  }

  /** The grant may have been consumed by another process that refreshed first. */
  private async recoverFromRejectedRefresh(record: TokenRecord, error: MarketplaceAuthError): Promise<TokenRecord> {
    const current = await this.tokens.findById(record.Id);
    if (current && current.Version !== record.Version && this.isUsable(current)) {
      this.logger.log(`Token for account ${record.AccountId} was refreshed elsewhere; using stored value`);
      return current;
    }
    await this.tokens.markInvalid(record.Id, error.message);
    this.logger.error(`Marketplace account ${record.AccountId} marked invalid: ${error.message}`);
    throw new MarketplaceAuthError(
      `Marketplace account ${record.AccountId} needs re-authorization: ${error.message}`,
      record.AccountId,
    );
  }

  private isUsable(record: TokenRecord): boolean {
    return record.Status === 'VALID' && !this.isExpiring(record);
  }
}
