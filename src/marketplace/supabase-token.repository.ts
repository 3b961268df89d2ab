import { Injectable, Logger } from '@nestjs/common';
import { SupabaseClient } from '@supabase/supabase-js';
import { EncryptionService } from '../common/encryption.service';
import { PersistenceError } from '../common/errors';
import { isRecord } from '../common/json-response';
import { SupabaseService } from '../common/supabase.service';
import { RefreshedTokens, TokenRecord, TokenStatus } from './marketplace.types';
import { MarketplaceTokenRepository } from './token.repository';

interface TokenRow {
  Id: string;
  AccountId: string;
  SiteId: string;
  IsTest: boolean;
  Credentials: string;
  ExpiresAt: string;
  Status: TokenStatus;
  Version: number;
  InvalidReason: string | null;
}

@Injectable()
export class SupabaseTokenRepository extends MarketplaceTokenRepository {
  private readonly logger = new Logger(SupabaseTokenRepository.name);

  constructor(
    private readonly supabaseService: SupabaseService,
    private readonly encryptionService: EncryptionService,
  ) {
    super();
  }

  private getSupabaseClient(): SupabaseClient {
    return this.supabaseService.getServiceClient();
  }

  async findById(id: string): Promise<TokenRecord | null> {
    const { data, error } = await this.getSupabaseClient().from('MarketplaceTokens').select('*').eq('Id', id).maybeSingle();
    if (error) throw new PersistenceError(`Could not load token ${id}: ${error.message}`);
    const row: TokenRow | null = data;
    return row ? this.mapRowToRecord(row) : null;
  }

  async findByAccount(accountId: string, isTest: boolean): Promise<TokenRecord | null> {
    const { data, error } = await this.getSupabaseClient()
      .from('MarketplaceTokens')
      .select('*')
      .eq('AccountId', accountId)
      .eq('IsTest', isTest)
      .maybeSingle();
    if (error) throw new PersistenceError(`Could not load token for account ${accountId}: ${error.message}`);
    const row: TokenRow | null = data;
    return row ? this.mapRowToRecord(row) : null;
  }

  async findTestAccount(siteId: string): Promise<TokenRecord | null> {
    const { data, error } = await this.getSupabaseClient()
      .from('MarketplaceTokens')
      .select('*')
      .eq('SiteId', siteId)
      .eq('IsTest', true)
      .order('Id', { ascending: true })
      .limit(1)
      .maybeSingle();
    if (error) throw new PersistenceError(`Could not load test account for site ${siteId}: ${error.message}`);
    const row: TokenRow | null = data;
    return row ? this.mapRowToRecord(row) : null;
  }

  async saveRefreshed(id: string, expectedVersion: number, tokens: RefreshedTokens): Promise<TokenRecord | null> {
    const { data, error } = await this.getSupabaseClient()
      .from('MarketplaceTokens')
      .update({
        Credentials: this.encryptionService.encrypt({
          accessToken: tokens.AccessToken,
          refreshToken: tokens.RefreshToken,
        }),
        ExpiresAt: tokens.ExpiresAt,
        Status: 'VALID',
        InvalidReason: null,
        Version: expectedVersion + 1,
        UpdatedAt: new Date().toISOString(),
      })
      .eq('Id', id)
      .eq('Version', expectedVersion)
      .select('*');
    if (error) throw new PersistenceError(`Could not store refreshed token ${id}: ${error.message}`);

    const rows: TokenRow[] = data ?? [];
    if (rows.length === 0) {
      this.logger.warn(`Token ${id} changed since version ${expectedVersion}; refresh not stored`);
      return null;
    }
    return this.mapRowToRecord(rows[0]);
  }

  async markInvalid(id: string, reason: string): Promise<void> {
    const { error } = await this.getSupabaseClient()
      .from('MarketplaceTokens')
      .update({ Status: 'INVALID', InvalidReason: reason, UpdatedAt: new Date().toISOString() })
      .eq('Id', id);
    if (error) throw new PersistenceError(`Could not invalidate token ${id}: ${error.message}`);
  }

  private mapRowToRecord(row: TokenRow): TokenRecord {
    const credentials = this.encryptionService.decrypt(row.Credentials);
    if (
      !isRecord(credentials) ||
      typeof credentials.accessToken !== 'string' ||
      typeof credentials.refreshToken !== 'string'
    ) {
      throw new PersistenceError(`Token ${row.Id} has malformed credentials`);
    }
    return {
      Id: row.Id,
      AccountId: row.AccountId,
      SiteId: row.SiteId,
      IsTest: row.IsTest,
      AccessToken: credentials.accessToken,
      RefreshToken: credentials.refreshToken,
      ExpiresAt: row.ExpiresAt,
      Status: row.Status,
      Version: row.Version,
      InvalidReason: row.InvalidReason,
    };
  }
}
