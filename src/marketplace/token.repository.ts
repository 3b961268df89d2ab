import { RefreshedTokens, TokenRecord } from './marketplace.types';

export abstract class MarketplaceTokenRepository {
  abstract findById(id: string): Promise<TokenRecord | null>;
  abstract findByAccount(accountId: string, isTest: boolean): Promise<TokenRecord | null>;
  /** First test-user record for the marketplace site. */
  abstract findTestAccount(siteId: string): Promise<TokenRecord | null>;
  /**
   * Writes refreshed tokens only if the stored version still equals expectedVersion.
   * Returns null when another actor updated the record first.
   */
  abstract saveRefreshed(id: string, expectedVersion: number, tokens: RefreshedTokens): Promise<TokenRecord | null>;
  abstract markInvalid(id: string, reason: string): Promise<void>;
}
