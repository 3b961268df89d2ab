export type TokenStatus = 'VALID' | 'INVALID';

/** OAuth state for one marketplace account (`MarketplaceTokens`). Tokens are decrypted on read. */
export interface TokenRecord {
  Id: string;
  AccountId: string;
  SiteId: string;
  /** Marketplace test user rather than a production seller. */
  IsTest: boolean;
  AccessToken: string;
  RefreshToken: string;
  ExpiresAt: string;
  Status: TokenStatus;
  /** Bumped on every write; refreshes compare-and-swap on it. */
  Version: number;
  InvalidReason: string | null;
}

export interface RefreshedTokens {
  AccessToken: string;
  RefreshToken: string;
  ExpiresAt: string;
}

export interface TokenGrant {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
  userId: string;
}

export interface MarketplaceUser {
  id: string;
  nickname: string;
  siteId: string | null;
}

export abstract class Clock {
  abstract now(): Date;
}

export class SystemClock extends Clock {
  now(): Date {
    return new Date();
  }
}
