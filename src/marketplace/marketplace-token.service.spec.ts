import { Logger } from '@nestjs/common';
import { MarketplaceAuthError, UpstreamTimeoutError } from '../common/errors';
import { createAxiosStub, StubHandler, timeoutError } from '../common/testing/axios-stub';
import { createTestSettings } from '../config/testing/test-settings';
import { MarketplaceOAuthClient } from './marketplace-oauth.client';
import { MarketplaceTokenService } from './marketplace-token.service';
import { FixedClock } from './testing/fixed-clock';
import { buildTokenRecord, InMemoryTokenRepository } from './testing/in-memory-token.repository';

const grant = (accessToken: string) => ({
  status: 200,
  data: { access_token: accessToken, refresh_token: `${accessToken}-refresh`, expires_in: 21600, user_id: 1001 },
});

// Two minutes before expiry, inside the five minute margin.
const NEAR_EXPIRY = new Date('2026-01-01T05:58:00.000Z');

function setup(handler: StubHandler, now: Date = NEAR_EXPIRY, repository = new InMemoryTokenRepository([buildTokenRecord()])) {
  const settings = createTestSettings();
  const { http, requests } = createAxiosStub(handler);
  const service = new MarketplaceTokenService(
    settings,
    repository,
    new MarketplaceOAuthClient(settings, http),
    new FixedClock(now),
  );
  return { service, repository, requests };
}

describe('MarketplaceTokenService', () => {
  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  it('returns the stored token while it is outside the refresh margin', async () => {
    const { service, requests } = setup(() => grant('unused'), new Date('2026-01-01T00:00:00.000Z'));

    const token = await service.getValidToken();

    expect(token.AccessToken).toBe('test-access-token');
    expect(requests).toHaveLength(0);
  });

  it('refreshes once for concurrent callers and stores the new grant', async () => {
    const { service, repository, requests } = setup(() => grant('fresh-access'));

    const [first, second] = await Promise.all([service.getValidToken(), service.getValidToken()]);

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://marketplace.test/oauth/token');
    expect(requests[0].data).toBe(
      'grant_type=refresh_token&client_id=test-client&client_secret=test-secret&refresh_token=test-refresh-token',
    );
    expect(first.AccessToken).toBe('fresh-access');
    expect(second.AccessToken).toBe('fresh-access');
    expect(repository.records.get('token-1')).toMatchObject({
      AccessToken: 'fresh-access',
      RefreshToken: 'fresh-access-refresh',
      ExpiresAt: '2026-01-01T11:58:00.000Z',
      Version: 2,
      Status: 'VALID',
    });
  });

  it('does not refresh again once the new expiry is stored', async () => {
    const { service, requests } = setup(() => grant('fresh-access'), new Date('2026-01-01T12:00:00.000Z'));

    await service.getValidToken();
    const second = await service.getValidToken();

    expect(second.ExpiresAt).toBe('2026-01-01T18:00:00.000Z');

    expect(requests).toHaveLength(1);
  });

  it('marks the record invalid when the refresh grant is rejected', async () => {
    const { service, repository, requests } = setup(() => ({ status: 400, data: { error: 'invalid_grant' } }));

    await expect(service.getValidToken()).rejects.toThrow(MarketplaceAuthError);
    expect(repository.records.get('token-1')).toMatchObject({
      Status: 'INVALID',
      InvalidReason: 'Refresh token rejected for account 1001',
    });

    await expect(service.getValidToken()).rejects.toThrow(
      'Marketplace account 1001 needs re-authorization: Refresh token rejected for account 1001',
    );
    expect(requests).toHaveLength(1);
  });

  it('uses the stored token when another process refreshed first and the grant was already consumed', async () => {
    const repository = new InMemoryTokenRepository([buildTokenRecord()]);
    const { service } = setup(
      () => {
        repository.records.set(
          'token-1',
          buildTokenRecord({ AccessToken: 'other-access', ExpiresAt: '2026-01-01T12:00:00.000Z', Version: 2 }),
        );
        return { status: 400, data: { error: 'invalid_grant' } };
      },
      NEAR_EXPIRY,
      repository,
    );

    const token = await service.getValidToken();

    expect(token.AccessToken).toBe('other-access');
    expect(repository.records.get('token-1')?.Status).toBe('VALID');
  });

  it('re-reads the record when the compare-and-swap write loses', async () => {
    const repository = new InMemoryTokenRepository([buildTokenRecord()]);
    const { service } = setup(
      () => {
        repository.records.set(
          'token-1',
          buildTokenRecord({ AccessToken: 'other-access', ExpiresAt: '2026-01-01T12:00:00.000Z', Version: 2 }),
        );
        return grant('late-access');
      },
      NEAR_EXPIRY,
      repository,
    );

    const token = await service.getValidToken();

    expect(token.AccessToken).toBe('other-access');
    expect(repository.saveAttempts).toBe(1);
    expect(repository.records.get('token-1')?.AccessToken).toBe('other-access');
  });

  it('keeps the record valid when the refresh times out', async () => {
    const { service, repository } = setup((config) => timeoutError(config));

    await expect(service.getValidToken()).rejects.toThrow(UpstreamTimeoutError);
    expect(repository.records.get('token-1')?.Status).toBe('VALID');
  });

  it('raises an auth error when no record exists for the account', async () => {
    const { service } = setup(() => grant('unused'));

    await expect(service.getValidToken({ accountId: '2002' })).rejects.toThrow(
      'No marketplace token stored for account 2002',
    );
  });

  it('refuses sandbox mode without a test account for the site', async () => {
    const { service } = setup(() => grant('unused'));

    await expect(service.getValidToken({ sandbox: true })).rejects.toThrow(
      'No marketplace test account registered for site MEC',
    );
  });

  it('uses the test account in sandbox mode', async () => {
    const repository = new InMemoryTokenRepository([
      buildTokenRecord(),
      buildTokenRecord({ Id: 'token-test', AccountId: '9009', IsTest: true, AccessToken: 'test-user-access' }),
    ]);
    const { service } = setup(() => grant('unused'), new Date('2026-01-01T00:00:00.000Z'), repository);

    const token = await service.getValidToken({ sandbox: true });

    expect(token.AccountId).toBe('9009');
    expect(token.AccessToken).toBe('test-user-access');
  });
});
