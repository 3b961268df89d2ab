import { Logger } from '@nestjs/common';
import {
  MarketplaceApiError,
  MarketplaceRateLimitError,
  MarketplaceTokenExpiredError,
  UpstreamTimeoutError,
} from '../common/errors';
import { createAxiosStub, StubHandler, timeoutError } from '../common/testing/axios-stub';
import { createTestSettings } from '../config/testing/test-settings';
import { MarketplaceApiClient } from './marketplace-api.client';
import { MarketplaceOAuthClient } from './marketplace-oauth.client';
import { MarketplaceTokenService } from './marketplace-token.service';
import { FixedClock } from './testing/fixed-clock';
import { buildTokenRecord, InMemoryTokenRepository } from './testing/in-memory-token.repository';

const TOKEN_URL = 'https://marketplace.test/oauth/token';

const freshGrant = {
  status: 200,
  data: { access_token: 'fresh-access', refresh_token: 'fresh-refresh', expires_in: 21600, user_id: 1001 },
};

function createClient(handler: StubHandler) {
  const settings = createTestSettings();
  const { http, requests } = createAxiosStub(handler);
  const repository = new InMemoryTokenRepository([buildTokenRecord()]);
  const tokens = new MarketplaceTokenService(
    settings,
    repository,
    new MarketplaceOAuthClient(settings, http),
    new FixedClock(new Date('2026-01-01T00:00:00.000Z')),
  );
  return { client: new MarketplaceApiClient(settings, http, tokens), requests, repository };
}

describe('MarketplaceApiClient', () => {
  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  it('sends the bearer token to the resolved URL', async () => {
    const { client, requests } = createClient(() => ({ status: 200, data: { id: 1001, nickname: 'TESTSELLER' } }));

    await expect(client.get('/users/me')).resolves.toEqual({ id: 1001, nickname: 'TESTSELLER' });
    expect(requests[0].method).toBe('get');
    expect(requests[0].url).toBe('https://marketplace.test/users/me');
    expect(requests[0].headers.Authorization).toBe('Bearer test-access-token');
  });

  it('posts JSON bodies', async () => {
    const { client, requests } = createClient(() => ({ status: 201, data: { id: 'MEC123' } }));

    await client.post('items', { title: 'Mouse Acme M20' });

    expect(requests[0].method).toBe('post');
    expect(requests[0].data).toBe('{"title":"Mouse Acme M20"}');
  });

  it('refreshes the token once and retries when the access token is rejected', async () => {
    const { client, requests, repository } = createClient((config) => {
      if (config.url === TOKEN_URL) return freshGrant;
      return config.headers.Authorization === 'Bearer test-access-token'
        ? { status: 401, data: { message: 'invalid access token' } }
        : { status: 200, data: { id: 1001, nickname: 'TESTSELLER' } };
    });

    await expect(client.get('users/me')).resolves.toEqual({ id: 1001, nickname: 'TESTSELLER' });
    expect(requests.map((r) => r.url)).toEqual([
      'https://marketplace.test/users/me',
      TOKEN_URL,
      'https://marketplace.test/users/me',
    ]);
    expect(requests[2].headers.Authorization).toBe('Bearer fresh-access');
    expect(repository.records.get('token-1')).toMatchObject({ AccessToken: 'fresh-access', Version: 2 });
  });

  it('maps a second 401 to an expired token error', async () => {
    const { client, requests } = createClient((config) =>
      config.url === TOKEN_URL ? freshGrant : { status: 401, data: { message: 'invalid access token' } },
    );

    await expect(client.get('users/me')).rejects.toThrow(MarketplaceTokenExpiredError);
    expect(requests).toHaveLength(3);
  });

  it('maps 429 to a rate limit error', async () => {
    const { client } = createClient(() => ({ status: 429, data: { message: 'too many requests' } }));

    await expect(client.put('items/MEC1', { price: 10 })).rejects.toThrow(MarketplaceRateLimitError);
  });

  it('maps other non-2xx answers to MarketplaceApiError with status and body', async () => {
    const body = { message: 'invalid category', cause: [] };
    const { client } = createClient(() => ({ status: 400, data: body }));

    const error = await client.post('items', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MarketplaceApiError);
    expect(error).toMatchObject({
      message: 'Marketplace POST items failed with status 400: invalid category',
      status: 400,
      body,
    });
  });

  it('maps timeouts to UpstreamTimeoutError', async () => {
    const { client } = createClient((config) => timeoutError(config));

    await expect(client.get('users/me')).rejects.toThrow(UpstreamTimeoutError);
  });
});
