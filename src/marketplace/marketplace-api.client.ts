import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance, Method } from 'axios';
import {
  MarketplaceApiError,
  MarketplaceRateLimitError,
  MarketplaceTokenExpiredError,
  toRecoverableError,
} from '../common/errors';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline-settings';
import { MARKETPLACE_HTTP } from './marketplace-oauth.client';
import { MarketplaceTokenService, TokenRequest } from './marketplace-token.service';
import { TokenRecord } from './marketplace.types';

/** Marketplace error bodies carry a message and sometimes a list of causes. */
function describeErrorBody(body: unknown): string {
  if (typeof body === 'string') return body.slice(0, 300);
  if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return 'no details';
}

@Injectable()
export class MarketplaceApiClient {
  private readonly logger = new Logger(MarketplaceApiClient.name);

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    @Inject(MARKETPLACE_HTTP) private readonly http: AxiosInstance,
    private readonly tokenService: MarketplaceTokenService,
  ) {}

  get<T>(path: string, token: TokenRequest = {}): Promise<T> {
    return this.request<T>('GET', path, undefined, token);
  }

  post<T>(path: string, body: unknown, token: TokenRequest = {}): Promise<T> {
    return this.request<T>('POST', path, body, token);
  }

  put<T>(path: string, body: unknown, token: TokenRequest = {}): Promise<T> {
    return this.request<T>('PUT', path, body, token);
  }

  /** A 401 triggers one forced token refresh and a single retry. */
  private async request<T>(method: Method, path: string, body: unknown, tokenRequest: TokenRequest): Promise<T> {
    const token = await this.tokenService.getValidToken(tokenRequest);
    try {
      return await this.send<T>(method, path, body, token);
    } catch (error) {
      if (!(error instanceof MarketplaceTokenExpiredError)) throw error;
      this.logger.warn(`Marketplace ${method} ${path} answered 401; refreshing token and retrying once`);
      const refreshed = await this.tokenService.refreshRejected(token);
      return this.send<T>(method, path, body, refreshed);
    }
  }

  private async send<T>(method: Method, path: string, body: unknown, token: TokenRecord): Promise<T> {
    const url = `${this.settings.marketplace.baseUrl}/${path.replace(/^\//, '')}`;
    this.logger.debug(`${method} ${url}`);

    try {
      const response = await this.http.request<T>({
        method,
        url,
        data: body,
        headers: { Authorization: `Bearer ${token.AccessToken}`, 'Content-Type': 'application/json' },
        timeout: this.settings.httpTimeoutMs,
      });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        const { status, data } = error.response;
        const message = `Marketplace ${method} ${path} failed with status ${status}: ${describeErrorBody(data)}`;
        if (status === 401) throw new MarketplaceTokenExpiredError(message, status, data);
        if (status === 429) throw new MarketplaceRateLimitError(message, status, data);
        throw new MarketplaceApiError(message, status, data);
      }
      throw toRecoverableError(error, `Marketplace ${method} ${path}`) ?? error;
    }
  }
}
