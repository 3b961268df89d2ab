import axios from 'axios';
import { APIConnectionTimeoutError, APIError } from 'groq-sdk';

/**
 * Base class for every failure the pipeline knows how to classify.
 * Anything that is not a ServiceError is treated as a programming error and aborts the batch.
 */
export class ServiceError extends Error {
  constructor(
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing credential or malformed setting. Raised before a batch starts. */
export class ConfigurationError extends ServiceError {}

/** A database statement failed. Counted against the item; only the listing write that follows a marketplace item creation is retried. */
export class PersistenceError extends ServiceError {}

/** Failure scoped to one item or one strategy attempt. */
export class RecoverableError extends ServiceError {}

export class UpstreamTimeoutError extends RecoverableError {}

export class UpstreamServiceError extends RecoverableError {}

export class MalformedResponseError extends RecoverableError {}

/** A generated or fetched candidate failed its acceptance rules. */
export class CandidateRejectedError extends RecoverableError {}

export class MarketplaceApiError extends RecoverableError {
  constructor(
    message: string,
    readonly status: number,
    readonly body: unknown = null,
  ) {
    super(message, { status, body });
  }
}

export class MarketplaceRateLimitError extends MarketplaceApiError {}

/** Access token rejected (401). The API client refreshes once and retries before raising it. */
export class MarketplaceTokenExpiredError extends MarketplaceApiError {}

/** Terminal: the account needs to be re-authorized by a human. */
export class MarketplaceAuthError extends ServiceError {
  constructor(
    message: string,
    readonly accountId: string | null = null,
  ) {
    super(message, { accountId });
  }
}

/**
 * Maps transport failures from axios and groq-sdk into the recoverable class.
 * Returns undefined for anything else so callers can rethrow the original error.
 */
export function toRecoverableError(error: unknown, context: string): RecoverableError | undefined {
  if (error instanceof RecoverableError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new UpstreamTimeoutError(`${context} timed out`, { code: error.code });
    }
    const status = error.response?.status;
    return new UpstreamServiceError(
      status ? `${context} failed with status ${status}` : `${context} failed: ${error.message}`,
      { status: status ?? null, code: error.code ?? null },
    );
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new UpstreamTimeoutError(`${context} timed out`);
  }
  if (error instanceof APIError) {
    return new UpstreamServiceError(`${context} failed: ${error.message}`, { status: error.status ?? null });
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
