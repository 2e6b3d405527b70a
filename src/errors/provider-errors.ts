import { MemoforgeError } from './base';

/**
 * Errors raised by text-generation providers. Subclasses mark the transient
 * failures the retry policy is allowed to repeat.
 */
export class ProviderError extends MemoforgeError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number,
    code: string = 'PROVIDER_ERROR'
  ) {
    super(message, code);
    this.name = 'ProviderError';
  }
}

export class RateLimitedError extends ProviderError {
  constructor(message: string, provider: string, status: number = 429) {
    super(message, provider, status, 'RATE_LIMITED');
    this.name = 'RateLimitedError';
  }
}

export class ServerOverloadedError extends ProviderError {
  constructor(message: string, provider: string, status?: number) {
    super(message, provider, status, 'SERVER_OVERLOADED');
    this.name = 'ServerOverloadedError';
  }
}

export class AuthError extends ProviderError {
  constructor(message: string, provider: string, status?: number) {
    super(message, provider, status, 'AUTH_ERROR');
    this.name = 'AuthError';
  }
}

export function isTransientProviderError(e: unknown): boolean {
  return e instanceof RateLimitedError || e instanceof ServerOverloadedError;
}

function readStatus(e: unknown): number | undefined {
  if (typeof e !== 'object' || e === null || !('status' in e)) return undefined;
  const status = e.status;
  return typeof status === 'number' ? status : undefined;
}

/**
 * Maps an SDK error onto the provider error taxonomy using its HTTP status.
 * Both SDKs in use expose `status` on their API error classes.
 */
export function classifyProviderError(e: unknown, provider: string): ProviderError {
  if (e instanceof ProviderError) return e;

  const message = e instanceof Error ? e.message : String(e);
  const status = readStatus(e);

  if (status === 429) {
    return new RateLimitedError(`${provider} rate limit exceeded: ${message}`, provider, status);
  }
  if (status === 401 || status === 403) {
    return new AuthError(`${provider} authentication failed: ${message}`, provider, status);
  }
  if (status !== undefined && (status === 500 || status === 502 || status === 503 || status === 529)) {
    return new ServerOverloadedError(`${provider} server overloaded (${status}): ${message}`, provider, status);
  }
  if (status !== undefined) {
    return new ProviderError(`${provider} API error (${status}): ${message}`, provider, status);
  }
  return new ProviderError(`${provider} API call failed: ${message}`, provider);
}
