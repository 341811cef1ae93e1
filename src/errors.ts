export type ServiceName = 'forwarding' | 'dns';

export interface ProviderErrorOptions {
  service: ServiceName;
  transient: boolean;
  status?: number;
  code?: string;
  cause?: unknown;
}

/**
 * Failure reported by (or while talking to) one of the external services.
 *
 * `transient` errors are eligible for retry; permanent ones fail the phase
 * immediately.
 */
export class ProviderError extends Error {
  readonly service: ServiceName;
  readonly transient: boolean;
  readonly status?: number;
  readonly code?: string;

  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.service = options.service;
    this.transient = options.transient;
    this.status = options.status;
    this.code = options.code;
  }
}

/** HTTP statuses worth retrying: timeouts, rate limits and server errors */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function isTransient(err: unknown): boolean {
  return err instanceof ProviderError && err.transient;
}

/**
 * Wrap an error thrown by `fetch` itself (network failure, abort on timeout)
 * as a transient ProviderError.
 */
export function networkError(service: ServiceName, err: unknown): ProviderError {
  const detail = err instanceof Error ? err.message : String(err);
  const timedOut = err instanceof Error && err.name === 'TimeoutError';
  return new ProviderError(
    timedOut ? `${service} request timed out` : `${service} request failed: ${detail}`,
    { service, transient: true, code: timedOut ? 'timeout' : 'network', cause: err }
  );
}

export class IllegalTransitionError extends Error {
  constructor(
    readonly domain: string,
    readonly from: string,
    readonly to: string
  ) {
    super(`Illegal state transition for ${domain}: ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Gave up after ${attempts} attempt(s): ${detail}`, { cause });
    this.name = 'RetryExhaustedError';
  }
}

export class StateStoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StateStoreError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export class AliasGenerationError extends Error {
  constructor(candidate: string, attempts: number) {
    super(`Could not find a free local-part for "${candidate}" after ${attempts} attempts`);
    this.name = 'AliasGenerationError';
  }
}

/** Message of any thrown value, for logs and error history */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
