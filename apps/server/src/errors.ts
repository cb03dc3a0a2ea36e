/**
 * Error taxonomy of the resolver. Every class carries a stable `code` so callers
 * can switch on it without `instanceof` chains across module boundaries.
 */

export type ResolverErrorCode =
  | 'MALFORMED_ADDRESS'
  | 'STORE_UNAVAILABLE'
  | 'UPSTREAM_TIMEOUT'
  | 'UPSTREAM_TRUNCATED'
  | 'UPSTREAM_INVALID_RESPONSE'
  | 'UPSTREAM_EXHAUSTED'
  | 'CONFIG_INVALID'
  | 'API_ERROR';

export abstract class ResolverError extends Error {
  abstract readonly code: ResolverErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A reverse-lookup name that does not spell out an address. Answered with REFUSED. */
export class MalformedAddressError extends ResolverError {
  readonly code = 'MALFORMED_ADDRESS';

  constructor(readonly input: string, reason: string) {
    super(`Malformed reverse-lookup name "${input}": ${reason}`);
  }
}

/**
 * The only failure the record store adapter ever raises. The underlying storage
 * error, if any, is kept as `cause` for logging.
 */
export class StoreUnavailableError extends ResolverError {
  readonly code = 'STORE_UNAVAILABLE';

  constructor(message = 'Record store unavailable', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UpstreamTimeoutError extends ResolverError {
  readonly code = 'UPSTREAM_TIMEOUT';

  constructor(readonly endpoint: string, readonly timeoutMs: number) {
    super(`Upstream ${endpoint} did not answer within ${timeoutMs}ms`);
  }
}

export class TruncatedResponseError extends ResolverError {
  readonly code = 'UPSTREAM_TRUNCATED';

  constructor(readonly endpoint: string) {
    super(`Upstream ${endpoint} returned a truncated response`);
  }
}

export class InvalidUpstreamResponseError extends ResolverError {
  readonly code = 'UPSTREAM_INVALID_RESPONSE';

  constructor(readonly endpoint: string, reason: string) {
    super(`Upstream ${endpoint} returned an invalid response: ${reason}`);
  }
}

export interface UpstreamAttemptFailure {
  endpoint: string;
  error: Error;
}

export class UpstreamExhaustedError extends ResolverError {
  readonly code = 'UPSTREAM_EXHAUSTED';

  constructor(readonly failures: readonly UpstreamAttemptFailure[]) {
    super(
      failures.length === 0
        ? 'No upstream DNS servers configured'
        : `All upstream DNS servers failed: ${failures.map((f) => `${f.endpoint} (${f.error.message})`).join(', ')}`,
    );
  }
}

export class ConfigError extends ResolverError {
  readonly code = 'CONFIG_INVALID';

  constructor(readonly problems: readonly string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }
}

export class ApiError extends ResolverError {
  readonly code = 'API_ERROR';

  constructor(readonly status: 400 | 404 | 500 | 503, message: string) {
    super(message);
  }
}
