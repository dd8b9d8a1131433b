import { HTTPError, RequestError } from 'got';

/**
 * A job that cannot start: unknown platform, bad start URL, unknown mode.
 * Raised before any network or filesystem access.
 */
export class ConfigurationError extends Error {
  readonly name = 'ConfigurationError';
}

/**
 * Timeout, non-2xx status or connection failure for one page or asset.
 * The crawler recovers from these per unit.
 */
export class TransportError extends Error {
  readonly name = 'TransportError';

  constructor(
    public readonly url: string,
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
  }
}

export function toTransportError(url: string, err: unknown): TransportError {
  if (err instanceof TransportError) return err;
  if (err instanceof HTTPError) {
    return new TransportError(url, `HTTP ${err.response.statusCode}`, err.response.statusCode);
  }
  if (err instanceof RequestError) {
    return new TransportError(url, err.code ? `${err.code}: ${err.message}` : err.message);
  }
  return new TransportError(url, err instanceof Error ? err.message : String(err));
}
