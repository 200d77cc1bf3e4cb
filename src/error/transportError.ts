import { DmartError, type DmartErrorOptions } from './dmartError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the backend could not be reached, the request was aborted or timed out,
 * or the response body could not be decoded.
 */
export class TransportError extends DmartError {
  /** TransportError error-name */
  static name = 'TransportError';
  readonly kind = 'transport';

  constructor(message: string, opts: DmartErrorOptions = {}) {
    super({ type: 'transport', code: opts.statusCode ?? 0, message }, opts);
  }
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): TransportError | null {
  return unwrapErrorType(TransportError, error);
}
