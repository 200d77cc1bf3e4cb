import type { ApiError } from './apiError.js';
import { DmartError, type DmartErrorOptions } from './dmartError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when logging in fails: bad credentials, an unreachable or malformed URL,
 * a `failed` envelope or a login response without a token.
 */
export class ConnectionError extends DmartError {
  /** ConnectionError error-name */
  static name = 'ConnectionError';
  readonly kind = 'connection';

  /** Takes the backend's payload when there is one, otherwise builds a `connection` payload */
  constructor(message: string, opts: DmartErrorOptions & { error?: ApiError } = {}) {
    const { error, ...rest } = opts;
    super(error ?? { type: 'connection', code: rest.statusCode ?? 0, message }, rest);
    this.message = message;
  }
}

/**
 * Type guard for {@link ConnectionError}.
 */
export function isConnectionError(error: unknown): error is ConnectionError {
  return isErrorType(ConnectionError, error);
}

/**
 * Extract a {@link ConnectionError} from an unknown error value, following nested causes.
 */
export function getConnectionError(error: unknown): ConnectionError | null {
  return unwrapErrorType(ConnectionError, error);
}
