import { DmartError, type DmartErrorOptions } from './dmartError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when an authenticated operation is attempted without a token.
 * Raised before any network access.
 */
export class UnauthenticatedError extends DmartError {
  /** UnauthenticatedError error-name */
  static name = 'UnauthenticatedError';
  readonly kind = 'unauthenticated';

  constructor(opts: Omit<DmartErrorOptions, 'statusCode'> = {}) {
    super({ type: 'login', code: 10, message: 'Not authenticated Dmart user' }, { ...opts, statusCode: 401 });
  }
}

/**
 * Type guard for {@link UnauthenticatedError}.
 */
export function isUnauthenticatedError(error: unknown): error is UnauthenticatedError {
  return isErrorType(UnauthenticatedError, error);
}

/**
 * Extract an {@link UnauthenticatedError} from an unknown error value, following nested causes.
 */
export function getUnauthenticatedError(error: unknown): UnauthenticatedError | null {
  return unwrapErrorType(UnauthenticatedError, error);
}
