import type { ApiError } from './apiError.js';
import { DmartError } from './dmartError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the backend answers with a status other than 200.
 * Carries the backend's own error payload and the HTTP status code.
 */
export class BackendError extends DmartError {
  /** BackendError error-name */
  static name = 'BackendError';
  readonly kind = 'backend_rejected';

  constructor(statusCode: number, error: ApiError, opts?: ErrorOptions) {
    super(error, { ...opts, statusCode });
  }
}

/**
 * Type guard for {@link BackendError}.
 */
export function isBackendError(error: unknown): error is BackendError {
  return isErrorType(BackendError, error);
}

/**
 * Extract a {@link BackendError} from an unknown error value, following nested causes.
 */
export function getBackendError(error: unknown): BackendError | null {
  return unwrapErrorType(BackendError, error);
}
