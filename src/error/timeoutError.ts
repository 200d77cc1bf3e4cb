import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Abort reason of a request that outlived the client's `timeout`.
 * Surfaces as the cause of a {@link TransportError}.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';

  constructor(message: string, opts?: ErrorOptions) {
    super(message, opts);
    this.name = TimeoutError.name;
  }
}

/**
 * Type guard for {@link TimeoutError}, following nested causes.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}

/**
 * Extract a {@link TimeoutError} from an unknown error value, following nested causes.
 */
export function getTimeoutError(error: unknown): TimeoutError | null {
  return unwrapErrorType(TimeoutError, error);
}
