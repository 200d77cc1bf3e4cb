import type { ApiError } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Failure categories surfaced by the client. */
export type ErrorKind = 'unauthenticated' | 'connection' | 'backend_rejected' | 'transport';

/** Options shared by every {@link DmartError} subclass. */
export interface DmartErrorOptions extends ErrorOptions {
  /** HTTP status of the response, `0` when none was received. */
  statusCode?: number;
}

/**
 * Base class of every failure an operation raises.
 *
 * Fields are read-only and the payload is frozen; `kind` discriminates the subclasses.
 */
export abstract class DmartError extends Error {
  /** DmartError error-name */
  static name = 'DmartError';
  /** Failure category */
  abstract readonly kind: ErrorKind;
  /** HTTP status of the response, `0` when none was received */
  readonly statusCode: number;
  /** Error payload, either from the backend or synthesized by the client */
  readonly error: Readonly<ApiError>;

  /** Creates the shared error fields; `message` defaults to the payload message */
  constructor(error: ApiError, opts: DmartErrorOptions = {}) {
    const { statusCode = 0, ...errorOpts } = opts;
    super(error.message, errorOpts);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.error = Object.freeze({ ...error });
  }

  /** Numeric code of the error payload. */
  get code(): number {
    return this.error.code;
  }
}

/**
 * Type guard for {@link DmartError}.
 */
export function isDmartError(error: unknown): error is DmartError {
  return isErrorType(DmartError, error);
}

/**
 * Extract a {@link DmartError} from an unknown error value, following nested causes.
 */
export function getDmartError(error: unknown): DmartError | null {
  return unwrapErrorType(DmartError, error);
}
