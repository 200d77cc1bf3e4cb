import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Raised before dispatch when an endpoint template keeps a `{placeholder}`
 * that none of the operation's parameters filled.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  static name = 'ConstructURLError';
  #url: string;

  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.name = ConstructURLError.name;
    this.#url = url;
  }

  /** Path as far as it could be filled. */
  get url(): string {
    return this.#url;
  }
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}

/**
 * Extract a {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): ConstructURLError | null {
  return unwrapErrorType(ConstructURLError, error);
}
