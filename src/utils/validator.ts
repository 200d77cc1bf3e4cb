import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)` which may be sync or async.
 * - A throwing validator, sync or async, yields a `ValidationError` with the thrown error as `cause`.
 * - If the result contains `issues`, a `ValidationError` carrying them is returned.
 * - On success, returns `[null, result.value]`, i.e. the schema's output (transforms applied).
 *
 * @param input - The value to validate.
 * @param schema - The StandardSchemaV1 schema used for validation.
 * @param context - Prefix for the error message, naming what was validated.
 */
export async function validator<Output>(
  input: unknown,
  schema: StandardSchemaV1<unknown, Output>,
  context = 'data',
): SafeWrapAsync<ValidationError, Output> {
  type ValidationResult = StandardSchemaV1.Result<Output>;

  const [err, pending] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );

  if (err) {
    return [new ValidationError(`error validating ${context} on validation start`, [], { cause: err }), null];
  }

  const [errAsync, result] = await safeWrapAsync(() => Promise.resolve(pending));
  if (errAsync) {
    return [new ValidationError(`error validating async ${context}`, [], { cause: errAsync }), null];
  }

  if (result.issues) {
    return [new ValidationError(`error validating ${context}`, result.issues), null];
  }

  return [null, result.value];
}
