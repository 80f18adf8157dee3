import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)` which may be sync or async.
 * - If the validation throws, sync or async, the error is wrapped in a `ValidationError`
 *   without issues and returned as `[ValidationError, null]`.
 * - If the validation result contains `issues`, a `ValidationError` carrying them is returned.
 * - On successful validation without issues, returns `[null, result.value]`.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
  message = 'error validating data',
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [err, pending] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  let result: ValidationResult;
  if (pending instanceof Promise) {
    const [errAsync, resultAsync] = await safeWrapAsync(() => pending);
    if (errAsync) {
      return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
    }

    result = resultAsync;
  } else {
    result = pending;
  }

  if (result.issues) {
    return [new ValidationError(message, result.issues), null];
  }

  return [null, result.value];
}
