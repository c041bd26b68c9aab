import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

type Result<T extends StandardSchemaV1> = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

function settle<T extends StandardSchemaV1>(
  result: Result<T>,
  message: string,
): SafeWrap<ValidationError, StandardSchemaV1.InferOutput<T>> {
  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validation failed with empty results', []), null];
  }

  if (result.issues) {
    return [new ValidationError(message, result.issues), null];
  }

  return [null, result.value];
}

/**
 * Validates `input` against a Standard Schema (zod and friends) and returns the
 * parsed output as a tuple. Schemas that validate asynchronously are awaited.
 *
 * @param message - prefix for the {@link ValidationError} message when the input has issues
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
  message = 'error validating data',
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = await safeWrapAsync(async () => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  return settle<T>(result, message);
}

/**
 * Synchronous {@link validator}. A schema that returns a promise is reported as a
 * {@link ValidationError}, since its result cannot be awaited here.
 */
export function validatorSync<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
  message = 'error validating data',
): SafeWrap<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    return [new ValidationError('error schema validates asynchronously', []), null];
  }

  return settle<T>(result, message);
}
