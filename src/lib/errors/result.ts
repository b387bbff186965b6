import { EngineError } from './engine-error';
import { ErrorCode } from './error-codes';
import type { ErrorContext } from './engine-error';

export interface Success<T> {
  readonly success: true;
  readonly data: T;
}

export interface Failure<E = EngineError> {
  readonly success: false;
  readonly error: E;
}

/**
 * Explicit success/failure value for operations whose failure is an
 * expected outcome (config validation, file parsing).
 *
 * @example
 * ```typescript
 * const result = validateEngineConfig(raw);
 * if (!result.success) {
 *   logger.error(result.error.toShortString());
 *   return;
 * }
 * run(result.data);
 * ```
 */
export type Result<T, E = EngineError> = Success<T> | Failure<E>;

export const Result = {
  ok: <T>(data: T): Success<T> => ({ success: true, data }),

  err: <E = EngineError>(error: E): Failure<E> => ({ success: false, error }),

  flatMap: <T, U, E>(
    result: Result<T, E>,
    fn: (data: T) => Result<U, E>
  ): Result<U, E> => {
    if (result.success) {
      return fn(result.data);
    }
    return result;
  },

  /** Throws the error of a failed result */
  unwrap: <T, E>(result: Result<T, E>): T => {
    if (result.success) {
      return result.data;
    }
    throw result.error;
  },

  tryCatch: <T>(
    fn: () => T,
    context?: Partial<ErrorContext>,
    code: ErrorCode = ErrorCode.UNKNOWN
  ): Result<T> => {
    try {
      return Result.ok(fn());
    } catch (e) {
      return Result.err(EngineError.from(e, context, code));
    }
  },
};
