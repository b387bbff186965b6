import {
  ErrorCode,
  ErrorSeverity,
  ERROR_SEVERITY_MAP,
  ERROR_MESSAGES,
} from './error-codes';

/**
 * Module an error originated in
 */
export type ErrorModule =
  | 'lib'
  | 'lib/config'
  | 'lib/indicators'
  | 'lib/engine'
  | 'lib/backtest'
  | 'lib/db'
  | 'scripts';

/**
 * Where an error was raised and how it travelled
 */
export interface ErrorContext {
  module: ErrorModule;
  function: string;
  /** Propagation path, origin first */
  path: string[];
  timestamp: number;
  extra?: Record<string, unknown>;
}

export interface EngineErrorOptions {
  code: ErrorCode;
  /** Falls back to the code's default message */
  message?: string;
  context?: Partial<ErrorContext>;
  cause?: Error;
  /** Falls back to the code's default severity */
  severity?: ErrorSeverity;
}

/**
 * Project error type.
 *
 * @example
 * ```typescript
 * throw new EngineError({
 *   code: ErrorCode.REPLAY_DUPLICATE_TIMESTAMP,
 *   context: { module: 'lib/backtest', function: 'validateCandleSequence', extra: { index } },
 * });
 *
 * // normalise anything caught, keeping an EngineError as it is
 * catch (e) {
 *   throw EngineError.from(e, { module: 'scripts', function: 'main' });
 * }
 * ```
 */
export class EngineError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  override readonly cause?: Error;

  constructor(options: EngineErrorOptions) {
    const message = options.message ?? ERROR_MESSAGES[options.code];
    super(message);

    this.name = 'EngineError';
    this.code = options.code;
    this.severity = options.severity ?? ERROR_SEVERITY_MAP[options.code];
    this.cause = options.cause;

    this.context = {
      module: options.context?.module ?? 'lib',
      function: options.context?.function ?? 'unknown',
      path: options.context?.path ?? [],
      timestamp: options.context?.timestamp ?? Date.now(),
      extra: options.context?.extra,
    };

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }

  /** One-line summary */
  toShortString(): string {
    const path = this.context.path.length > 0 ? ` (${this.context.path.join('->')})` : '';
    return `[${this.code}] ${this.message} @ ${this.context.module}.${this.context.function}${path}`;
  }

  /**
   * Normalise anything caught into an EngineError
   */
  static from(
    error: unknown,
    context?: Partial<ErrorContext>,
    code: ErrorCode = ErrorCode.UNKNOWN
  ): EngineError {
    if (error instanceof EngineError) {
      if (context) {
        if (context.module) error.context.module = context.module;
        if (context.function) error.context.function = context.function;
        if (context.extra) error.context.extra = { ...error.context.extra, ...context.extra };
      }
      return error;
    }

    if (error instanceof Error) {
      return new EngineError({
        code,
        message: error.message,
        context,
        cause: error,
      });
    }

    return new EngineError({
      code,
      message: String(error),
      context,
    });
  }
}

export const Errors = {
  config: (message: string, violations: string[], context?: Partial<ErrorContext>) =>
    new EngineError({
      code: ErrorCode.CONFIG_INVALID,
      message,
      context: { module: 'lib/config', ...context, extra: { ...context?.extra, violations } },
    }),

  replay: (
    code: ErrorCode,
    message: string,
    extra?: Record<string, unknown>,
    fn = 'validateCandleSequence',
  ) =>
    new EngineError({
      code,
      message,
      context: { module: 'lib/backtest', function: fn, extra },
    }),

  store: (code: ErrorCode, message: string, context?: Partial<ErrorContext>, cause?: Error) =>
    new EngineError({ code, message, context: { module: 'lib/db', ...context }, cause }),

  unknown: (error: unknown, context?: Partial<ErrorContext>) =>
    EngineError.from(error, context, ErrorCode.UNKNOWN),
};
