// ============================================================
// Error Handling Module
// ============================================================

import { loggers, type Logger } from '../logger'
import { EngineError, type ErrorContext } from './engine-error'
import { ErrorSeverity } from './error-codes'

export { EngineError, Errors } from './engine-error'
export type {
  ErrorContext,
  ErrorModule,
  EngineErrorOptions,
} from './engine-error'
export { ErrorCode, ErrorSeverity, ERROR_MESSAGES, ERROR_SEVERITY_MAP } from './error-codes'
export { Result } from './result'
export type { Success, Failure } from './result'

/**
 * Normalise and log an error at a level matching its severity.
 * Returns the normalised error so callers can re-throw it.
 */
export function reportError(
  error: unknown,
  context?: Partial<ErrorContext>,
  logger: Logger = loggers.engine
): EngineError {
  const normalized = EngineError.from(error, context)
  const line = normalized.toShortString()

  switch (normalized.severity) {
    case ErrorSeverity.INFO:
      logger.info(line)
      break
    case ErrorSeverity.WARNING:
      logger.warn(line)
      break
    default:
      logger.error(line, normalized.context.extra ?? '')
      break
  }

  return normalized
}
