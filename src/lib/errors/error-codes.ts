/**
 * Error codes for EngineError
 * Grouped by concern: CONFIG_, REPLAY_, STORE_
 */
export enum ErrorCode {
  // ============================================
  // Configuration Errors
  // ============================================
  CONFIG_INVALID = 'CONFIG_INVALID',
  CONFIG_PARSE_FAILED = 'CONFIG_PARSE_FAILED',

  // ============================================
  // Replay Errors
  // ============================================
  REPLAY_NO_DATA = 'REPLAY_NO_DATA',
  REPLAY_NON_MONOTONIC = 'REPLAY_NON_MONOTONIC',
  REPLAY_DUPLICATE_TIMESTAMP = 'REPLAY_DUPLICATE_TIMESTAMP',
  REPLAY_MISALIGNED = 'REPLAY_MISALIGNED',
  REPLAY_INVALID_CANDLE = 'REPLAY_INVALID_CANDLE',

  // ============================================
  // Storage Errors
  // ============================================
  STORE_READ_FAILED = 'STORE_READ_FAILED',
  STORE_WRITE_FAILED = 'STORE_WRITE_FAILED',
  STORE_FORMAT_INVALID = 'STORE_FORMAT_INVALID',

  // ============================================
  // Unknown/Generic Errors
  // ============================================
  UNKNOWN = 'UNKNOWN',
}

export enum ErrorSeverity {
  /** Logged only */
  INFO = 'INFO',
  WARNING = 'WARNING',
  /** The requested operation failed */
  ERROR = 'ERROR',
  /** The run cannot continue */
  CRITICAL = 'CRITICAL',
}

export const ERROR_SEVERITY_MAP: Record<ErrorCode, ErrorSeverity> = {
  // Configuration - the engine refuses to start
  [ErrorCode.CONFIG_INVALID]: ErrorSeverity.CRITICAL,
  [ErrorCode.CONFIG_PARSE_FAILED]: ErrorSeverity.CRITICAL,

  // Replay - fatal for the run
  [ErrorCode.REPLAY_NO_DATA]: ErrorSeverity.ERROR,
  [ErrorCode.REPLAY_NON_MONOTONIC]: ErrorSeverity.CRITICAL,
  [ErrorCode.REPLAY_DUPLICATE_TIMESTAMP]: ErrorSeverity.CRITICAL,
  [ErrorCode.REPLAY_MISALIGNED]: ErrorSeverity.CRITICAL,
  [ErrorCode.REPLAY_INVALID_CANDLE]: ErrorSeverity.CRITICAL,

  // Storage
  [ErrorCode.STORE_READ_FAILED]: ErrorSeverity.ERROR,
  [ErrorCode.STORE_WRITE_FAILED]: ErrorSeverity.ERROR,
  [ErrorCode.STORE_FORMAT_INVALID]: ErrorSeverity.ERROR,

  // Unknown
  [ErrorCode.UNKNOWN]: ErrorSeverity.ERROR,
};

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.CONFIG_INVALID]: 'Invalid engine configuration',
  [ErrorCode.CONFIG_PARSE_FAILED]: 'Configuration could not be parsed',

  [ErrorCode.REPLAY_NO_DATA]: 'No candles to replay',
  [ErrorCode.REPLAY_NON_MONOTONIC]: 'Candle timestamps go backwards',
  [ErrorCode.REPLAY_DUPLICATE_TIMESTAMP]: 'Duplicate candle timestamp',
  [ErrorCode.REPLAY_MISALIGNED]: 'Candle timestamp is not aligned to the minute',
  [ErrorCode.REPLAY_INVALID_CANDLE]: 'Candle has inconsistent OHLC values',

  [ErrorCode.STORE_READ_FAILED]: 'Candle store read failed',
  [ErrorCode.STORE_WRITE_FAILED]: 'Candle store write failed',
  [ErrorCode.STORE_FORMAT_INVALID]: 'Candle file has an unsupported format',

  [ErrorCode.UNKNOWN]: 'Unknown error',
};
