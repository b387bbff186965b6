// ============================================================
// Engine Logger
// ============================================================
// Module-scoped console logging with levels and module filters
// ============================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none'

export interface LoggerConfig {
  level: LogLevel
  enabledModules: string[] | '*'  // '*' means all modules
  disabledModules: string[]
  showTimestamp: boolean
  showModule: boolean
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4
}

const PREFIX = '[MTF]'

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value)
}

function levelFromEnv(): LogLevel {
  const raw = typeof process !== 'undefined' ? process.env.LOG_LEVEL?.toLowerCase() : undefined
  return raw && isLogLevel(raw) ? raw : 'info'
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: levelFromEnv(),
  enabledModules: '*',
  disabledModules: [],
  showTimestamp: false,
  showModule: true
}

let globalConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG }

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config }
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig }
}

export function resetLogger(): void {
  globalConfig = { ...DEFAULT_LOGGER_CONFIG }
}

function shouldLog(level: LogLevel, module: string): boolean {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[globalConfig.level]) {
    return false
  }

  if (globalConfig.disabledModules.includes(module)) {
    return false
  }

  if (globalConfig.enabledModules === '*') {
    return true
  }

  return globalConfig.enabledModules.includes(module)
}

export function formatMessage(module: string, message: string, at: Date = new Date()): string {
  const parts: string[] = [PREFIX]

  if (globalConfig.showTimestamp) {
    parts.push(`[${at.toISOString()}]`)
  }

  if (globalConfig.showModule && module) {
    parts.push(`[${module}]`)
  }

  parts.push(message)
  return parts.join(' ')
}

export class Logger {
  private readonly module: string

  constructor(module: string) {
    this.module = module
  }

  get name(): string {
    return this.module
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!shouldLog(level, this.module)) return

    const formatted = formatMessage(this.module, message)

    switch (level) {
      case 'debug':
        console.debug(formatted, ...args)
        break
      case 'info':
        console.log(formatted, ...args)
        break
      case 'warn':
        console.warn(formatted, ...args)
        break
      case 'error':
        console.error(formatted, ...args)
        break
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, ...args)
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, ...args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, ...args)
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, ...args)
  }

  start(message: string, ...args: unknown[]): void {
    this.log('info', `▶ ${message}`, ...args)
  }

  stop(message: string, ...args: unknown[]): void {
    this.log('info', `■ ${message}`, ...args)
  }

  signal(message: string, ...args: unknown[]): void {
    this.log('info', `◆ ${message}`, ...args)
  }

  trade(message: string, ...args: unknown[]): void {
    this.log('info', `$ ${message}`, ...args)
  }
}

// Pre-configured module loggers
export const loggers = {
  engine: new Logger('Engine'),
  mode: new Logger('Mode'),
  scorer: new Logger('Scorer'),
  guard: new Logger('Guard'),
  replay: new Logger('Replay'),
  store: new Logger('Store'),
  config: new Logger('Config'),
  cli: new Logger('CLI')
}

export function createLogger(module: string): Logger {
  return new Logger(module)
}
