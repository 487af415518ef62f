import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Application crash
 * - error (50): Error messages
 * - warn (40): Warning messages
 * - info (30): General informational messages (default)
 * - debug (20): Debug messages, one line per outgoing request
 * - trace (10): Very detailed trace messages
 */

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

type LogLevel = (typeof LOG_LEVELS)[number]

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && (LOG_LEVELS as readonly string[]).includes(value)

export function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  if (isLogLevel(env.LOG_LEVEL)) {
    return env.LOG_LEVEL
  }

  // Test runs stay quiet unless LOG_LEVEL asks otherwise
  return env.VITEST ? 'silent' : 'info'
}

const baseLogger = pino({
  level: resolveLogLevel(process.env),
  // Pretty output only makes sense on a terminal; pipes get JSON lines
  transport: process.stderr.isTTY
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
          messageFormat: '{if context}[{context}] {end}{msg}',
          customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
        }
      }
    : undefined
})

type LogMethod = (msgOrObj: unknown, ...args: unknown[]) => void

type Logger = {
  fatal: LogMethod
  error: LogMethod
  warn: LogMethod
  info: LogMethod
  debug: LogMethod
  trace: LogMethod
  child: (bindings: pino.Bindings) => Logger
  isLevelEnabled: (level: LogLevel) => boolean
}

// pino children copy the level when created, so setLogLevel updates each one
const contextLoggers = new Set<pino.Logger>([baseLogger])

const formatArg = (arg: unknown): string => {
  if (arg instanceof Error) {
    return arg.message
  }

  return typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
}

/**
 * Wrapper to make logger more flexible with arguments
 */
const createLoggerWrapper = (logger: pino.Logger): Logger => {
  contextLoggers.add(logger)

  const wrap = (level: Exclude<LogLevel, 'silent'>): LogMethod => {
    return (msgOrObj: unknown, ...args: unknown[]) => {
      const head = typeof msgOrObj === 'string' ? msgOrObj : formatArg(msgOrObj)
      const message = [head, ...args.map(formatArg)].join(' ')
      logger[level](message)
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: (bindings: pino.Bindings) => createLoggerWrapper(logger.child(bindings)),
    isLevelEnabled: (level: LogLevel) => logger.isLevelEnabled(level)
  }
}

/**
 * Create a child logger with a specific context. Every module logs through
 * one; set the level with `LOG_LEVEL`, e.g.
 * `LOG_LEVEL=debug fauth sign-in --email=user@example.com --password=<password>`.
 *
 * @example
 * ```typescript
 * const transportLog = createLogger('Transport');
 * transportLog.debug('POST accounts:lookup');
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

export function setLogLevel(level: LogLevel): void {
  for (const logger of contextLoggers) {
    logger.level = level
  }
}

export type { Logger, LogLevel }
