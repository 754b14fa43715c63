import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Process cannot continue
 * - error (50): Error messages
 * - warn (40): Emergency escalations, circuit openings
 * - info (30): Session rotations and circuit transitions (default)
 * - debug (20): Per-request pacing decisions
 * - trace (10): Window and reservation bookkeeping
 */

type LogLevel = pino.LevelWithSilent

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some(level => level === value)
}

function resolveLevel(raw: string | undefined): LogLevel {
  const candidate = raw?.trim().toLowerCase() ?? 'info'
  return isLogLevel(candidate) ? candidate : 'info'
}

const initialLevel = resolveLevel(process.env.LOG_LEVEL)

// The pretty transport runs in a worker thread; skip it when nothing is printed or JSON is wanted
const usePretty = initialLevel !== 'silent' && process.env.LOG_FORMAT !== 'json'

const baseLogger = pino({
  level: initialLevel,
  ...(usePretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
            messageFormat: '{if context}[{context}] {end}{msg}',
            customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
          }
        }
      }
    : {})
})

// pino children copy the level when created, so they are tracked for setLogLevel
const contextLoggers = new Set<pino.Logger>()

type LogMethod = (msgOrObj: unknown, ...args: unknown[]) => void

type Logger = {
  fatal: LogMethod
  error: LogMethod
  warn: LogMethod
  info: LogMethod
  debug: LogMethod
  trace: LogMethod
  child: (bindings: pino.Bindings) => Logger
}

function describe(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message
  }
  if (typeof arg === 'object' && arg !== null) {
    return JSON.stringify(arg)
  }
  return String(arg)
}

/**
 * Accepts `log.info('message')`, `log.info('message', data)` and
 * `log.warn('message', error)`. A plain object passed as the second argument
 * becomes structured fields on the record instead of being folded into the text.
 */
const createLoggerWrapper = (logger: pino.Logger): Logger => {
  const wrap = (level: pino.Level): LogMethod => {
    return (msgOrObj, ...args) => {
      const message = describe(msgOrObj)
      const [first, ...rest] = args

      if (first === undefined) {
        logger[level](message)
        return
      }

      if (rest.length === 0 && first instanceof Error) {
        logger[level]({ err: first }, `${message} ${first.message}`)
        return
      }

      if (rest.length === 0 && typeof first === 'object' && first !== null && !Array.isArray(first)) {
        logger[level](first, message)
        return
      }

      logger[level]([message, ...args.map(describe)].join(' '))
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: (bindings: pino.Bindings) => createLoggerWrapper(logger.child(bindings))
  }
}

/**
 * Process-wide logger.
 *
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Governor ready');
 * log.debug('Pacing decision', { domain: 'kenney.nl', waitMs: 2400 });
 * log.error('Config rejected:', error);
 * ```
 *
 * `LOG_LEVEL=debug` shows per-request pacing, `LOG_FORMAT=json` disables pretty printing.
 */
export const log = createLoggerWrapper(baseLogger)

/**
 * Child logger tagged with a component name, e.g. `createLogger('PacingEngine')`.
 */
export function createLogger(context: string): Logger {
  const child = baseLogger.child({ context })
  contextLoggers.add(child)
  return createLoggerWrapper(child)
}

/**
 * Applies to the base logger and every context logger created so far.
 */
export function setLogLevel(level: LogLevel): void {
  baseLogger.level = level
  for (const child of contextLoggers) {
    child.level = level
  }
}

export function getLogLevel(): string {
  return baseLogger.level
}

export type { Logger, LogLevel }
