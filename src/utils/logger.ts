import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import path from 'path'

export type Logger = winston.Logger

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const
export type LogLevel = typeof LOG_LEVELS[number]

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack }) => {
    const msg = stack || message
    return `${timestamp} [${level.toUpperCase()}] ${msg}`
  })
)

function consoleFormat(colorize: boolean): winston.Logform.Format {
  const base = [
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.printf(({ level, message, timestamp }) => {
      return `${timestamp} ${level}: ${message}`
    }),
  ]
  return colorize
    ? winston.format.combine(base[0], winston.format.colorize(), base[1])
    : winston.format.combine(...base)
}

/**
 * Create the process logger.
 *
 * Every console level goes to stderr: stdout carries only the report, so it
 * can be redirected to a file without log lines mixed in. Colours are used
 * only when stderr is a terminal. A rotating file transport is added when a
 * log directory is given.
 */
export function createLogger(level: LogLevel = 'info', logDir?: string): Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat(Boolean(process.stderr.isTTY)),
      stderrLevels: [...LOG_LEVELS],
    }),
  ]

  if (logDir) {
    transports.push(new DailyRotateFile({
      dirname: getLogDirectory(logDir),
      filename: 'netsweep-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '10m',
      maxFiles: '7d',
      format: logFormat,
      zippedArchive: true,
    }))
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    exitOnError: false,
  })
}

/**
 * Logger that drops everything, for library callers that pass none
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console()],
  })
}

/**
 * Get the default log directory path
 */
export function getLogDirectory(customDir?: string): string {
  if (customDir) {
    return path.resolve(customDir)
  }
  return path.resolve(process.cwd(), 'logs')
}
