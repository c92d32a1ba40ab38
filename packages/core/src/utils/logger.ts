import fs from 'node:fs'
import path from 'node:path'
import type { Logger } from '@gridline/types'
import winston from 'winston'

export interface LoggerOptions {
  /** Minimum level, defaults to LOG_LEVEL or 'info' */
  readonly level?: string
  /** Directory for combined.log and error.log, file logging is off when omitted */
  readonly logDir?: string
  /** Write to the console (default true) */
  readonly console?: boolean
}

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
)

// Define console format for development
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, component, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}] [${String(component)}] ${String(message)}`
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`
    }
    return msg
  })
)

/**
 * Build the winston logger shared by every component of a process
 */
export function createWinstonLogger(options: LoggerOptions = {}): winston.Logger {
  const transports: winston.transport[] = []

  if (options.console !== false) {
    transports.push(new winston.transports.Console({ format: consoleFormat }))
  }

  if (options.logDir) {
    if (!fs.existsSync(options.logDir)) {
      fs.mkdirSync(options.logDir, { recursive: true })
    }
    transports.push(
      new winston.transports.File({
        filename: path.join(options.logDir, 'combined.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5
      }),
      new winston.transports.File({
        filename: path.join(options.logDir, 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5
      })
    )
  }

  return winston.createLogger({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    format: logFormat,
    transports,
    // A logger with no transports makes winston complain on every write
    silent: transports.length === 0
  })
}

/**
 * Component-scoped logger writing through winston
 */
export class WinstonLogger implements Logger {
  private readonly child: winston.Logger

  constructor(component: string, base: winston.Logger = createWinstonLogger()) {
    this.child = base.child({ component })
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.child.log('debug', message, { ...context })
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.child.log('info', message, { ...context })
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.child.log('warn', message, { ...context })
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.child.log('error', message, { ...context })
  }
}

/**
 * No-op logger for testing
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
