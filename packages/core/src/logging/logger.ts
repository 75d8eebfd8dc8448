import winston from 'winston'

export type LogContext = {
  event?: string
  recipient?: string
  [key: string]: unknown
}

export type LoggerOptions = {
  level?: string
  /** Path of a log file written next to console output; omit for console only. */
  file?: string
  silent?: boolean
  /** Set to false to write only to `file`. */
  console?: boolean
  service?: string
}

type LogTransport = InstanceType<typeof winston.transports.Console> | InstanceType<typeof winston.transports.File>

export class Logger {
  private readonly logger: winston.Logger
  private readonly transports: LogTransport[]

  constructor(options: LoggerOptions = {}) {
    const transports: LogTransport[] = []
    if (options.console ?? true) transports.push(new winston.transports.Console())
    if (options.file) transports.push(new winston.transports.File({ filename: options.file }))
    this.transports = transports

    this.logger = winston.createLogger({
      level: options.level ?? process.env.LOG_LEVEL ?? 'info',
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service: options.service ?? 'bulkmail' },
      transports,
    })
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, context)
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, context)
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.logger.error(message, {
      error: error?.message,
      stack: error?.stack,
      ...context,
    })
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, context)
  }

  /** Resolves once every transport has flushed. */
  async close(): Promise<void> {
    const flushed = this.transports.map(
      (transport) => new Promise<void>((resolve) => transport.once('finish', () => resolve()))
    )
    this.logger.end()
    await Promise.all(flushed)
  }
}
