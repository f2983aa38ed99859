import winston from 'winston';

export type LogMeta = Record<string, unknown>;

export class Logger {
  private logger: winston.Logger;
  private readonly service: string;

  constructor(name: string, options?: winston.LoggerOptions) {
    this.service = name;
    this.logger = winston.createLogger({
      level: options?.level || process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service: name },
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
        })
      ],
      ...options
    });
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.logger.error(message, { error: error.message, stack: error.stack, ...meta });
    } else {
      this.logger.error(message, { error, ...meta });
    }
  }

  child(name: string): Logger {
    return new Logger(`${this.service}.${name}`, { level: this.logger.level, silent: this.logger.silent });
  }
}
