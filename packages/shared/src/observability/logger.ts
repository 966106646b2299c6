import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  serviceName: string;
  level?: LogLevel;
  prettyPrint?: boolean;
}

export class Logger {
  private logger: pino.Logger;
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig, instance?: pino.Logger) {
    this.config = config;
    this.logger =
      instance ??
      pino({
        level: config.level || 'info',
        transport: config.prettyPrint
          ? { target: 'pino-pretty', options: { colorize: true } }
          : undefined,
        base: {
          service: config.serviceName,
        },
      });
  }

  info(msg: string, context?: Record<string, unknown>): void {
    this.logger.info(context || {}, msg);
  }

  error(msg: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.error(
      {
        ...(context || {}),
        error: error
          ? { message: error.message, stack: error.stack, name: error.name }
          : undefined,
      },
      msg
    );
  }

  warn(msg: string, context?: Record<string, unknown>): void {
    this.logger.warn(context || {}, msg);
  }

  debug(msg: string, context?: Record<string, unknown>): void {
    this.logger.debug(context || {}, msg);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new Logger(this.config, this.logger.child(bindings));
  }
}

export const createLogger = (config: LoggerConfig): Logger => new Logger(config);
