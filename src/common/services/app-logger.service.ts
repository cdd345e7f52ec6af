import { ConsoleLogger, Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { logLevels } from '../constants/app.constants';

export type LogLevelName = (typeof logLevels)[number];

export interface LogContext {
  userId?: number;
  scope?: string;
  [key: string]: string | number | boolean | undefined;
}

@Injectable()
export class AppLoggerService implements LoggerService {
  private readonly logger = new ConsoleLogger();
  private readonly logLevel: LogLevelName;

  constructor(private readonly configService: ConfigService) {
    const configured = this.configService.get<string>('logging.level', 'log');
    this.logLevel = logLevels.find((level) => level === configured) ?? 'log';
  }

  /**
   * Write a 'log' level log.
   */
  log(message: unknown, context?: string | LogContext): void {
    if (!this.shouldLog('log')) return;
    if (typeof context === 'string') {
      this.logger.log(message, context);
    } else {
      this.logger.log(this.formatMessage(String(message), context));
    }
  }

  /**
   * Write an 'error' level log.
   */
  error(message: unknown, trace?: string, context?: string | LogContext): void {
    if (typeof context === 'string') {
      this.logger.error(message, trace, context);
    } else if (trace) {
      this.logger.error(this.formatMessage(String(message), context), trace);
    } else {
      this.logger.error(this.formatMessage(String(message), context));
    }
  }

  /**
   * Write a 'warn' level log.
   */
  warn(message: unknown, context?: string | LogContext): void {
    if (!this.shouldLog('warn')) return;
    if (typeof context === 'string') {
      this.logger.warn(message, context);
    } else {
      this.logger.warn(this.formatMessage(String(message), context));
    }
  }

  /**
   * Write a 'debug' level log.
   */
  debug(message: unknown, context?: string | LogContext): void {
    if (!this.shouldLog('debug')) return;
    if (typeof context === 'string') {
      this.logger.debug(message, context);
    } else {
      this.logger.debug(this.formatMessage(String(message), context));
    }
  }

  /**
   * Write a 'verbose' level log.
   */
  verbose(message: unknown, context?: string | LogContext): void {
    if (!this.shouldLog('verbose')) return;
    if (typeof context === 'string') {
      this.logger.verbose(message, context);
    } else {
      this.logger.verbose(this.formatMessage(String(message), context));
    }
  }

  /**
   * Log security event
   */
  logSecurity(event: string, context?: LogContext): void {
    this.warn(`SECURITY: ${event}`, {
      ...context,
      type: 'security',
    });
  }

  private formatMessage(message: string, context?: LogContext): string {
    if (!context) return message;

    const contextStr = Object.entries(context)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(' ');

    return contextStr ? `${message} | ${contextStr}` : message;
  }

  private shouldLog(level: LogLevelName): boolean {
    return logLevels.indexOf(level) <= logLevels.indexOf(this.logLevel);
  }
}
