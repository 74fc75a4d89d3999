import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';
import 'winston-daily-rotate-file';
import * as fs from 'fs';

import { describeError } from '../common/errors';

interface ChannelOptions {
  directory: string;
  filePrefix: string;
  level: string;
  maxFiles: string;
}

export interface ConciergeEvent {
  source: 'query' | 'twilio';
  query: string;
  category: string;
  reply: string;
}

export interface EmailDeliveryEvent {
  recipient: string;
  subject: string;
  success: boolean;
  error?: string;
}

@Injectable()
export class LoggingService implements LoggerService {
  private readonly webhookLogger: winston.Logger;
  private readonly conciergeLogger: winston.Logger;
  private readonly emailLogger: winston.Logger;
  private readonly generalLogger: winston.Logger;
  private readonly useFileLogging: boolean;
  private readonly silent: boolean;
  private readonly logDir = 'logs';

  constructor(private readonly configService: ConfigService) {
    // Use file logging in development, stdout/stderr everywhere else
    const nodeEnv = this.configService.get<string>('NODE_ENV') || 'development';
    this.useFileLogging = nodeEnv === 'development';
    this.silent = nodeEnv === 'test';

    this.webhookLogger = this.createChannel({
      directory: 'webhooks',
      filePrefix: 'webhook',
      level: 'debug',
      maxFiles: '14d',
    });
    this.conciergeLogger = this.createChannel({
      directory: 'concierge',
      filePrefix: 'concierge',
      level: 'debug',
      maxFiles: '14d',
    });
    this.emailLogger = this.createChannel({
      directory: 'email',
      filePrefix: 'email',
      level: 'info',
      maxFiles: '14d',
    });
    this.generalLogger = this.createChannel({
      directory: 'general',
      filePrefix: 'app',
      level: 'info',
      maxFiles: '7d',
    });
  }

  private createChannel(options: ChannelOptions): winston.Logger {
    const commonFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    );

    const consoleFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}`;
      }),
    );

    let transport: winston.transport;
    if (this.useFileLogging) {
      const directory = `${this.logDir}/${options.directory}`;
      if (!fs.existsSync(directory)) {
        fs.mkdirSync(directory, { recursive: true });
      }

      transport = new winston.transports.DailyRotateFile({
        filename: `${directory}/${options.filePrefix}-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: options.maxFiles,
        level: options.level,
      });
    } else {
      transport = new winston.transports.Console({
        format: consoleFormat,
        level: options.level,
      });
    }

    return winston.createLogger({
      level: options.level,
      format: commonFormat,
      transports: [transport],
      silent: this.silent,
    });
  }

  logWebhook(payload: Record<string, unknown>, event: string) {
    this.webhookLogger.info('Webhook received', {
      event,
      payload: JSON.stringify(payload, null, 2),
      timestamp: new Date().toISOString(),
    });
  }

  logWebhookError(error: unknown, payload?: Record<string, unknown>, event?: string) {
    this.webhookLogger.error('Webhook error', {
      event,
      error: describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
      payload: payload ? JSON.stringify(payload, null, 2) : undefined,
      timestamp: new Date().toISOString(),
    });
  }

  logConciergeEvent(event: ConciergeEvent) {
    this.conciergeLogger.info('Query answered', {
      ...event,
      timestamp: new Date().toISOString(),
    });
  }

  logEmailDelivery(event: EmailDeliveryEvent) {
    const level = event.success ? 'info' : 'warn';
    this.emailLogger.log(level, 'Email relay attempt', {
      ...event,
      timestamp: new Date().toISOString(),
    });
  }

  log(message: unknown, context?: string) {
    this.generalLogger.info(this.stringify(message), { context });
  }

  error(message: unknown, trace?: string, context?: string) {
    this.generalLogger.error(this.stringify(message), { trace, context });
  }

  warn(message: unknown, context?: string) {
    this.generalLogger.warn(this.stringify(message), { context });
  }

  debug(message: unknown, context?: string) {
    this.generalLogger.debug(this.stringify(message), { context });
  }

  verbose(message: unknown, context?: string) {
    this.generalLogger.verbose(this.stringify(message), { context });
  }

  private stringify(message: unknown): string {
    return typeof message === 'string' ? message : JSON.stringify(message);
  }
}
