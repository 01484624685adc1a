import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';
import 'winston-daily-rotate-file';
import * as fs from 'fs';

export interface TurnLogEntry {
  intent: string;
  state: string;
  answerSource: string;
  slots: object;
  durationMs: number;
}

@Injectable()
export class LoggingService implements LoggerService {
  private readonly conversationLogger: winston.Logger;
  private readonly generalLogger: winston.Logger;
  private readonly useFileLogging: boolean;

  constructor(private readonly configService: ConfigService) {
    // Rotating files in development, stdout/stderr elsewhere
    const nodeEnv = this.configService.get<string>('NODE_ENV') || 'development';
    this.useFileLogging = nodeEnv === 'development';

    const logDir = 'logs';
    if (this.useFileLogging) {
      [logDir, `${logDir}/conversations`, `${logDir}/general`].forEach((dir) => {
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      });
    }

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
        return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}`;
      }),
    );

    this.conversationLogger = winston.createLogger({
      level: 'debug',
      format: commonFormat,
      transports: this.buildTransports(
        `${logDir}/conversations/conversation`,
        '14d',
        'debug',
        consoleFormat,
      ),
    });

    this.generalLogger = winston.createLogger({
      level: 'info',
      format: commonFormat,
      transports: this.buildTransports(`${logDir}/general/app`, '7d', 'info', consoleFormat),
    });
  }

  private buildTransports(
    filePrefix: string,
    maxFiles: string,
    level: string,
    consoleFormat: winston.Logform.Format,
  ): winston.transport[] {
    if (this.useFileLogging) {
      return [
        new winston.transports.DailyRotateFile({
          filename: `${filePrefix}-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles,
          level,
        }),
      ];
    }

    return [new winston.transports.Console({ format: consoleFormat, level })];
  }

  logTurn(sessionId: string, question: string, entry: TurnLogEntry) {
    this.conversationLogger.info('Conversation turn', {
      sessionId,
      question,
      ...entry,
      slots: JSON.stringify(entry.slots),
      timestamp: new Date().toISOString(),
    });
  }

  logSessionEvent(sessionId: string, event: 'created' | 'cleared' | 'deleted' | 'restored') {
    this.conversationLogger.info('Session event', {
      sessionId,
      event,
      timestamp: new Date().toISOString(),
    });
  }

  log(message: unknown, context?: string) {
    this.generalLogger.info(String(message), { context });
  }

  error(message: unknown, trace?: string, context?: string) {
    this.generalLogger.error(String(message), { trace, context });
  }

  warn(message: unknown, context?: string) {
    this.generalLogger.warn(String(message), { context });
  }

  debug(message: unknown, context?: string) {
    this.generalLogger.debug(String(message), { context });
  }

  verbose(message: unknown, context?: string) {
    this.generalLogger.verbose(String(message), { context });
  }
}
