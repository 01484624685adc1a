import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

export interface ErrorEnvelope {
  statusCode: number;
  timestamp: string;
  path: string;
  message: string;
  error?: string;
}

const hasMessage = (value: object): value is { message: unknown; error?: unknown } => 'message' in value;

/** Maps anything thrown from a route to the JSON error envelope. */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const envelope = this.toEnvelope(exception, request.url);

    const logMessage = `${request.method} ${request.url} - ${envelope.statusCode} - ${envelope.message}`;
    if (envelope.statusCode >= 500) {
      this.logger.error(logMessage, exception instanceof Error ? exception.stack : String(exception));
    } else {
      this.logger.warn(logMessage);
    }

    if (response.headersSent) {
      // A stream already started; the status line is gone.
      response.end();
      return;
    }
    response.status(envelope.statusCode).json(envelope);
  }

  toEnvelope(exception: unknown, path: string): ErrorEnvelope {
    const envelope: ErrorEnvelope = {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      timestamp: new Date().toISOString(),
      path,
      message: 'Internal server error',
    };

    if (!(exception instanceof HttpException)) {
      return envelope;
    }

    envelope.statusCode = exception.getStatus();
    const body = exception.getResponse();
    if (typeof body === 'string') {
      envelope.message = body;
    } else if (typeof body === 'object' && body !== null && hasMessage(body)) {
      // ValidationPipe reports one message per failed constraint.
      envelope.message = Array.isArray(body.message) ? body.message.join(', ') : String(body.message);
      if (typeof body.error === 'string') {
        envelope.error = body.error;
      }
    } else {
      envelope.message = exception.message;
    }
    return envelope;
  }
}
