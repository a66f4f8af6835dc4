import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readMessage(body: Record<string, unknown>, fallback: string): string | string[] {
  const message = body.message;
  if (typeof message === 'string') {
    return message;
  }
  if (Array.isArray(message) && message.every((item): item is string => typeof item === 'string')) {
    return message;
  }
  return fallback;
}

/**
 * Renders every error as `{ statusCode, message, error, timestamp, path }`.
 * Extra fields an exception carries (ledger violations) are passed through;
 * anything that is not an HttpException becomes a logged 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const response = http.getResponse<Response>();
    const request = http.getRequest<Request>();

    const body = this.toBody(exception);
    body.timestamp = new Date().toISOString();
    body.path = request.url;

    response.status(body.statusCode).json(body);
  }

  private toBody(exception: unknown): HttpExceptionResponse {
    if (!(exception instanceof HttpException)) {
      this.logger.error(
        'Unhandled error',
        exception instanceof Error ? exception.stack : String(exception),
      );
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message: 'Internal server error',
        error: 'Internal Server Error',
      };
    }

    const statusCode = exception.getStatus();
    const raw = exception.getResponse();
    if (!isRecord(raw)) {
      return { statusCode, message: String(raw), error: exception.name };
    }

    const { statusCode: _status, message: _message, error, ...details } = raw;
    return {
      ...details,
      statusCode,
      message: readMessage(raw, exception.message),
      error: typeof error === 'string' ? error : exception.name,
    };
  }
}
