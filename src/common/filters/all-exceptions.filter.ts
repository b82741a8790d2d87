import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
  PayloadTooLargeException,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { CandidateError } from '../errors/candidate.error';
import { ErrorResponseDto } from '../dto/error-response.dto';

interface ErrorOutcome {
  status: number;
  body: ErrorResponseDto;
}

/**
 * Writes every failure as `{ error, message, detail?, timestamp }`.
 * Unexpected faults are logged with their stack and reported generically.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger('ExceptionFilter');

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const { status, body } = toErrorOutcome(exception);
    const where = `${request.method} ${request.url}`;

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${body.error} on ${where}: ${exception instanceof Error ? exception.message : String(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${body.error} on ${where}: ${body.message}`);
    }

    response.status(status).json(body);
  }
}

export function toErrorOutcome(exception: unknown): ErrorOutcome {
  const timestamp = new Date().toISOString();

  // Multer's file size limit
  if (exception instanceof PayloadTooLargeException) {
    return toErrorOutcome(CandidateError.uploadTooLarge());
  }

  if (exception instanceof CandidateError) {
    const body: ErrorResponseDto = {
      error: exception.kind,
      message: exception.message,
      timestamp,
    };
    if (exception.detail !== undefined) {
      body.detail = exception.detail;
    }
    return { status: exception.status, body };
  }

  if (exception instanceof HttpException) {
    return {
      status: exception.getStatus(),
      body: {
        error: exception.name.replace(/Exception$/, '') || 'HttpError',
        message: exception.message,
        timestamp,
      },
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: {
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
      timestamp,
    },
  };
}
