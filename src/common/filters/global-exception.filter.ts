import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import {
  BaseGameException,
  BoardOutOfBoundsException,
} from '../exceptions/base.exception';
import { LogContext } from '../interfaces/log-context.interface';
import { ErrorResponse } from '../interfaces/shared.interface';
import { LoggerService } from '../services/logger.service';

interface ResolvedError {
  status: number;
  error: ErrorResponse;
}

// Nest 기본 예외(404 라우트, 잘못된 JSON 등)의 message 추출
function messageOf(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === 'string') return body;
  if ('message' in body) {
    const { message } = body;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.join(', ');
  }
  return exception.message;
}

function resolve(exception: unknown): ResolvedError {
  if (exception instanceof BaseGameException) {
    return {
      status: exception.getStatus(),
      error: {
        code: exception.code,
        message: exception.message,
        details: exception.details,
      },
    };
  }

  if (exception instanceof HttpException) {
    return {
      status: exception.getStatus(),
      error: { code: 'HTTP_ERROR', message: messageOf(exception) },
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    error: {
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred',
    },
  };
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: LoggerService) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const { status, error } = resolve(exception);

    const context: LogContext = {
      method: request.method,
      path: request.url,
      statusCode: status,
      errorCode: error.code,
    };

    if (exception instanceof BoardOutOfBoundsException) {
      this.logger.logBoardViolation(
        exception.position,
        exception.stack,
        context,
      );
    } else if (status >= 500) {
      this.logger.logError(exception, context);
    } else {
      this.logger.warn(`Request rejected: ${error.message}`, context);
    }

    response.status(status).json({
      success: false,
      error,
      path: request.url,
      timestamp: new Date().toISOString(),
    });
  }
}
