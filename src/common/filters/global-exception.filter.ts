import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

export interface ErrorResponse {
  statusCode: number;
  message: string;
  error: string;
  timestamp: string;
  path: string;
}

/**
 * body-parser 등 express 미들웨어가 던지는 오류 (status 속성을 가짐)
 */
interface MiddlewareHttpError extends Error {
  status: number;
  expose?: boolean;
}

const ERROR_NAMES: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'Bad Request',
  [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
  [HttpStatus.FORBIDDEN]: 'Forbidden',
  [HttpStatus.NOT_FOUND]: 'Not Found',
  [HttpStatus.PAYLOAD_TOO_LARGE]: 'Payload Too Large',
  [HttpStatus.UNSUPPORTED_MEDIA_TYPE]: 'Unsupported Media Type',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
  [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
  [HttpStatus.BAD_GATEWAY]: 'Bad Gateway',
  [HttpStatus.SERVICE_UNAVAILABLE]: 'Service Unavailable',
};

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const errorResponse = this.buildErrorResponse(exception, request);

    // 로그 기록
    this.logError(exception, request, errorResponse);

    response.status(errorResponse.statusCode).json(errorResponse);
  }

  private buildErrorResponse(
    exception: unknown,
    request: Request,
  ): ErrorResponse {
    const timestamp = new Date().toISOString();
    const path = request.url;

    if (exception instanceof HttpException) {
      return this.handleHttpException(exception, timestamp, path);
    }

    if (this.isMiddlewareHttpError(exception)) {
      return this.handleMiddlewareError(exception, timestamp, path);
    }

    // 알 수 없는 오류는 500으로 처리
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      error: 'Internal Server Error',
      timestamp,
      path,
    };
  }

  private handleHttpException(
    exception: HttpException,
    timestamp: string,
    path: string,
  ): ErrorResponse {
    const status = exception.getStatus();
    const exceptionResponse = exception.getResponse();

    let message = exception.message;
    let error = this.getErrorNameByStatus(status);

    if (typeof exceptionResponse === 'string') {
      message = exceptionResponse;
    } else if (
      typeof exceptionResponse === 'object' &&
      exceptionResponse !== null
    ) {
      const responseMessage =
        'message' in exceptionResponse ? exceptionResponse.message : undefined;
      // ValidationPipe 는 message 를 배열로 반환
      if (Array.isArray(responseMessage)) {
        message = responseMessage.map(String).join(', ');
      } else if (typeof responseMessage === 'string') {
        message = responseMessage;
      }
      if (
        'error' in exceptionResponse &&
        typeof exceptionResponse.error === 'string'
      ) {
        error = exceptionResponse.error;
      }
    }

    return {
      statusCode: status,
      message,
      error,
      timestamp,
      path,
    };
  }

  private handleMiddlewareError(
    exception: MiddlewareHttpError,
    timestamp: string,
    path: string,
  ): ErrorResponse {
    const status = exception.status;

    // 클라이언트 오류만 메시지를 노출
    if (status >= 400 && status < 500) {
      return {
        statusCode: status,
        message: exception.message,
        error: this.getErrorNameByStatus(status),
        timestamp,
        path,
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      error: 'Internal Server Error',
      timestamp,
      path,
    };
  }

  private isMiddlewareHttpError(
    exception: unknown,
  ): exception is MiddlewareHttpError {
    return (
      exception instanceof Error &&
      'status' in exception &&
      typeof exception.status === 'number'
    );
  }

  private getErrorNameByStatus(status: number): string {
    return ERROR_NAMES[status] ?? 'Error';
  }

  private logError(
    exception: unknown,
    request: Request,
    errorResponse: ErrorResponse,
  ): void {
    const { method, url, ip, headers } = request;
    const userAgent = headers['user-agent'] || '';

    const logMessage = `${method} ${url} - ${errorResponse.statusCode} - ${ip} - ${userAgent}`;

    if (errorResponse.statusCode >= 500) {
      // 서버 오류는 ERROR 레벨로 로깅
      this.logger.error(
        `${logMessage} - ${errorResponse.message}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else if (errorResponse.statusCode >= 400) {
      // 클라이언트 오류는 WARN 레벨로 로깅
      this.logger.warn(`${logMessage} - ${errorResponse.message}`);
    }
  }
}
