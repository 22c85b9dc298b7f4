import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { createErrorResponse } from '../dto/response.dto';

/**
 * HttpException.getResponse() 返回的对象形态
 * 业务异常会带上 code / details，class-validator 的错误会把 message 设为数组
 */
interface ExceptionResponseBody {
  message?: string | string[];
  code?: string;
  details?: unknown;
  error?: string;
}

function isExceptionResponseBody(value: unknown): value is ExceptionResponseBody {
  return typeof value === 'object' && value !== null;
}

/**
 * HTTP 异常过滤器
 * 统一处理所有 HTTP 异常，返回标准错误响应格式
 *
 * 处理的异常类型：
 * - HttpException：NestJS 内置异常及业务异常（带 code / details）
 * - 其他未捕获异常：统一返回 500 Internal Server Error
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let code = 'INTERNAL_SERVER_ERROR';
    let message = 'Internal server error';
    let details: unknown = undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      code = this.getErrorCodeFromStatus(status);

      if (isExceptionResponseBody(exceptionResponse)) {
        const rawMessage = exceptionResponse.message ?? exception.message;
        code = exceptionResponse.code ?? code;
        details = exceptionResponse.details;

        // 处理 class-validator 的验证错误
        if (Array.isArray(rawMessage)) {
          details = { validationErrors: rawMessage };
          message = 'Validation failed';
        } else {
          message = rawMessage;
        }
      } else {
        message = String(exceptionResponse);
      }
    } else if (exception instanceof Error) {
      message = exception.message || message;
      details = {
        name: exception.name,
        stack: process.env.NODE_ENV === 'development' ? exception.stack : undefined,
      };
    }

    const logLine = `[${request.method}] ${request.url} - ${status} ${code}: ${message}`;
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(logLine, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(logLine);
    }

    const errorResponse = createErrorResponse(code, message, details, request.url);

    response.status(status).json(errorResponse);
  }

  /**
   * 根据 HTTP 状态码生成错误代码
   */
  private getErrorCodeFromStatus(status: number): string {
    const codeMap: Record<number, string> = {
      400: 'BAD_REQUEST',
      401: 'UNAUTHORIZED',
      403: 'FORBIDDEN',
      404: 'NOT_FOUND',
      409: 'CONFLICT',
      422: 'UNPROCESSABLE_ENTITY',
      429: 'TOO_MANY_REQUESTS',
      500: 'INTERNAL_SERVER_ERROR',
      502: 'BAD_GATEWAY',
      503: 'SERVICE_UNAVAILABLE',
      504: 'GATEWAY_TIMEOUT',
    };

    return codeMap[status] || 'UNKNOWN_ERROR';
  }
}
