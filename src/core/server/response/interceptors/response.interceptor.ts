import { Injectable, NestInterceptor, ExecutionContext, CallHandler } from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { createSuccessResponse, ApiSuccessResponse } from '../dto/response.dto';

/**
 * 响应拦截器
 * 自动将 controller 返回的数据包装成统一的成功响应格式
 *
 * 如果 controller 已经返回了 { success: true, data: ... } 格式，会跳过包装
 */
@Injectable()
export class ResponseInterceptor<T> implements NestInterceptor<T, ApiSuccessResponse<unknown>> {
  intercept(
    _context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiSuccessResponse<unknown>> {
    return next.handle().pipe(
      map((data) => {
        if (data === null || data === undefined) {
          return createSuccessResponse(null);
        }

        if (this.isStandardResponse(data)) {
          return data;
        }

        return createSuccessResponse(data);
      }),
    );
  }

  /**
   * 检查是否已经是标准成功响应格式
   */
  private isStandardResponse(data: unknown): data is ApiSuccessResponse<unknown> {
    return (
      typeof data === 'object' &&
      data !== null &&
      'success' in data &&
      data.success === true &&
      'data' in data
    );
  }
}
