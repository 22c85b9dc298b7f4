/**
 * 统一响应数据传输对象
 * 用于标准化所有 API 响应格式
 */

/**
 * 成功响应格式
 */
export interface ApiSuccessResponse<T = unknown> {
  success: true;
  data: T;
  message?: string;
  /** ISO 时间戳 */
  timestamp: string;
}

/**
 * 错误详情
 */
export interface ErrorDetails {
  /** 错误代码，如 NOT_FOUND、FAILED_PRECONDITION */
  code: string;
  message: string;
  details?: unknown;
}

/**
 * 错误响应格式
 */
export interface ApiErrorResponse {
  success: false;
  error: ErrorDetails;
  timestamp: string;
  /** 请求路径 */
  path?: string;
}

/**
 * 统一响应类型（成功或失败）
 */
export type StandardApiResponse<T = unknown> = ApiSuccessResponse<T> | ApiErrorResponse;

/**
 * 创建成功响应的辅助函数
 */
export function createSuccessResponse<T>(data: T, message?: string): ApiSuccessResponse<T> {
  return {
    success: true,
    data,
    ...(message && { message }),
    timestamp: new Date().toISOString(),
  };
}

/**
 * 创建错误响应的辅助函数
 */
export function createErrorResponse(
  code: string,
  message: string,
  details?: unknown,
  path?: string,
): ApiErrorResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && details !== null && { details }),
    },
    timestamp: new Date().toISOString(),
    ...(path && { path }),
  };
}
