/**
 * 响应处理模块统一导出
 *
 * 拦截器和过滤器已在 main.ts 全局注册，所有 HTTP 响应自动统一包装
 */

// DTO - 标准响应格式定义
export * from './dto/response.dto';

// 拦截器 - 全局自动包装响应
export * from './interceptors/response.interceptor';

// 过滤器 - 统一错误处理
export * from './filters/http-exception.filter';
