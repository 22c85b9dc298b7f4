/**
 * 核心层 - 统一导出入口
 *
 * 核心层提供技术基础设施（水平分层），包括：
 * - client-http: 客户端 HTTP 工具
 * - server: 服务端响应处理（拦截器、过滤器）
 * - config: 配置管理
 * - logger: 日志（含脱敏）
 * - database: PostgREST 存储访问
 */

// 客户端功能
export * from './client-http';

// 服务端功能
export * from './server';

// 基础设施
export * from './config';
export * from './logger';
export * from './database';
