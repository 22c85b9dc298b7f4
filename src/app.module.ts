import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppConfigModule, DatabaseModule, HttpModule, LoggerModule, validate } from './core';
import { AuthModule } from './auth';
import { CatalogModule } from './catalog';

/**
 * 应用根模块
 *
 * 目录结构: src/
 *   ├── core/              - 核心技术层
 *   │   ├── client-http/   - 客户端 HTTP 工具
 *   │   ├── server/        - 响应处理（拦截器、过滤器）
 *   │   ├── config/        - 配置管理（环境变量校验）
 *   │   ├── logger/        - 日志脱敏
 *   │   └── database/      - PostgREST 存储与 Repository
 *   │
 *   ├── auth/              - 认证域（登录、令牌校验、守卫）
 *   └── catalog/           - 职位目录域（职位、地点、部门）
 */
@Module({
  imports: [
    // ==================== 全局配置 ====================
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [`.env.${process.env.NODE_ENV || 'development'}`, '.env'],
      expandVariables: true,
      validate,
    }),
    AppConfigModule,

    // ==================== 核心层 (Core Layer) ====================
    LoggerModule,
    HttpModule,
    DatabaseModule,

    // ==================== 业务域 (Business Domains) ====================
    AuthModule,
    CatalogModule,
  ],
})
export class AppModule {}
