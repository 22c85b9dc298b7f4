import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment, EnvironmentVariables } from './env.validation';

/**
 * 数据库（PostgREST）连接配置
 */
export interface DatabaseSettings {
  restUrl: string;
  serviceKey: string;
  timeoutMs: number;
  /** 是否在调试日志中打印查询参数 */
  logQueries: boolean;
}

/**
 * 令牌签发配置
 */
export interface JwtSettings {
  secret: string;
  issuer: string;
  audience: string;
}

/**
 * 管理员身份（唯一可登录的账号）
 */
export interface AdminCredentials {
  username: string;
  password: string;
}

const DEFAULT_DATABASE_TIMEOUT_MS = 10000;

/**
 * 应用配置服务
 * 将已验证的环境变量按用途分组，供各模块以显式依赖的方式注入
 */
@Injectable()
export class AppConfigService {
  constructor(private readonly configService: ConfigService<EnvironmentVariables, true>) {}

  get nodeEnv(): Environment {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get isProduction(): boolean {
    return this.nodeEnv === Environment.Production;
  }

  get port(): number {
    return this.configService.get('PORT', { infer: true });
  }

  get database(): DatabaseSettings {
    return {
      // 去掉末尾斜杠，避免拼接出 //jobs
      restUrl: this.configService.get('DATABASE_REST_URL', { infer: true }).replace(/\/+$/, ''),
      serviceKey: this.configService.get('DATABASE_SERVICE_KEY', { infer: true }),
      timeoutMs:
        this.configService.get('DATABASE_TIMEOUT_MS', { infer: true }) ??
        DEFAULT_DATABASE_TIMEOUT_MS,
      logQueries: this.configService.get('DATABASE_LOG_QUERIES', { infer: true }) === 'true',
    };
  }

  get jwt(): JwtSettings {
    return {
      secret: this.configService.get('JWT_SECRET', { infer: true }),
      issuer: this.configService.get('JWT_ISSUER', { infer: true }),
      audience: this.configService.get('JWT_AUDIENCE', { infer: true }),
    };
  }

  get admin(): AdminCredentials {
    return {
      username: this.configService.get('ADMIN_USERNAME', { infer: true }),
      password: this.configService.get('ADMIN_PASSWORD', { infer: true }),
    };
  }
}
