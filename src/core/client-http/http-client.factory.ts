import { Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance, InternalAxiosRequestConfig, AxiosResponse } from 'axios';

/**
 * HTTP 客户端配置选项
 */
export interface HttpClientOptions {
  /** 基础 URL */
  baseURL?: string;
  /** 请求超时时间（毫秒） */
  timeout?: number;
  /** 默认请求头 */
  headers?: Record<string, string>;
  /** 日志前缀，用于区分不同的客户端 */
  logPrefix?: string;
  /** 是否记录查询参数 */
  verbose?: boolean;
}

/**
 * HTTP 客户端工厂
 * 用于创建配置化的 Axios 实例，统一管理拦截器和日志
 */
@Injectable()
export class HttpClientFactory {
  private readonly logger = new Logger(HttpClientFactory.name);

  /**
   * 创建 HTTP 客户端实例
   */
  create(options: HttpClientOptions): AxiosInstance {
    const {
      baseURL,
      timeout = 30000,
      headers = {},
      logPrefix = '[HTTP]',
      verbose = false,
    } = options;

    this.logger.log(`创建 HTTP 客户端: ${logPrefix}`);
    if (baseURL) {
      this.logger.log(`  - Base URL: ${baseURL}`);
    }
    this.logger.log(`  - Timeout: ${timeout}ms`);

    const client = axios.create({
      baseURL,
      timeout,
      headers: {
        'Content-Type': 'application/json',
        ...headers,
      },
    });

    client.interceptors.request.use(
      (config: InternalAxiosRequestConfig) => {
        const method = config.method?.toUpperCase() || 'UNKNOWN';
        const url = config.url || 'unknown';
        this.logger.debug(`${logPrefix} 发送请求: ${method} ${url}`);

        if (verbose && config.params) {
          this.logger.debug(`${logPrefix} 查询参数: ${JSON.stringify(config.params)}`);
        }

        return config;
      },
      (error: unknown) => {
        this.logger.error(`${logPrefix} 请求错误: ${this.describeError(error)}`);
        return Promise.reject(error);
      },
    );

    client.interceptors.response.use(
      (response: AxiosResponse) => response,
      (error: unknown) => {
        if (axios.isAxiosError(error) && error.response) {
          const url = error.config?.url || 'unknown';
          this.logger.warn(
            `${logPrefix} 响应错误 ${error.response.status}: ${url} ${JSON.stringify(error.response.data)}`,
          );
        } else {
          this.logger.error(`${logPrefix} 无响应: ${this.describeError(error)}`);
        }
        return Promise.reject(error);
      },
    );

    return client;
  }

  /**
   * 创建带 Bearer Token 认证的 HTTP 客户端
   * @param token API Token
   */
  createWithBearerAuth(options: HttpClientOptions, token: string): AxiosInstance {
    return this.create({
      ...options,
      headers: {
        ...options.headers,
        Authorization: `Bearer ${token}`,
      },
    });
  }

  private describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
