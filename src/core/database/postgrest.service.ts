import { Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { HttpClientFactory } from '@core/client-http';
import { AppConfigService } from '@core/config';

/**
 * PostgREST 服务
 * 负责创建访问关系型存储的 HTTP 客户端，所有 Repository 共享同一个客户端
 *
 * 每次数据访问都是一次独立的 HTTP 请求，不持有跨请求的连接或事务
 */
@Injectable()
export class PostgrestService {
  private readonly logger = new Logger(PostgrestService.name);

  private readonly httpClient: AxiosInstance;

  constructor(appConfig: AppConfigService, httpClientFactory: HttpClientFactory) {
    const { restUrl, serviceKey, timeoutMs, logQueries } = appConfig.database;

    this.httpClient = httpClientFactory.createWithBearerAuth(
      {
        baseURL: restUrl,
        timeout: timeoutMs,
        logPrefix: '[PostgREST]',
        verbose: logQueries,
        headers: {
          apikey: serviceKey,
        },
      },
      serviceKey,
    );

    this.logger.log('✅ PostgREST 客户端已初始化');
  }

  getHttpClient(): AxiosInstance {
    return this.httpClient;
  }
}
