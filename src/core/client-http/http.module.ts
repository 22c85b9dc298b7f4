import { Module } from '@nestjs/common';
import { HttpClientFactory } from './http-client.factory';

/**
 * HTTP 客户端模块
 * 提供 HttpClientFactory，供需要访问外部 HTTP 服务的模块创建客户端
 */
@Module({
  providers: [HttpClientFactory],
  exports: [HttpClientFactory],
})
export class HttpModule {}
