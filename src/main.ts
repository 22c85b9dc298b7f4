import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe, VersioningType } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { AppConfigService } from '@core/config';
import { ResponseInterceptor, HttpExceptionFilter } from '@core/server';
import { CustomLoggerService } from '@core/logger';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true, // 缓冲日志直到 Logger 设置完成
  });

  // CustomLoggerService 使用 TRANSIENT 作用域，需要用 resolve() 而非 get()
  const customLogger = await app.resolve(CustomLoggerService);
  app.useLogger(customLogger);

  app.enableCors();

  // /api/v1/...；职位列表接口不带版本号（/api/jobs/list）
  app.setGlobalPrefix('api');
  app.enableVersioning({ type: VersioningType.URI, defaultVersion: '1' });

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  // 全局注册响应拦截器（统一包装所有响应）
  app.useGlobalInterceptors(new ResponseInterceptor());

  // 全局注册异常过滤器（统一处理所有异常）
  app.useGlobalFilters(new HttpExceptionFilter());

  const appConfig = app.get(AppConfigService);

  if (!appConfig.isProduction) {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('Job Catalog API')
        .setVersion('1')
        .addBearerAuth()
        .build(),
    );
    SwaggerModule.setup('docs', app, document);
  }

  const port = appConfig.port;
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log('========================================');
  logger.log(`🚀 服务已启动`);
  logger.log(`📍 监听端口: ${port}`);
  logger.log(`🌍 运行环境: ${appConfig.nodeEnv}`);
  logger.log(`🔗 本地访问: http://localhost:${port}/api/v1`);
  if (!appConfig.isProduction) {
    logger.log(`📖 接口文档: http://localhost:${port}/docs`);
  }
  logger.log('========================================');
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error('服务启动失败', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
