import { Global, Module } from '@nestjs/common';
import { CustomLoggerService } from './custom-logger.service';

/**
 * 日志模块
 *
 * 提供脱敏后的控制台日志（CustomLoggerService），在 main.ts 中通过 app.useLogger 全局启用
 */
@Global()
@Module({
  providers: [CustomLoggerService],
  exports: [CustomLoggerService],
})
export class LoggerModule {}
