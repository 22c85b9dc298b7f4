import { ConsoleLogger, Injectable, LogLevel, Scope } from '@nestjs/common';
import { LogSanitizer } from './log-sanitizer.util';

/**
 * 自定义 Logger 服务
 *
 * 继承 NestJS 的 ConsoleLogger，所有日志在输出前经过 LogSanitizer 脱敏，
 * 令牌和密码不会以明文出现在控制台或日志平台中。
 * 不需要修改任何现有代码，所有使用 Logger 的地方都会自动生效。
 */
@Injectable({ scope: Scope.TRANSIENT })
export class CustomLoggerService extends ConsoleLogger {
  protected stringifyMessage(message: unknown, logLevel: LogLevel): string {
    return LogSanitizer.maskSecrets(super.stringifyMessage(message, logLevel));
  }
}
