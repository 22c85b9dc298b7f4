import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsNotEmpty,
  IsNumber,
  IsString,
  IsUrl,
  Min,
  MinLength,
  IsOptional,
  IsIn,
  validateSync,
} from 'class-validator';

/**
 * 环境变量枚举
 */
export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

/**
 * 环境变量配置类
 * 使用 class-validator 装饰器进行验证
 */
export class EnvironmentVariables {
  // ==================== 基础配置 ====================
  @IsEnum(Environment, {
    message: 'NODE_ENV 必须是 development、production 或 test',
  })
  @IsNotEmpty({ message: 'NODE_ENV 环境变量未配置，请在 .env 文件中设置' })
  NODE_ENV!: Environment;

  @IsNumber({}, { message: 'PORT 必须是数字' })
  @Min(1, { message: 'PORT 必须大于 0' })
  @IsNotEmpty({ message: 'PORT 环境变量未配置，请在 .env 文件中设置' })
  PORT!: number;

  // ==================== 数据库 (PostgREST) 配置 ====================
  @IsUrl({ require_tld: false }, { message: 'DATABASE_REST_URL 必须是有效的 URL' })
  @IsNotEmpty({
    message: 'DATABASE_REST_URL 环境变量未配置，请在 .env 文件中设置',
  })
  DATABASE_REST_URL!: string;

  @IsString({ message: 'DATABASE_SERVICE_KEY 必须是字符串' })
  @IsNotEmpty({
    message: 'DATABASE_SERVICE_KEY 环境变量未配置，请在 .env 文件中设置',
  })
  DATABASE_SERVICE_KEY!: string;

  @IsOptional()
  @IsNumber({}, { message: 'DATABASE_TIMEOUT_MS 必须是数字' })
  @Min(1000, { message: 'DATABASE_TIMEOUT_MS 必须大于等于 1000ms' })
  DATABASE_TIMEOUT_MS?: number;

  @IsOptional()
  @IsIn(['true', 'false'], { message: 'DATABASE_LOG_QUERIES 必须是 true 或 false' })
  DATABASE_LOG_QUERIES?: 'true' | 'false';

  // ==================== 令牌签发配置 ====================
  @IsString({ message: 'JWT_SECRET 必须是字符串' })
  @MinLength(32, { message: 'JWT_SECRET 长度至少 32 个字符' })
  @IsNotEmpty({ message: 'JWT_SECRET 环境变量未配置，请在 .env 文件中设置' })
  JWT_SECRET!: string;

  @IsString({ message: 'JWT_ISSUER 必须是字符串' })
  @IsNotEmpty({ message: 'JWT_ISSUER 环境变量未配置，请在 .env 文件中设置' })
  JWT_ISSUER!: string;

  @IsString({ message: 'JWT_AUDIENCE 必须是字符串' })
  @IsNotEmpty({ message: 'JWT_AUDIENCE 环境变量未配置，请在 .env 文件中设置' })
  JWT_AUDIENCE!: string;

  // ==================== 管理员身份 ====================
  @IsString({ message: 'ADMIN_USERNAME 必须是字符串' })
  @IsNotEmpty({ message: 'ADMIN_USERNAME 环境变量未配置，请在 .env 文件中设置' })
  ADMIN_USERNAME!: string;

  @IsString({ message: 'ADMIN_PASSWORD 必须是字符串' })
  @IsNotEmpty({ message: 'ADMIN_PASSWORD 环境变量未配置，请在 .env 文件中设置' })
  ADMIN_PASSWORD!: string;
}

/**
 * 环境变量验证函数
 * 在应用启动时调用，验证所有必需的环境变量
 *
 * @param config - 原始环境变量对象
 * @returns 验证并转换后的环境变量对象
 * @throws 如果验证失败，抛出详细错误信息
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  // enableImplicitConversion: true 自动进行类型转换（如字符串 "3000" -> 数字 3000）
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors
      .map((error) => {
        const constraints = error.constraints ? Object.values(error.constraints) : [];
        return `  - ${error.property}: ${constraints.join(', ')}`;
      })
      .join('\n');

    throw new Error(`\n❌ 环境变量验证失败：\n${errorMessages}\n\n请检查你的 .env 文件配置。`);
  }

  return validatedConfig;
}
