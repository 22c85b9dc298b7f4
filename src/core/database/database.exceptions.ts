import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * 存储层约束类型
 * - unique: 唯一索引冲突（PostgreSQL 23505）
 * - foreign_key: 外键约束失败（PostgreSQL 23503）
 */
export type StoreConstraintKind = 'unique' | 'foreign_key';

/**
 * 存储层约束错误
 *
 * 由 Repository 抛出，业务层负责翻译成 Conflict / FailedPrecondition
 */
export class StoreConstraintError extends Error {
  constructor(
    public readonly kind: StoreConstraintKind,
    public readonly table: string,
    message: string,
    public readonly detail?: string,
  ) {
    super(message);
    this.name = 'StoreConstraintError';
  }
}

/**
 * 存储不可用（网络错误、超时、非约束类的数据库错误）
 * 不重试，直接返回给调用方
 */
export class StoreUnavailableException extends HttpException {
  constructor(message = 'Catalog store is unavailable.') {
    super({ code: 'STORE_UNAVAILABLE', message }, HttpStatus.SERVICE_UNAVAILABLE);
  }
}
