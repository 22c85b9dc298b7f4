import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * 目录业务异常基类
 * 携带稳定的错误代码，由全局 HttpExceptionFilter 渲染成错误响应
 */
export class CatalogException extends HttpException {
  constructor(
    public readonly code: string,
    message: string,
    status: HttpStatus,
    public readonly details?: unknown,
  ) {
    super({ code, message, details }, status);
  }
}

/**
 * 参数非法（如分页参数越界）
 */
export class InvalidArgumentException extends CatalogException {
  constructor(message: string, details?: unknown) {
    super('INVALID_ARGUMENT', message, HttpStatus.BAD_REQUEST, details);
  }
}

export class EntityNotFoundException extends CatalogException {
  constructor(entity: 'Job' | 'Location' | 'Department', id: number) {
    super('NOT_FOUND', `${entity} with ID ${id} was not found.`, HttpStatus.NOT_FOUND);
  }
}

/**
 * 前置条件不满足（引用的地点或部门不存在）
 */
export class FailedPreconditionException extends CatalogException {
  constructor(message: string, details?: unknown) {
    super('FAILED_PRECONDITION', message, HttpStatus.BAD_REQUEST, details);
  }
}

/**
 * 唯一性冲突（部门标题重复）
 */
export class CatalogConflictException extends CatalogException {
  constructor(message: string, details?: unknown) {
    super('CONFLICT', message, HttpStatus.CONFLICT, details);
  }
}
