import { StoreConstraintError } from '@core/database';
import {
  CatalogConflictException,
  FailedPreconditionException,
} from './catalog.exception';

/**
 * 外键列 -> 被引用实体名
 */
const REFERENCED_ENTITIES: Record<string, string> = {
  location_id: 'Location',
  department_id: 'Department',
};

// PostgreSQL 外键失败的 detail，如：Key (location_id)=(7) is not present in table "locations".
const FOREIGN_KEY_DETAIL = /Key \((\w+)\)=\(([^)]*)\) is not present/;

/**
 * 从外键失败的 detail 中还原缺失的引用，无法识别时返回 null
 */
export function describeMissingReference(detail: string | undefined): string | null {
  const match = detail ? FOREIGN_KEY_DETAIL.exec(detail) : null;
  if (!match) {
    return null;
  }
  const entity = REFERENCED_ENTITIES[match[1]];
  return entity ? `${entity} with ID ${match[2]} does not exist.` : null;
}

/**
 * 把存储层的约束错误翻译成目录业务异常
 * 守卫检查通过后并发写入仍可能撞上唯一索引或外键，此时由这里兜底；其它错误原样抛出
 */
export function translateStoreError(error: unknown, conflictMessage: string): never {
  if (error instanceof StoreConstraintError) {
    if (error.kind === 'unique') {
      throw new CatalogConflictException(conflictMessage);
    }
    const reason = describeMissingReference(error.detail);
    if (reason) {
      throw new FailedPreconditionException(reason, { reasons: [reason] });
    }
    throw new FailedPreconditionException('A referenced location or department does not exist.');
  }
  throw error;
}
