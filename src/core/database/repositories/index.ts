/**
 * Repository 统一导出
 */

// ==================== 基类 ====================
export { BaseRepository, PageWindow, PageResult } from './base.repository';

// ==================== 地点 ====================
export { LocationRepository, LocationRow, LocationRecord, LocationFields } from './location.repository';

// ==================== 部门 ====================
export { DepartmentRepository, DepartmentRow, DepartmentRecord } from './department.repository';

// ==================== 职位 ====================
export {
  JobRepository,
  JobRow,
  JobRecord,
  JobWithRelations,
  NewJob,
  JobChanges,
  JobSortKey,
  JobSortOrder,
  JobSearchCriteria,
  toSubstringMatchOperand,
} from './job.repository';
