import { Injectable } from '@nestjs/common';
import { BaseRepository, PageResult, PageWindow } from './base.repository';
import { PostgrestService } from '../postgrest.service';
import { LocationRecord, LocationRow } from './location.repository';
import { DepartmentRecord, DepartmentRow } from './department.repository';

/**
 * jobs 表的行，时间列为 ISO 字符串（timestamptz）
 */
export interface JobRow {
  id: number;
  code: string;
  title: string;
  description: string;
  location_id: number;
  department_id: number;
  posted_date: string;
  closing_date: string;
}

/**
 * 带嵌入关联的行（PostgREST 资源嵌入，多对一关系为对象或 null）
 */
interface JobRowWithRelations extends JobRow {
  location: LocationRow | null;
  department: DepartmentRow | null;
}

export interface JobRecord {
  id: number;
  code: string;
  title: string;
  description: string;
  locationId: number;
  departmentId: number;
  postedDate: Date;
  closingDate: Date;
}

/**
 * 职位及其关联的地点、部门
 * 关联缺失（悬空引用）时为 null
 */
export interface JobWithRelations extends JobRecord {
  location: LocationRecord | null;
  department: DepartmentRecord | null;
}

/**
 * 新建职位所需字段，code 与 postedDate 由调用方在创建时生成
 */
export type NewJob = Omit<JobRecord, 'id'>;

/**
 * 全量更新时可替换的字段，code 与 postedDate 不可变
 */
export type JobChanges = Pick<
  JobRecord,
  'title' | 'description' | 'locationId' | 'departmentId' | 'closingDate'
>;

export type JobSortKey = 'postedDate' | 'id';

export interface JobSortOrder {
  key: JobSortKey;
  direction: 'asc' | 'desc';
}

/**
 * 职位检索条件
 */
export interface JobSearchCriteria {
  /** 标题或描述中包含的文本（不区分大小写），已去除首尾空白 */
  text?: string;
  locationId?: number;
  departmentId?: number;
  orderBy: JobSortOrder[];
}

const SORT_COLUMNS: Record<JobSortKey, string> = {
  postedDate: 'posted_date',
  id: 'id',
};

const SELECT_WITH_RELATIONS = '*,location:locations(*),department:departments(*)';

/**
 * 把用户文本转换为 imatch（不区分大小写的正则）的带引号操作数
 *
 * ilike 的操作数里 `*` 一律被 PostgREST 当作通配符，无法按字面匹配，
 * 因此改用正则：先转义全部正则元字符，再按 PostgREST 双引号值的规则转义 `"` 与 `\`
 */
export function toSubstringMatchOperand(text: string): string {
  const regexEscaped = text.replace(/[.*+?^${}()|[\]\\]/g, (ch) => `\\${ch}`);
  return `"${regexEscaped.replace(/["\\]/g, (ch) => `\\${ch}`)}"`;
}

/**
 * 职位 Repository
 *
 * jobs.code 有唯一索引，location_id / department_id 有外键约束
 */
@Injectable()
export class JobRepository extends BaseRepository<JobRow, JobRecord> {
  protected readonly tableName = 'jobs';

  constructor(postgrestService: PostgrestService) {
    super(postgrestService);
  }

  async create(job: NewJob): Promise<JobRecord> {
    const row = await this.insertRow({
      code: job.code,
      title: job.title,
      description: job.description,
      location_id: job.locationId,
      department_id: job.departmentId,
      posted_date: job.postedDate.toISOString(),
      closing_date: job.closingDate.toISOString(),
    });
    return this.toRecord(row);
  }

  async update(id: number, changes: JobChanges): Promise<JobRecord | null> {
    const row = await this.updateRow(id, {
      title: changes.title,
      description: changes.description,
      location_id: changes.locationId,
      department_id: changes.departmentId,
      closing_date: changes.closingDate.toISOString(),
    });
    return row ? this.toRecord(row) : null;
  }

  async findWithRelations(id: number): Promise<JobWithRelations | null> {
    const row = await this.selectOne<JobRowWithRelations>({
      select: SELECT_WITH_RELATIONS,
      id: `eq.${id}`,
    });
    return row ? this.toRecordWithRelations(row) : null;
  }

  /**
   * 按条件检索职位，返回满足条件的总数与当前窗口内的行
   */
  async search(
    criteria: JobSearchCriteria,
    window: PageWindow,
  ): Promise<PageResult<JobWithRelations>> {
    const params: Record<string, string> = {
      select: SELECT_WITH_RELATIONS,
    };

    if (criteria.text) {
      const operand = toSubstringMatchOperand(criteria.text);
      params.or = `(title.imatch.${operand},description.imatch.${operand})`;
    }
    if (criteria.locationId !== undefined) {
      params.location_id = `eq.${criteria.locationId}`;
    }
    if (criteria.departmentId !== undefined) {
      params.department_id = `eq.${criteria.departmentId}`;
    }
    if (criteria.orderBy.length > 0) {
      params.order = criteria.orderBy
        .map((sort) => `${SORT_COLUMNS[sort.key]}.${sort.direction}`)
        .join(',');
    }

    const page = await this.selectPage<JobRowWithRelations>(params, window);
    return {
      total: page.total,
      rows: page.rows.map((row) => this.toRecordWithRelations(row)),
    };
  }

  protected toRecord(row: JobRow): JobRecord {
    return {
      id: row.id,
      code: row.code,
      title: row.title,
      description: row.description,
      locationId: row.location_id,
      departmentId: row.department_id,
      postedDate: new Date(row.posted_date),
      closingDate: new Date(row.closing_date),
    };
  }

  private toRecordWithRelations(row: JobRowWithRelations): JobWithRelations {
    return {
      ...this.toRecord(row),
      location: row.location
        ? {
            id: row.location.id,
            title: row.location.title,
            city: row.location.city,
            state: row.location.state,
            country: row.location.country,
            zip: row.location.zip,
          }
        : null,
      department: row.department ? { id: row.department.id, title: row.department.title } : null,
    };
  }
}
