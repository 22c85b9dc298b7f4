import { Injectable } from '@nestjs/common';
import {
  JobRepository,
  JobSearchCriteria,
  JobSortOrder,
  JobWithRelations,
} from '@core/database';
import { InvalidArgumentException } from '../exceptions/catalog.exception';

export const DEFAULT_PAGE_NUMBER = 1;
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

/**
 * 职位列表查询参数
 */
export interface ListJobsQuery {
  /** 标题或描述中包含的文本（不区分大小写） */
  query?: string | null;
  locationId?: number | null;
  departmentId?: number | null;
  pageNumber?: number;
  pageSize?: number;
}

/**
 * 列表项
 * location / department 为关联记录的标题，悬空引用时为 null
 */
export interface JobSummary {
  id: number;
  code: string;
  title: string;
  location: string | null;
  department: string | null;
  postedDate: Date;
  closingDate: Date;
}

export interface JobListResult {
  total: number;
  items: JobSummary[];
}

const JOB_LIST_ORDER: JobSortOrder[] = [
  { key: 'postedDate', direction: 'desc' },
  { key: 'id', direction: 'desc' },
];

/**
 * 目录查询引擎
 *
 * 过滤 -> 计数 -> 排序（postedDate 降序，id 降序）-> 分页
 */
@Injectable()
export class CatalogQueryService {
  constructor(private readonly jobRepository: JobRepository) {}

  async listJobs(request: ListJobsQuery): Promise<JobListResult> {
    const pageNumber = request.pageNumber ?? DEFAULT_PAGE_NUMBER;
    const pageSize = request.pageSize ?? DEFAULT_PAGE_SIZE;
    this.assertPaging(pageNumber, pageSize);

    const text = request.query?.trim();
    const criteria: JobSearchCriteria = {
      text: text ? text : undefined,
      locationId: request.locationId ?? undefined,
      departmentId: request.departmentId ?? undefined,
      orderBy: JOB_LIST_ORDER,
    };

    const offset = (pageNumber - 1) * pageSize;
    if (!Number.isSafeInteger(offset)) {
      // 偏移量超出整数精度，必然越界：只取总数
      const { total } = await this.jobRepository.search(criteria, { offset: 0, limit: 1 });
      return { total, items: [] };
    }

    const page = await this.jobRepository.search(criteria, { offset, limit: pageSize });

    return {
      total: page.total,
      items: page.rows.map((job) => this.toSummary(job)),
    };
  }

  private assertPaging(pageNumber: number, pageSize: number): void {
    if (!Number.isInteger(pageNumber) || pageNumber < 1) {
      throw new InvalidArgumentException('Page number must be an integer of at least 1.', {
        pageNumber,
      });
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new InvalidArgumentException(
        `Page size must be an integer between 1 and ${MAX_PAGE_SIZE}.`,
        { pageSize },
      );
    }
  }

  private toSummary(job: JobWithRelations): JobSummary {
    return {
      id: job.id,
      code: job.code,
      title: job.title,
      location: job.location?.title ?? null,
      department: job.department?.title ?? null,
      postedDate: job.postedDate,
      closingDate: job.closingDate,
    };
  }
}
