import { JobWithRelations } from '@core/database';
import { JobSummary } from '../query/catalog-query.service';
import { JobDetailDto, JobListItemDto } from './dto/job.dto';

/** 悬空引用在响应中的占位值 */
export const MISSING_REFERENCE = 'N/A';

export function toJobListItem(summary: JobSummary): JobListItemDto {
  return {
    id: summary.id,
    code: summary.code,
    title: summary.title,
    location: summary.location ?? MISSING_REFERENCE,
    department: summary.department ?? MISSING_REFERENCE,
    postedDate: summary.postedDate,
    closingDate: summary.closingDate,
  };
}

/**
 * 职位详情
 * 关联缺失时 id 为 0，其余字段为 N/A
 */
export function toJobDetail(job: JobWithRelations): JobDetailDto {
  const { location, department } = job;

  return {
    id: job.id,
    code: job.code,
    title: job.title,
    description: job.description,
    location: {
      id: location?.id ?? 0,
      title: location?.title ?? MISSING_REFERENCE,
      city: location?.city ?? MISSING_REFERENCE,
      state: location?.state ?? MISSING_REFERENCE,
      country: location?.country ?? MISSING_REFERENCE,
      zip: location?.zip ?? MISSING_REFERENCE,
    },
    department: {
      id: department?.id ?? 0,
      title: department?.title ?? MISSING_REFERENCE,
    },
    postedDate: job.postedDate,
    closingDate: job.closingDate,
  };
}
