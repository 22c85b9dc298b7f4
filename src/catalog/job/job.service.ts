import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  JobRecord,
  JobRepository,
  JobWithRelations,
  StoreConstraintError,
  StoreUnavailableException,
} from '@core/database';
import { IntegrityGuardService } from '../integrity/integrity-guard.service';
import { EntityNotFoundException } from '../exceptions/catalog.exception';
import { translateStoreError } from '../exceptions/store-error.util';

/**
 * 职位写入字段（创建与全量更新共用）
 */
export interface JobFields {
  title: string;
  description: string;
  locationId: number;
  departmentId: number;
  closingDate: Date;
}

const MAX_CODE_ATTEMPTS = 2;

/**
 * 生成职位编码：JOB- + 随机 UUID 的前 8 位（大写）
 */
export function generateJobCode(): string {
  return `JOB-${randomUUID().substring(0, 8).toUpperCase()}`;
}

@Injectable()
export class JobService {
  private readonly logger = new Logger(JobService.name);

  constructor(
    private readonly jobRepository: JobRepository,
    private readonly integrityGuard: IntegrityGuardService,
  ) {}

  /**
   * 创建职位
   * code 与 postedDate 在此生成，之后不可变；code 撞上唯一索引时换一个重试
   */
  async create(fields: JobFields): Promise<JobRecord> {
    await this.integrityGuard.validateJobReferences(fields.locationId, fields.departmentId);

    for (let attempt = 1; ; attempt++) {
      const code = generateJobCode();
      try {
        const job = await this.jobRepository.create({
          ...fields,
          code,
          postedDate: new Date(),
        });
        this.logger.log(`✅ 职位已创建: #${job.id} ${job.code}`);
        return job;
      } catch (error) {
        if (!(error instanceof StoreConstraintError && error.kind === 'unique')) {
          return translateStoreError(error, `Job code ${code} already exists.`);
        }
        if (attempt >= MAX_CODE_ATTEMPTS) {
          this.logger.error(`职位编码连续 ${attempt} 次冲突，放弃创建`);
          throw new StoreUnavailableException('Could not allocate a unique job code.');
        }
        this.logger.warn(`职位编码冲突: ${code}，重新生成`);
      }
    }
  }

  /**
   * 全量更新职位，code 与 postedDate 保持不变
   */
  async update(id: number, fields: JobFields): Promise<JobRecord> {
    if (!(await this.jobRepository.exists(id))) {
      throw new EntityNotFoundException('Job', id);
    }

    await this.integrityGuard.validateJobReferences(fields.locationId, fields.departmentId);

    let updated: JobRecord | null;
    try {
      updated = await this.jobRepository.update(id, fields);
    } catch (error) {
      return translateStoreError(error, `Job ${id} conflicts with an existing job.`);
    }
    if (!updated) {
      throw new EntityNotFoundException('Job', id);
    }

    this.logger.log(`职位已更新: #${id}`);
    return updated;
  }

  async getDetail(id: number): Promise<JobWithRelations> {
    const job = await this.jobRepository.findWithRelations(id);
    if (!job) {
      throw new EntityNotFoundException('Job', id);
    }
    return job;
  }
}
