import { Injectable, Logger } from '@nestjs/common';
import { DepartmentRepository, LocationRepository } from '@core/database';
import {
  CatalogConflictException,
  FailedPreconditionException,
} from '../exceptions/catalog.exception';

/**
 * 完整性守卫
 *
 * 在写入前拒绝会破坏引用完整性或唯一性的操作，本身无副作用。
 * 检查与写入之间不加锁，并发下由库中的外键和唯一索引兜底
 */
@Injectable()
export class IntegrityGuardService {
  private readonly logger = new Logger(IntegrityGuardService.name);

  constructor(
    private readonly locationRepository: LocationRepository,
    private readonly departmentRepository: DepartmentRepository,
  ) {}

  /**
   * 校验职位引用的地点和部门都存在
   * 两者都缺失时，details.reasons 中包含两条信息
   */
  async validateJobReferences(locationId: number, departmentId: number): Promise<void> {
    const [locationExists, departmentExists] = await Promise.all([
      this.locationRepository.exists(locationId),
      this.departmentRepository.exists(departmentId),
    ]);

    const reasons: string[] = [];
    if (!locationExists) {
      reasons.push(`Location with ID ${locationId} does not exist.`);
    }
    if (!departmentExists) {
      reasons.push(`Department with ID ${departmentId} does not exist.`);
    }

    if (reasons.length > 0) {
      this.logger.warn(`职位引用校验失败: ${reasons.join(' ')}`);
      throw new FailedPreconditionException(reasons[0], { reasons });
    }
  }

  /**
   * 校验部门标题唯一（区分大小写）
   * @param excludeId 更新时传入自身 id，与自身同名不算冲突
   */
  async validateDepartmentTitleUnique(title: string, excludeId?: number): Promise<void> {
    const ids = await this.departmentRepository.findIdsByTitle(title);
    const conflicting = ids.some((id) => id !== excludeId);

    if (conflicting) {
      const message =
        excludeId === undefined
          ? `Department with title '${title}' already exists.`
          : `Another department with title '${title}' already exists.`;
      throw new CatalogConflictException(message, { title });
    }
  }
}
