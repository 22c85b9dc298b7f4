import { Injectable, Logger } from '@nestjs/common';
import { DepartmentRecord, DepartmentRepository } from '@core/database';
import { IntegrityGuardService } from '../integrity/integrity-guard.service';
import { EntityNotFoundException } from '../exceptions/catalog.exception';
import { translateStoreError } from '../exceptions/store-error.util';

@Injectable()
export class DepartmentService {
  private readonly logger = new Logger(DepartmentService.name);

  constructor(
    private readonly departmentRepository: DepartmentRepository,
    private readonly integrityGuard: IntegrityGuardService,
  ) {}

  async create(title: string): Promise<DepartmentRecord> {
    await this.integrityGuard.validateDepartmentTitleUnique(title);

    try {
      const department = await this.departmentRepository.create(title);
      this.logger.log(`✅ 部门已创建: #${department.id} ${department.title}`);
      return department;
    } catch (error) {
      return translateStoreError(error, `Department with title '${title}' already exists.`);
    }
  }

  /**
   * 更新部门标题，与自身原标题相同不算冲突
   */
  async update(id: number, title: string): Promise<DepartmentRecord> {
    if (!(await this.departmentRepository.exists(id))) {
      throw new EntityNotFoundException('Department', id);
    }

    await this.integrityGuard.validateDepartmentTitleUnique(title, id);

    let updated: DepartmentRecord | null;
    try {
      updated = await this.departmentRepository.update(id, title);
    } catch (error) {
      return translateStoreError(
        error,
        `Another department with title '${title}' already exists.`,
      );
    }
    if (!updated) {
      throw new EntityNotFoundException('Department', id);
    }
    return updated;
  }

  findAll(): Promise<DepartmentRecord[]> {
    return this.departmentRepository.findAll();
  }

  async findOne(id: number): Promise<DepartmentRecord> {
    const department = await this.departmentRepository.findById(id);
    if (!department) {
      throw new EntityNotFoundException('Department', id);
    }
    return department;
  }
}
