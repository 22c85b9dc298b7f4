import { Injectable } from '@nestjs/common';
import { BaseRepository } from './base.repository';
import { PostgrestService } from '../postgrest.service';

export interface DepartmentRow {
  id: number;
  title: string;
}

export interface DepartmentRecord {
  id: number;
  title: string;
}

/**
 * 部门 Repository
 *
 * departments.title 在库中有唯一索引，重复写入会得到 StoreConstraintError('unique')
 */
@Injectable()
export class DepartmentRepository extends BaseRepository<DepartmentRow, DepartmentRecord> {
  protected readonly tableName = 'departments';

  constructor(postgrestService: PostgrestService) {
    super(postgrestService);
  }

  async create(title: string): Promise<DepartmentRecord> {
    const row = await this.insertRow({ title });
    return this.toRecord(row);
  }

  async update(id: number, title: string): Promise<DepartmentRecord | null> {
    const row = await this.updateRow(id, { title });
    return row ? this.toRecord(row) : null;
  }

  /**
   * 查找标题完全相同（区分大小写）的部门 id
   */
  async findIdsByTitle(title: string): Promise<number[]> {
    const rows = await this.select<{ id: number }>({
      select: 'id',
      title: `eq.${title}`,
    });
    return rows.map((row) => row.id);
  }

  protected toRecord(row: DepartmentRow): DepartmentRecord {
    return { id: row.id, title: row.title };
  }
}
