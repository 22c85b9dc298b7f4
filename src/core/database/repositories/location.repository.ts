import { Injectable } from '@nestjs/common';
import { BaseRepository } from './base.repository';
import { PostgrestService } from '../postgrest.service';

/**
 * locations 表的行
 */
export interface LocationRow {
  id: number;
  title: string;
  city: string;
  state: string;
  country: string;
  zip: string;
}

/**
 * 地点记录
 */
export interface LocationRecord {
  id: number;
  title: string;
  city: string;
  state: string;
  country: string;
  zip: string;
}

/**
 * 地点写入字段（创建与全量更新共用）
 */
export type LocationFields = Omit<LocationRecord, 'id'>;

/**
 * 地点 Repository
 */
@Injectable()
export class LocationRepository extends BaseRepository<LocationRow, LocationRecord> {
  protected readonly tableName = 'locations';

  constructor(postgrestService: PostgrestService) {
    super(postgrestService);
  }

  async create(fields: LocationFields): Promise<LocationRecord> {
    const row = await this.insertRow({ ...fields });
    return this.toRecord(row);
  }

  async update(id: number, fields: LocationFields): Promise<LocationRecord | null> {
    const row = await this.updateRow(id, { ...fields });
    return row ? this.toRecord(row) : null;
  }

  protected toRecord(row: LocationRow): LocationRecord {
    return {
      id: row.id,
      title: row.title,
      city: row.city,
      state: row.state,
      country: row.country,
      zip: row.zip,
    };
  }
}
