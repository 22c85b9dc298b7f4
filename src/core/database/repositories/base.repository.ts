import { Logger } from '@nestjs/common';
import { AxiosInstance, isAxiosError } from 'axios';
import { PostgrestService } from '../postgrest.service';
import { StoreConstraintError, StoreUnavailableException } from '../database.exceptions';

/**
 * 分页窗口（offset / limit 形式）
 */
export interface PageWindow {
  offset: number;
  limit: number;
}

/**
 * 分页查询结果
 * total 与分页无关，是满足筛选条件的总行数
 */
export interface PageResult<T> {
  total: number;
  rows: T[];
}

/**
 * PostgREST 错误响应体
 */
interface PostgrestErrorBody {
  code?: string;
  message?: string;
  details?: string | null;
}

function isPostgrestErrorBody(value: unknown): value is PostgrestErrorBody {
  return typeof value === 'object' && value !== null && ('code' in value || 'message' in value);
}

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

/**
 * Repository 基类
 *
 * 设计原则：
 * 1. 所有 Repository 共享 PostgrestService 的 HTTP 客户端
 * 2. 行（snake_case）到领域记录（camelCase）的映射由子类的 toRecord 完成
 * 3. 存储错误一律向上抛出：约束冲突为 StoreConstraintError，其余为 StoreUnavailableException
 */
export abstract class BaseRepository<TRow extends { id: number }, TRecord> {
  protected readonly logger: Logger;

  /**
   * 数据库表名（子类必须实现）
   */
  protected abstract readonly tableName: string;

  constructor(protected readonly postgrestService: PostgrestService) {
    this.logger = new Logger(this.constructor.name);
  }

  /**
   * 行映射为领域记录（子类必须实现）
   */
  protected abstract toRecord(row: TRow): TRecord;

  protected getClient(): AxiosInstance {
    return this.postgrestService.getHttpClient();
  }

  // ==================== 通用读取 ====================

  async exists(id: number): Promise<boolean> {
    const rows = await this.select<{ id: number }>({
      select: 'id',
      id: `eq.${id}`,
      limit: '1',
    });
    return rows.length > 0;
  }

  async findById(id: number): Promise<TRecord | null> {
    const row = await this.selectOne<TRow>({ id: `eq.${id}` });
    return row ? this.toRecord(row) : null;
  }

  /**
   * 读取全部记录，按 id 升序
   */
  async findAll(): Promise<TRecord[]> {
    const rows = await this.select<TRow>({ order: 'id.asc' });
    return rows.map((row) => this.toRecord(row));
  }

  // ==================== 通用 CRUD 操作 ====================

  /**
   * 通用 SELECT 查询
   * @param params PostgREST 查询参数
   */
  protected async select<T>(params: Record<string, string>): Promise<T[]> {
    try {
      const response = await this.getClient().get<T[]>(`/${this.tableName}`, { params });
      return response.data ?? [];
    } catch (error) {
      throw this.handleError('SELECT', error);
    }
  }

  protected async selectOne<T>(params: Record<string, string>): Promise<T | null> {
    const results = await this.select<T>({ ...params, limit: '1' });
    return results.length > 0 ? results[0] : null;
  }

  /**
   * 通用 INSERT，返回插入后的行
   */
  protected async insertRow(data: Omit<TRow, 'id'>): Promise<TRow> {
    try {
      const response = await this.getClient().post<TRow[]>(`/${this.tableName}`, data, {
        headers: { Prefer: 'return=representation' },
      });
      const inserted = response.data?.[0];
      if (!inserted) {
        throw new StoreUnavailableException(`Insert into ${this.tableName} returned no row.`);
      }
      return inserted;
    } catch (error) {
      throw this.handleError('INSERT', error);
    }
  }

  /**
   * 通用 UPDATE（PATCH），行不存在时返回 null
   */
  protected async updateRow(id: number, data: Partial<Omit<TRow, 'id'>>): Promise<TRow | null> {
    try {
      const response = await this.getClient().patch<TRow[]>(`/${this.tableName}`, data, {
        params: { id: `eq.${id}` },
        headers: { Prefer: 'return=representation' },
      });
      return response.data?.[0] ?? null;
    } catch (error) {
      throw this.handleError('UPDATE', error);
    }
  }

  /**
   * 分页 SELECT，带精确总数
   *
   * 总数取自 Content-Range（如 `0-9/42`、`*\/0`）；
   * 越界页 PostgREST 返回 416，此时总数仍在 Content-Range 中，结果行为空
   */
  protected async selectPage<T>(
    params: Record<string, string>,
    window: PageWindow,
  ): Promise<PageResult<T>> {
    try {
      const response = await this.getClient().get<T[]>(`/${this.tableName}`, {
        params: {
          ...params,
          offset: String(window.offset),
          limit: String(window.limit),
        },
        headers: { Prefer: 'count=exact' },
      });
      const rows = response.data ?? [];
      const total = this.parseTotal(response.headers['content-range']) ?? rows.length;
      return { total, rows };
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 416) {
        const total = this.parseTotal(error.response.headers['content-range']);
        if (total !== null) {
          return { total, rows: [] };
        }
      }
      throw this.handleError('SELECT_PAGE', error);
    }
  }

  /**
   * 解析 Content-Range 中的总数部分
   */
  protected parseTotal(contentRange: unknown): number | null {
    if (typeof contentRange !== 'string') {
      return null;
    }
    const totalPart = contentRange.split('/')[1];
    if (totalPart === undefined || totalPart === '*') {
      return null;
    }
    const total = parseInt(totalPart, 10);
    return Number.isNaN(total) ? null : total;
  }

  // ==================== 错误处理 ====================

  /**
   * 统一错误处理，返回应抛出的错误
   */
  protected handleError(operation: string, error: unknown): Error {
    if (error instanceof StoreUnavailableException) {
      return error;
    }

    if (isAxiosError(error)) {
      const status = error.response?.status;
      const body: unknown = error.response?.data;

      if (isPostgrestErrorBody(body)) {
        const message = body.message ?? error.message;
        const detail = body.details ?? undefined;

        if (body.code === UNIQUE_VIOLATION) {
          this.logger.warn(`[${this.tableName}] ${operation} 唯一约束冲突: ${message}`);
          return new StoreConstraintError('unique', this.tableName, message, detail);
        }
        if (body.code === FOREIGN_KEY_VIOLATION) {
          this.logger.warn(`[${this.tableName}] ${operation} 外键约束失败: ${message}`);
          return new StoreConstraintError('foreign_key', this.tableName, message, detail);
        }
      }

      this.logger.error(
        `[${this.tableName}] ${operation} 失败 (${status ?? 'unknown'}): ${error.message}`,
      );
      return new StoreUnavailableException();
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`[${this.tableName}] ${operation} 失败: ${message}`);
    return new StoreUnavailableException();
  }
}
