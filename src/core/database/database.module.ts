import { Global, Module } from '@nestjs/common';
import { HttpModule } from '@core/client-http';
import { PostgrestService } from './postgrest.service';
import { DepartmentRepository, JobRepository, LocationRepository } from './repositories';

/**
 * 数据库模块
 * 全局模块，提供 PostgREST 客户端与各表的 Repository
 */
@Global()
@Module({
  imports: [HttpModule],
  providers: [PostgrestService, LocationRepository, DepartmentRepository, JobRepository],
  exports: [PostgrestService, LocationRepository, DepartmentRepository, JobRepository],
})
export class DatabaseModule {}
