import { Module } from '@nestjs/common';
import { AuthModule } from '@auth';
import { IntegrityGuardService } from './integrity/integrity-guard.service';
import { CatalogQueryService } from './query/catalog-query.service';
import { JobController } from './job/job.controller';
import { JobService } from './job/job.service';
import { LocationController } from './location/location.controller';
import { LocationService } from './location/location.service';
import { DepartmentController } from './department/department.controller';
import { DepartmentService } from './department/department.service';

/**
 * 目录模块
 * 职位、地点、部门的读写接口；Repository 由全局 DatabaseModule 提供
 */
@Module({
  imports: [AuthModule],
  controllers: [JobController, LocationController, DepartmentController],
  providers: [
    IntegrityGuardService,
    CatalogQueryService,
    JobService,
    LocationService,
    DepartmentService,
  ],
  exports: [IntegrityGuardService, CatalogQueryService],
})
export class CatalogModule {}
