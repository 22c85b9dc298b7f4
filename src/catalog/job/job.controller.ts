import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Req,
  Res,
  UseGuards,
  Version,
  VERSION_NEUTRAL,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard, Roles } from '@auth';
import { Role } from '@shared/enums/role.enum';
import { CatalogQueryService } from '../query/catalog-query.service';
import {
  buildResourceLocation,
  ResourceRequest,
  ResourceResponse,
} from '../common/resource-location.util';
import { JobService } from './job.service';
import { toJobDetail, toJobListItem } from './job.mapper';
import {
  CreateJobDto,
  JobCreatedDto,
  JobDetailDto,
  JobListRequestDto,
  JobListResponseDto,
  UpdateJobDto,
} from './dto/job.dto';

/**
 * 职位控制器
 */
@ApiTags('职位')
@Controller({ path: 'jobs', version: '1' })
export class JobController {
  constructor(
    private readonly jobService: JobService,
    private readonly catalogQueryService: CatalogQueryService,
  ) {}

  /**
   * 创建职位，Location 头指向新资源
   */
  @Post()
  @UseGuards(JwtAuthGuard)
  @Roles(Role.Administrator)
  @ApiBearerAuth()
  @ApiOperation({ summary: '创建职位' })
  @ApiResponse({ status: 201, type: JobCreatedDto })
  @ApiResponse({ status: 400, description: '参数非法或引用的地点/部门不存在' })
  async create(
    @Body() dto: CreateJobDto,
    @Req() request: ResourceRequest,
    @Res({ passthrough: true }) response: ResourceResponse,
  ): Promise<JobCreatedDto> {
    const job = await this.jobService.create({
      title: dto.title,
      description: dto.description,
      locationId: dto.locationId,
      departmentId: dto.departmentId,
      closingDate: new Date(dto.closingDate),
    });

    response.location(buildResourceLocation(request, 'jobs', job.id));
    return { id: job.id, code: job.code };
  }

  @Put(':id')
  @UseGuards(JwtAuthGuard)
  @Roles(Role.Administrator)
  @ApiBearerAuth()
  @ApiOperation({ summary: '全量更新职位' })
  @ApiResponse({ status: 200 })
  @ApiResponse({ status: 404, description: '职位不存在' })
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateJobDto): Promise<void> {
    await this.jobService.update(id, {
      title: dto.title,
      description: dto.description,
      locationId: dto.locationId,
      departmentId: dto.departmentId,
      closingDate: new Date(dto.closingDate),
    });
  }

  /**
   * 职位列表（不带版本号：POST /api/jobs/list）
   */
  @Post('list')
  @Version(VERSION_NEUTRAL)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: '检索职位列表' })
  @ApiResponse({ status: 200, type: JobListResponseDto })
  async list(@Body() dto: JobListRequestDto): Promise<JobListResponseDto> {
    const result = await this.catalogQueryService.listJobs({
      query: dto.q,
      locationId: dto.locationId,
      departmentId: dto.departmentId,
      pageNumber: dto.pageNo,
      pageSize: dto.pageSize,
    });

    return {
      total: result.total,
      data: result.items.map(toJobListItem),
    };
  }

  @Get(':id')
  @ApiOperation({ summary: '职位详情' })
  @ApiResponse({ status: 200, type: JobDetailDto })
  @ApiResponse({ status: 404, description: '职位不存在' })
  async findOne(@Param('id', ParseIntPipe) id: number): Promise<JobDetailDto> {
    const job = await this.jobService.getDetail(id);
    return toJobDetail(job);
  }
}
