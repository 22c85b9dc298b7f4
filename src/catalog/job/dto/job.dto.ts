import { IsInt, IsISO8601, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * 创建职位请求
 */
export class CreateJobDto {
  @ApiProperty({ description: '职位标题', example: 'Backend Engineer' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  title!: string;

  @ApiProperty({ description: '职位描述' })
  @IsString()
  @IsNotEmpty()
  description!: string;

  @ApiProperty({ description: '地点 ID', example: 1 })
  @IsInt()
  locationId!: number;

  @ApiProperty({ description: '部门 ID', example: 1 })
  @IsInt()
  departmentId!: number;

  @ApiProperty({ description: '截止时间（ISO 8601，存储为 UTC）', example: '2024-06-30T23:59:59Z' })
  @IsISO8601({ strict: true })
  closingDate!: string;
}

/**
 * 更新职位请求（全量替换，所有字段必填）
 */
export class UpdateJobDto extends CreateJobDto {}

/**
 * 职位列表请求
 */
export class JobListRequestDto {
  @ApiPropertyOptional({ description: '在标题或描述中搜索的文本' })
  @IsOptional()
  @IsString()
  q?: string | null;

  @ApiPropertyOptional({ description: '页码，从 1 开始', default: 1 })
  @IsOptional()
  @IsInt()
  pageNo?: number;

  @ApiPropertyOptional({ description: '每页条数，1-100', default: 10 })
  @IsOptional()
  @IsInt()
  pageSize?: number;

  @ApiPropertyOptional({ description: '按地点过滤' })
  @IsOptional()
  @IsInt()
  locationId?: number | null;

  @ApiPropertyOptional({ description: '按部门过滤' })
  @IsOptional()
  @IsInt()
  departmentId?: number | null;
}

export class JobCreatedDto {
  @ApiProperty()
  id!: number;

  @ApiProperty({ example: 'JOB-1A2B3C4D' })
  code!: string;
}

export class JobListItemDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  code!: string;

  @ApiProperty()
  title!: string;

  @ApiProperty({ description: '地点标题，缺失时为 N/A' })
  location!: string;

  @ApiProperty({ description: '部门标题，缺失时为 N/A' })
  department!: string;

  @ApiProperty()
  postedDate!: Date;

  @ApiProperty()
  closingDate!: Date;
}

export class JobListResponseDto {
  @ApiProperty({ description: '满足条件的总数（与分页无关）' })
  total!: number;

  @ApiProperty({ type: [JobListItemDto] })
  data!: JobListItemDto[];
}

export class JobLocationDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  title!: string;

  @ApiProperty()
  city!: string;

  @ApiProperty()
  state!: string;

  @ApiProperty()
  country!: string;

  @ApiProperty()
  zip!: string;
}

export class JobDepartmentDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  title!: string;
}

export class JobDetailDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  code!: string;

  @ApiProperty()
  title!: string;

  @ApiProperty()
  description!: string;

  @ApiProperty({ type: JobLocationDto })
  location!: JobLocationDto;

  @ApiProperty({ type: JobDepartmentDto })
  department!: JobDepartmentDto;

  @ApiProperty()
  postedDate!: Date;

  @ApiProperty()
  closingDate!: Date;
}
