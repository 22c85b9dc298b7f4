import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Req,
  Res,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard, Roles } from '@auth';
import { Role } from '@shared/enums/role.enum';
import {
  buildResourceLocation,
  ResourceRequest,
  ResourceResponse,
} from '../common/resource-location.util';
import { DepartmentService } from './department.service';
import { DepartmentRequestDto, DepartmentResponseDto } from './dto/department.dto';

/**
 * 部门控制器
 * 所有接口都需要有效令牌，写入另需管理员
 */
@ApiTags('部门')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller({ path: 'departments', version: '1' })
export class DepartmentController {
  constructor(private readonly departmentService: DepartmentService) {}

  @Post()
  @Roles(Role.Administrator)
  @ApiOperation({ summary: '创建部门' })
  @ApiResponse({ status: 201, type: DepartmentResponseDto })
  @ApiResponse({ status: 409, description: '部门标题已存在' })
  async create(
    @Body() dto: DepartmentRequestDto,
    @Req() request: ResourceRequest,
    @Res({ passthrough: true }) response: ResourceResponse,
  ): Promise<DepartmentResponseDto> {
    const department = await this.departmentService.create(dto.title);
    response.location(buildResourceLocation(request, 'departments', department.id));
    return department;
  }

  @Put(':id')
  @Roles(Role.Administrator)
  @ApiOperation({ summary: '更新部门' })
  @ApiResponse({ status: 200, type: DepartmentResponseDto })
  @ApiResponse({ status: 404, description: '部门不存在' })
  @ApiResponse({ status: 409, description: '其他部门已使用该标题' })
  update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: DepartmentRequestDto,
  ): Promise<DepartmentResponseDto> {
    return this.departmentService.update(id, dto.title);
  }

  @Get()
  @ApiOperation({ summary: '部门列表' })
  @ApiResponse({ status: 200, type: [DepartmentResponseDto] })
  findAll(): Promise<DepartmentResponseDto[]> {
    return this.departmentService.findAll();
  }

  @Get(':id')
  @ApiOperation({ summary: '部门详情' })
  @ApiResponse({ status: 200, type: DepartmentResponseDto })
  @ApiResponse({ status: 404, description: '部门不存在' })
  findOne(@Param('id', ParseIntPipe) id: number): Promise<DepartmentResponseDto> {
    return this.departmentService.findOne(id);
  }
}
