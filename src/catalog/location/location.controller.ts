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
import { LocationService } from './location.service';
import { LocationRequestDto, LocationResponseDto } from './dto/location.dto';

/**
 * 地点控制器
 * 读取公开，写入需要管理员
 */
@ApiTags('地点')
@Controller({ path: 'locations', version: '1' })
export class LocationController {
  constructor(private readonly locationService: LocationService) {}

  @Post()
  @UseGuards(JwtAuthGuard)
  @Roles(Role.Administrator)
  @ApiBearerAuth()
  @ApiOperation({ summary: '创建地点' })
  @ApiResponse({ status: 201, type: LocationResponseDto })
  async create(
    @Body() dto: LocationRequestDto,
    @Req() request: ResourceRequest,
    @Res({ passthrough: true }) response: ResourceResponse,
  ): Promise<LocationResponseDto> {
    const location = await this.locationService.create({ ...dto });
    response.location(buildResourceLocation(request, 'locations', location.id));
    return location;
  }

  @Put(':id')
  @UseGuards(JwtAuthGuard)
  @Roles(Role.Administrator)
  @ApiBearerAuth()
  @ApiOperation({ summary: '全量更新地点' })
  @ApiResponse({ status: 200, type: LocationResponseDto })
  @ApiResponse({ status: 404, description: '地点不存在' })
  update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: LocationRequestDto,
  ): Promise<LocationResponseDto> {
    return this.locationService.update(id, { ...dto });
  }

  @Get()
  @ApiOperation({ summary: '地点列表' })
  @ApiResponse({ status: 200, type: [LocationResponseDto] })
  findAll(): Promise<LocationResponseDto[]> {
    return this.locationService.findAll();
  }

  @Get(':id')
  @ApiOperation({ summary: '地点详情' })
  @ApiResponse({ status: 200, type: LocationResponseDto })
  @ApiResponse({ status: 404, description: '地点不存在' })
  findOne(@Param('id', ParseIntPipe) id: number): Promise<LocationResponseDto> {
    return this.locationService.findOne(id);
  }
}
