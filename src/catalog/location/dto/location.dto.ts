import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

/**
 * 创建 / 全量更新地点请求
 */
export class LocationRequestDto {
  @ApiProperty({ example: 'HQ' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  title!: string;

  @ApiProperty({ example: 'Pune' })
  @IsString()
  @IsNotEmpty()
  city!: string;

  @ApiProperty({ example: 'MH' })
  @IsString()
  @IsNotEmpty()
  state!: string;

  @ApiProperty({ example: 'India' })
  @IsString()
  @IsNotEmpty()
  country!: string;

  @ApiProperty({ example: '411001' })
  @IsString()
  @IsNotEmpty()
  zip!: string;
}

export class LocationResponseDto {
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
