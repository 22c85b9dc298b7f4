import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

/**
 * 创建 / 全量更新部门请求
 * 标题全局唯一（区分大小写）
 */
export class DepartmentRequestDto {
  @ApiProperty({ example: 'Engineering' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  title!: string;
}

export class DepartmentResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  title!: string;
}
