import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CredentialService } from './credential.service';
import { LoginDto, LoginResponseDto } from './dto/login.dto';

/**
 * 认证控制器
 */
@ApiTags('认证')
@Controller({ path: 'auth', version: '1' })
export class AuthController {
  constructor(private readonly credentialService: CredentialService) {}

  /**
   * 管理员登录，返回 1 小时有效的 JWT
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: '登录并获取令牌' })
  @ApiResponse({ status: 200, type: LoginResponseDto })
  @ApiResponse({ status: 401, description: '用户名或密码错误' })
  login(@Body() dto: LoginDto): LoginResponseDto {
    return this.credentialService.authenticate(dto.username, dto.password);
  }
}
