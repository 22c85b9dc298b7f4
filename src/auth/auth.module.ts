import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { AuthController } from './auth.controller';
import { CredentialService } from './credential.service';
import { JwtAuthGuard } from './guards/jwt-auth.guard';

/**
 * 认证模块
 * 签名密钥在每次签发/校验时从 AppConfigService 传入
 */
@Module({
  imports: [JwtModule.register({})],
  controllers: [AuthController],
  providers: [CredentialService, JwtAuthGuard],
  exports: [CredentialService, JwtAuthGuard],
})
export class AuthModule {}
