import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { randomUUID } from 'crypto';
import { AppConfigService } from '@core/config';
import { LogSanitizer } from '@core/logger';
import { Role } from '@shared/enums/role.enum';
import { InvalidCredentialsException, TokenRejectedException } from './exceptions/auth.exception';
import { IssuedToken, TokenClaims, TokenPayload } from './interfaces/token.interface';

/** 令牌有效期（秒） */
export const TOKEN_LIFETIME_SECONDS = 3600;

const ISSUED_ROLES: Role[] = [Role.Administrator, Role.User];

interface VerifiedPayload {
  sub: string;
  jti: string;
  roles: Role[];
  iat: number;
  exp: number;
}

function isRole(value: unknown): value is Role {
  return value === Role.Administrator || value === Role.User;
}

function isVerifiedPayload(value: object): value is VerifiedPayload {
  return (
    'sub' in value &&
    typeof value.sub === 'string' &&
    'jti' in value &&
    typeof value.jti === 'string' &&
    'roles' in value &&
    Array.isArray(value.roles) &&
    value.roles.every(isRole) &&
    'iat' in value &&
    typeof value.iat === 'number' &&
    'exp' in value &&
    typeof value.exp === 'number'
  );
}

/**
 * 凭证服务
 *
 * 令牌状态：Issued -(到期)-> Expired，Issued -(签名/声明校验失败)-> Rejected
 * 无状态，不支持吊销；令牌是唯一的会话凭据
 */
@Injectable()
export class CredentialService {
  private readonly logger = new Logger(CredentialService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly appConfig: AppConfigService,
  ) {}

  /**
   * 校验管理员账号并签发令牌
   * 有效期为签发时刻起整 1 小时
   */
  authenticate(username: string, password: string): IssuedToken {
    const admin = this.appConfig.admin;
    if (username !== admin.username || password !== admin.password) {
      this.logger.warn(`登录失败: ${LogSanitizer.maskString(username, 2, 0)}`);
      throw new InvalidCredentialsException();
    }

    const { secret, issuer, audience } = this.appConfig.jwt;
    const issuedAt = Math.floor(Date.now() / 1000);
    const payload: TokenPayload = {
      name: username,
      roles: ISSUED_ROLES,
      iat: issuedAt,
      nbf: issuedAt,
      exp: issuedAt + TOKEN_LIFETIME_SECONDS,
    };

    const token = this.jwtService.sign(payload, {
      secret,
      algorithm: 'HS256',
      subject: username,
      jwtid: randomUUID(),
      issuer,
      audience,
    });

    this.logger.log(`✅ 已签发令牌: ${LogSanitizer.maskString(username, 2, 0)}`);
    return { token, expires: new Date(payload.exp * 1000) };
  }

  /**
   * 校验令牌：签名、iss、aud，以及当前时间位于 [iat, exp) 内（无时钟容差）
   * 任何失败都返回同一个拒绝结果，具体原因只写 debug 日志
   */
  validateToken(token: string): TokenClaims {
    const { secret, issuer, audience } = this.appConfig.jwt;

    let payload: object;
    try {
      payload = this.jwtService.verify<object>(token, {
        secret,
        algorithms: ['HS256'],
        issuer,
        audience,
        clockTolerance: 0,
        clockTimestamp: Math.floor(Date.now() / 1000),
      });
    } catch (error) {
      const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      this.logger.debug(`令牌校验失败 - ${reason}`);
      throw new TokenRejectedException();
    }

    if (!isVerifiedPayload(payload)) {
      this.logger.debug('令牌校验失败 - 缺少必要声明');
      throw new TokenRejectedException();
    }

    return {
      subject: payload.sub,
      roles: payload.roles,
      tokenId: payload.jti,
      issuedAt: payload.iat,
      expiresAt: payload.exp,
    };
  }
}
