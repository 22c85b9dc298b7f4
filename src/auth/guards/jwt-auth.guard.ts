import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { Role } from '@shared/enums/role.enum';
import { CredentialService } from '../credential.service';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { InsufficientRoleException, TokenRejectedException } from '../exceptions/auth.exception';
import { TokenClaims } from '../interfaces/token.interface';

/**
 * 已通过认证的请求，claims 由 JwtAuthGuard 写入
 */
export interface AuthenticatedRequest extends Request {
  claims?: TokenClaims;
}

/**
 * Bearer 令牌守卫
 *
 * 读取 Authorization: Bearer <token>，校验后把声明挂到 request.claims；
 * 若处理器声明了 @Roles(...)，令牌需至少包含其中一个角色
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(
    private readonly credentialService: CredentialService,
    private readonly reflector: Reflector,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = this.extractBearerToken(request.headers.authorization);
    if (!token) {
      throw new TokenRejectedException();
    }

    const claims = this.credentialService.validateToken(token);

    const requiredRoles = this.reflector.getAllAndOverride<Role[] | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (requiredRoles && requiredRoles.length > 0) {
      const allowed = requiredRoles.some((role) => claims.roles.includes(role));
      if (!allowed) {
        throw new InsufficientRoleException();
      }
    }

    request.claims = claims;
    return true;
  }

  private extractBearerToken(header: string | undefined): string | null {
    if (!header) {
      return null;
    }
    const [scheme, token] = header.split(' ');
    if (scheme?.toLowerCase() !== 'bearer' || !token) {
      return null;
    }
    return token;
  }
}
