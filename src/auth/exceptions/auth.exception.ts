import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * 用户名或密码错误
 * 不区分是哪一项不匹配
 */
export class InvalidCredentialsException extends HttpException {
  constructor() {
    super({ code: 'UNAUTHORIZED', message: 'Invalid credentials.' }, HttpStatus.UNAUTHORIZED);
  }
}

/**
 * 令牌被拒绝（缺失、格式错误、签名不符、过期、iss/aud 不符）
 * 所有原因对外返回同一条信息
 */
export class TokenRejectedException extends HttpException {
  constructor() {
    super({ code: 'UNAUTHORIZED', message: 'Invalid or expired token.' }, HttpStatus.UNAUTHORIZED);
  }
}

/**
 * 令牌有效但缺少所需角色
 */
export class InsufficientRoleException extends HttpException {
  constructor() {
    super(
      { code: 'FORBIDDEN', message: 'Insufficient role for this operation.' },
      HttpStatus.FORBIDDEN,
    );
  }
}
