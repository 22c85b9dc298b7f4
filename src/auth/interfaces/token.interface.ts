import { Role } from '@shared/enums/role.enum';

/**
 * 登录成功后返回的令牌
 */
export interface IssuedToken {
  token: string;
  /** 过期时间（UTC），签发时间 + 1 小时 */
  expires: Date;
}

/**
 * 令牌签名载荷
 * sub / jti / iss / aud 通过签名选项写入
 */
export interface TokenPayload {
  name: string;
  roles: Role[];
  iat: number;
  nbf: number;
  exp: number;
}

/**
 * 校验通过的令牌声明
 */
export interface TokenClaims {
  subject: string;
  roles: Role[];
  tokenId: string;
  /** 签发时间（秒） */
  issuedAt: number;
  /** 过期时间（秒），不含该时刻 */
  expiresAt: number;
}
