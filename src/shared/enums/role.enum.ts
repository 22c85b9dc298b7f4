/**
 * 访问角色枚举
 * 令牌 roles 声明中携带的角色，用于接口权限控制
 */
export enum Role {
  /** 管理员，可写入目录数据 */
  Administrator = 'Administrator',
  /** 普通用户 */
  User = 'User',
}
