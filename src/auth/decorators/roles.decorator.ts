import { SetMetadata } from '@nestjs/common';
import { Role } from '@shared/enums/role.enum';

export const ROLES_KEY = 'roles';

/**
 * 限定接口所需角色，令牌需包含其中任一角色
 */
export const Roles = (...roles: Role[]) => SetMetadata(ROLES_KEY, roles);
