import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { Role } from '../enums/role.enum';
import { RequestWithUser } from '@common/interfaces/request-with-user.interface';
import {
  AuthenticationNeededError,
  InsufficientRoleError,
} from '@common/exceptions/discussion.exceptions';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private reflector: Reflector) {}

  canActivate(ctx: ExecutionContext): boolean {
    const roles = this.reflector.getAllAndOverride<Role[] | undefined>(
      ROLES_KEY,
      [ctx.getHandler(), ctx.getClass()],
    );

    if (!roles || roles.length === 0) return true;
    const { user } = ctx.switchToHttp().getRequest<RequestWithUser>();

    if (!user) {
      throw new AuthenticationNeededError();
    }
    if (!user.roles.some((role) => roles.includes(role))) {
      throw new InsufficientRoleError(
        `This action requires one of the roles: ${roles.join(', ')}`,
      );
    }
    return true;
  }
}
