import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { Role } from '../../modules/users/role.enum';

@Injectable()
export class RolesGuard implements CanActivate {
    constructor(private reflector: Reflector) { }

    canActivate(context: ExecutionContext): boolean {
        const required = this.reflector.getAllAndOverride<Role[] | undefined>(ROLES_KEY, [
            context.getHandler(),
            context.getClass(),
        ]);
        if (!required || required.length === 0) {
            return true;
        }

        const user = context.switchToHttp().getRequest<Request>().user;
        if (!user) {
            throw new ForbiddenException('Not authenticated');
        }
        // Admins pass every role check
        if (user.role === Role.ADMIN || required.includes(user.role)) {
            return true;
        }
        throw new ForbiddenException(`Requires one of: ${required.join(', ')}`);
    }
}
