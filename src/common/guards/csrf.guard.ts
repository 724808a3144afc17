import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { verifyCsrfToken } from '../utils/csrf.util';

export const CSRF_HEADER = 'x-csrf-token';
const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

/**
 * Runs after JwtAuthGuard. Cookie sessions must echo the CSRF token on mutations;
 * bearer-token clients are not exposed to cross-site form posts.
 */
@Injectable()
export class CsrfGuard implements CanActivate {
    constructor(private configService: ConfigService) { }

    canActivate(context: ExecutionContext): boolean {
        const request = context.switchToHttp().getRequest<Request>();
        if (SAFE_METHODS.has(request.method)) return true;

        const user = request.user;
        if (!user || user.via === 'bearer') return true;

        const header = request.headers[CSRF_HEADER];
        const token = Array.isArray(header) ? header[0] : header;
        const secret = this.configService.get<string>('csrfSecretKey') ?? '';

        if (!verifyCsrfToken(secret, user.id, token)) {
            throw new ForbiddenException('Invalid or missing CSRF token');
        }
        return true;
    }
}
