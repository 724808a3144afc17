import { ForbiddenException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { CSRF_HEADER, CsrfGuard } from './csrf.guard';
import { createCsrfToken } from '../utils/csrf.util';
import { AuthUser } from '../../modules/auth/auth-user';
import { Role } from '../../modules/users/role.enum';

const SECRET = 'test-csrf-secret';

function request(method: string, via: AuthUser['via'], token?: string) {
    const user: AuthUser = { id: 'user-1', username: 'clerk', fullName: 'Clerk', role: Role.CLERK, via };
    return new ExecutionContextHost([{ method, user, headers: token === undefined ? {} : { [CSRF_HEADER]: token } }]);
}

describe('CsrfGuard', () => {
    const guard = new CsrfGuard(new ConfigService({ csrfSecretKey: SECRET }));

    it('does not check safe methods', () => {
        expect(guard.canActivate(request('GET', 'cookie'))).toBe(true);
    });

    it('does not check bearer-token clients', () => {
        expect(guard.canActivate(request('POST', 'bearer'))).toBe(true);
    });

    it('accepts a cookie session that echoes its token', () => {
        expect(guard.canActivate(request('POST', 'cookie', createCsrfToken(SECRET, 'user-1')))).toBe(true);
    });

    it('rejects a cookie session without a valid token', () => {
        expect(() => guard.canActivate(request('DELETE', 'cookie'))).toThrow(ForbiddenException);
        expect(() => guard.canActivate(request('PATCH', 'cookie', createCsrfToken(SECRET, 'user-2')))).toThrow(ForbiddenException);
    });
});
