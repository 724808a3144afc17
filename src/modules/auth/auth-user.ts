import { Role } from '../users/role.enum';

export interface AuthUser {
    id: string;
    username: string;
    fullName: string;
    role: Role;
    // How the request authenticated; cookie sessions need a CSRF token on mutations
    via: 'cookie' | 'bearer';
}

declare global {
    namespace Express {
        interface User extends AuthUser { }
    }
}
