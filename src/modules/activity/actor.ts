import { AuthUser } from '../auth/auth-user';

/** Who performed a mutation, as recorded in the audit log. */
export interface Actor {
    userId: string | null;
    username: string;
    ipAddress: string | null;
}

export const SYSTEM_ACTOR: Actor = { userId: null, username: 'system', ipAddress: null };

export function actorFrom(user: AuthUser | undefined, ipAddress?: string): Actor {
    if (!user) return { ...SYSTEM_ACTOR, ipAddress: ipAddress ?? null };
    return { userId: user.id, username: user.username, ipAddress: ipAddress ?? null };
}
