import { QueryFailedError } from 'typeorm';

// 23505: PostgreSQL unique_violation; SQLITE_CONSTRAINT_UNIQUE from better-sqlite3
export function isUniqueViolation(error: unknown): boolean {
    if (!(error instanceof QueryFailedError)) return false;
    const driverError: unknown = error.driverError;
    if (typeof driverError !== 'object' || driverError === null || !('code' in driverError)) {
        return false;
    }
    const code = driverError.code;
    return code === '23505' || code === 'SQLITE_CONSTRAINT_UNIQUE';
}
