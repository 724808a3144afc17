import { ValueTransformer } from 'typeorm';

/**
 * bigint columns come back as strings from pg and as numbers from SQLite.
 * Halala amounts stay well inside Number.MAX_SAFE_INTEGER, so both are read as numbers.
 */
export const bigintToNumber: ValueTransformer = {
    to: (value: number | null | undefined) => value,
    from: (value: string | number | null) => (value === null ? null : Number(value)),
};
