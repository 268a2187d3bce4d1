// src/db/pg-errors.ts
import postgres from 'postgres';

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';
export const PG_CHECK_VIOLATION = '23514';

export const isPostgresError = (error: unknown): error is postgres.PostgresError =>
    error instanceof postgres.PostgresError;

/** True when `error` is a unique violation, optionally on one named constraint or index. */
export const isUniqueViolation = (error: unknown, constraintName?: string): boolean =>
    isPostgresError(error) &&
    error.code === PG_UNIQUE_VIOLATION &&
    (constraintName === undefined || error.constraint_name === constraintName);
