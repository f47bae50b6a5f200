/**
 * Postgres SQLSTATE codes the engine reacts to
 */
export const PG_FOREIGN_KEY_VIOLATION = '23503';
export const PG_UNIQUE_VIOLATION = '23505';
export const PG_CHECK_VIOLATION = '23514';
export const PG_LOCK_NOT_AVAILABLE = '55P03';
export const PG_SERIALIZATION_FAILURE = '40001';
export const PG_DEADLOCK_DETECTED = '40P01';

const CONTENTION_CODES = new Set([
  PG_LOCK_NOT_AVAILABLE,
  PG_SERIALIZATION_FAILURE,
  PG_DEADLOCK_DETECTED,
]);

export function getPgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function getPgConstraint(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'constraint' in error) {
    const { constraint } = error;
    return typeof constraint === 'string' ? constraint : undefined;
  }
  return undefined;
}

/**
 * Lock timeouts, serialization failures and deadlocks: nothing was applied
 * and the whole transaction can be retried.
 */
export function isContentionError(error: unknown): boolean {
  const code = getPgErrorCode(error);
  return code !== undefined && CONTENTION_CODES.has(code);
}

export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (getPgErrorCode(error) !== PG_UNIQUE_VIOLATION) {
    return false;
  }
  return constraint === undefined || getPgConstraint(error) === constraint;
}

export function isCheckViolation(error: unknown, constraint: string): boolean {
  return getPgErrorCode(error) === PG_CHECK_VIOLATION && getPgConstraint(error) === constraint;
}

export function isForeignKeyViolation(error: unknown): boolean {
  return getPgErrorCode(error) === PG_FOREIGN_KEY_VIOLATION;
}
