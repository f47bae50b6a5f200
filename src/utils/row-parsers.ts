import { InvariantViolationError } from '../errors/domain-errors';

/**
 * Narrow a text column to one of the values of a string enum.
 * An unknown value means the schema and the code disagree.
 */
export function toEnum<T extends string>(allowed: readonly T[], value: unknown, column: string): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new InvariantViolationError(`Unexpected value in ${column}`, { column, value });
  }
  return match;
}

export function toNullableEnum<T extends string>(allowed: readonly T[], value: unknown, column: string): T | null {
  return value === null || value === undefined ? null : toEnum(allowed, value, column);
}

/** COUNT(*) and BIGINT come back from pg as strings */
export function toInt(value: string | number | null | undefined): number {
  if (value === null || value === undefined) {
    return 0;
  }
  return typeof value === 'number' ? value : parseInt(value, 10);
}

export function toRecord(value: unknown): Record<string, unknown> {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}
