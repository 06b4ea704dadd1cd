import type { z } from 'zod';
import { ValidationError } from './errors';

/**
 * Parses `data` with `schema`, throwing a ValidationError that names the
 * first offending field.
 */
export function parseInput<T extends z.ZodType>(schema: T, data: unknown): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue && issue.path.length > 0 ? issue.path.map(String).join('.') : undefined;
    throw new ValidationError(issue?.message ?? 'Invalid input', field);
  }
  return result.data;
}

// Largest value a postgres `integer`/`serial` column holds
export const MAX_ID = 2147483647;

export function parseId(value: string, label = 'id'): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0 || id > MAX_ID) {
    throw new ValidationError(`Invalid ${label}`, label);
  }
  return id;
}
