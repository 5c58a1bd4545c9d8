import { ValidationError } from './errors.js';

export function isTrue(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new ValidationError(message);
  }
}

export function notNull<T>(value: T | null | undefined, message: string): asserts value is T {
  if (value === null || value === undefined) {
    throw new ValidationError(message);
  }
}

/**
 * Asserts a string argument is present and not empty. Also takes `null` from untyped callers.
 */
export function notEmpty(value: string | null | undefined, message: string): asserts value is string {
  if (value === null || value === undefined || value.length === 0) {
    throw new ValidationError(message);
  }
}
