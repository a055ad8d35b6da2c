import type { z } from 'zod/v4';
import { InvalidArgumentError } from './errors.js';

/**
 * Parse a caller-supplied value against a schema.
 * @throws InvalidArgumentError carrying the zod issues; the message is the first issue's.
 */
export function parseArgument<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const [first] = result.error.issues;
    throw new InvalidArgumentError(first?.message ?? 'Invalid argument', result.error.issues);
  }
  return result.data;
}

/** Reject `null` / `undefined` where a value is required. */
export function requireValue<T>(value: T | null | undefined, message: string): T {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(message);
  }
  return value;
}

const WHITESPACE = /[\t\n\v\f\r\u001C-\u001F\p{Zs}\p{Zl}\p{Zp}]/u;
const NO_BREAK_SPACES = new Set(['\u00A0', '\u2007', '\u202F']);

/**
 * True when every character is whitespace. The information separators
 * U+001C..U+001F count as whitespace; no-break spaces count as content.
 */
export function isBlank(value: string): boolean {
  for (const char of value) {
    if (NO_BREAK_SPACES.has(char) || !WHITESPACE.test(char)) return false;
  }
  return true;
}
