import { z } from 'zod/v4';
import { parseArgument } from '@shared/lib/validate.js';

const StartSchema = z
  .number({ error: 'Allocator start must be a positive integer' })
  .int('Allocator start must be a positive integer')
  .min(1, 'Allocator start must be a positive integer');

/**
 * Hands out strictly increasing author ids, starting at 1.
 *
 * Pass an instance to `new Author(name, allocator)` to isolate id sequences
 * (e.g. one per test); authors created without one share `authorIds`.
 */
export class IdAllocator {
  private nextId: number;

  constructor(start = 1) {
    this.nextId = parseArgument(StartSchema, start);
  }

  /** Return the current id and advance the counter. */
  next(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }

  /** The id the next call to `next()` will return. */
  peek(): number {
    return this.nextId;
  }

  reset(start = 1): void {
    this.nextId = parseArgument(StartSchema, start);
  }
}

/** Process-wide allocator used when an Author is created without one. */
export const authorIds = new IdAllocator();
