import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '@shared/lib/errors.js';
import { IdAllocator } from './id-allocator.js';

describe('IdAllocator', () => {
  it('starts at 1 by default', () => {
    const ids = new IdAllocator();
    expect(ids.next()).toBe(1);
    expect(ids.next()).toBe(2);
  });

  it('hands out strictly increasing ids', () => {
    const ids = new IdAllocator();
    const issued = Array.from({ length: 5 }, () => ids.next());
    expect(issued).toEqual([1, 2, 3, 4, 5]);
  });

  it('peek does not advance', () => {
    const ids = new IdAllocator(7);
    expect(ids.peek()).toBe(7);
    expect(ids.peek()).toBe(7);
    expect(ids.next()).toBe(7);
    expect(ids.peek()).toBe(8);
  });

  it('reset restarts the sequence', () => {
    const ids = new IdAllocator();
    ids.next();
    ids.next();
    ids.reset();
    expect(ids.next()).toBe(1);
    ids.reset(100);
    expect(ids.next()).toBe(100);
  });

  it('rejects a non-positive start', () => {
    expect(() => new IdAllocator(0)).toThrow(InvalidArgumentError);
    expect(() => new IdAllocator(0)).toThrow('Allocator start must be a positive integer');
    expect(() => new IdAllocator().reset(-1)).toThrow(InvalidArgumentError);
  });
});
