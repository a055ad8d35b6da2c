import { describe, it, expect } from 'vitest';
import { IdAllocator, authorIds } from '@domain/services/id-allocator.js';
import { InvalidArgumentError } from '@shared/lib/errors.js';
import { Author } from './author.js';

describe('Author', () => {
  it('assigns ids from the allocator in construction order', () => {
    const ids = new IdAllocator();
    const bjorn = new Author('Bjorn', ids);
    const polo = new Author('Polo', ids);
    expect(bjorn.getId()).toBe(1);
    expect(polo.getId()).toBe(2);
  });

  it('draws from the process-wide allocator by default', () => {
    const expected = authorIds.peek();
    const first = new Author('Olav');
    const second = new Author('Ola');
    expect(first.getId()).toBe(expected);
    expect(second.getId()).toBe(expected + 1);
  });

  it('keeps the name as given', () => {
    expect(new Author('Bjorn', new IdAllocator()).getName()).toBe('Bjorn');
  });

  it('rejects a blank name', () => {
    expect(() => new Author('   ', new IdAllocator())).toThrow(InvalidArgumentError);
    expect(() => new Author('', new IdAllocator())).toThrow('Name of author cannot be null or blank');
  });

  it('rejects a null name', () => {
    expect(() => new Author(null as unknown as string, new IdAllocator())).toThrow(InvalidArgumentError);
  });

  it('does not consume an id when construction fails', () => {
    const ids = new IdAllocator();
    expect(() => new Author(' ', ids)).toThrow();
    expect(new Author('Bjorn', ids).getId()).toBe(1);
  });

  describe('equals', () => {
    it('compares by id only', () => {
      const ids = new IdAllocator();
      const a = new Author('Bjorn', ids);
      ids.reset();
      const sameId = new Author('Someone else', ids);
      expect(a.equals(sameId)).toBe(true);
    });

    it('treats same-named authors with different ids as different', () => {
      const ids = new IdAllocator();
      expect(new Author('Bjorn', ids).equals(new Author('Bjorn', ids))).toBe(false);
    });

    it('is false for non-authors', () => {
      const a = new Author('Bjorn', new IdAllocator());
      expect(a.equals(null)).toBe(false);
      expect(a.equals({ id: 1, name: 'Bjorn' })).toBe(false);
    });
  });

  it('renders as "<name> (ID: <id>)"', () => {
    const ids = new IdAllocator(3);
    expect(new Author('Polo', ids).toString()).toBe('Polo (ID: 3)');
  });

  it('serializes to an id/name snapshot', () => {
    const ids = new IdAllocator(9);
    expect(JSON.stringify(new Author('Ola', ids))).toBe('{"id":9,"name":"Ola"}');
  });
});
