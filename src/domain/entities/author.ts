import { AuthorNameSchema, type AuthorSnapshot } from '@domain/types/author.js';
import { authorIds, type IdAllocator } from '@domain/services/id-allocator.js';
import { parseArgument } from '@shared/lib/validate.js';

/**
 * Immutable diary author. Identity is the allocated id: two authors with the
 * same name are different authors, and `equals` ignores the name.
 */
export class Author {
  private readonly id: number;
  private readonly name: string;

  /** @throws InvalidArgumentError when `name` is missing or blank (no id is consumed). */
  constructor(name: string, ids: IdAllocator = authorIds) {
    this.name = parseArgument(AuthorNameSchema, name);
    this.id = ids.next();
  }

  getId(): number {
    return this.id;
  }

  getName(): string {
    return this.name;
  }

  equals(other: unknown): boolean {
    return other instanceof Author && other.id === this.id;
  }

  toString(): string {
    return `${this.name} (ID: ${this.id})`;
  }

  toJSON(): AuthorSnapshot {
    return { id: this.id, name: this.name };
  }
}
