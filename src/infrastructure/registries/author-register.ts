import type { Author } from '@domain/entities/author.js';
import type { IAuthorRegister } from '@domain/ports/author-register.js';
import { AuthorIdSchema, AuthorNameSchema } from '@domain/types/author.js';
import { parseArgument, requireValue } from '@shared/lib/validate.js';
import { logger } from '@shared/lib/logger.js';

/**
 * In-memory implementation of IAuthorRegister.
 *
 * Authors are kept in insertion order and are unique by id. Lookups are
 * linear scans; the register is meant for a handful of authors.
 */
export class AuthorRegister implements IAuthorRegister {
  private readonly authors: Author[] = [];
  private readonly log = logger.child({ component: 'AuthorRegister' });

  addAuthor(author: Author): boolean {
    requireValue(author, 'Author cannot be null');
    if (this.authors.some((a) => a.getId() === author.getId())) {
      return false;
    }
    this.authors.push(author);
    this.log.debug('added author', { id: author.getId(), name: author.getName() });
    return true;
  }

  getAllAuthors(): Author[] {
    return [...this.authors];
  }

  getAuthorCount(): number {
    return this.authors.length;
  }

  searchAuthorByName(name: string): Author[] {
    const wanted = parseArgument(AuthorNameSchema, name).toLowerCase();
    return this.authors.filter((a) => a.getName().toLowerCase() === wanted);
  }

  getAuthorById(id: number): Author | null {
    return this.authors.find((a) => a.getId() === id) ?? null;
  }

  removeAuthor(id: number): boolean {
    parseArgument(AuthorIdSchema, id);
    const index = this.authors.findIndex((a) => a.getId() === id);
    if (index === -1) {
      return false;
    }
    this.authors.splice(index, 1);
    this.log.debug('removed author', { id });
    return true;
  }
}
