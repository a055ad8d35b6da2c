import type { Author } from '@domain/entities/author.js';

/**
 * Port interface for the author register.
 * Feature-layer and CLI consumers depend on this interface rather than the
 * concrete AuthorRegister class in infrastructure.
 */
export interface IAuthorRegister {
  /** Append an author; `false` if one with the same id is already registered. */
  addAuthor(author: Author): boolean;
  /** Copy of the register in insertion order. */
  getAllAuthors(): Author[];
  getAuthorCount(): number;
  /** Case-insensitive exact name match. */
  searchAuthorByName(name: string): Author[];
  getAuthorById(id: number): Author | null;
  /** `false` when no author has this id. */
  removeAuthor(id: number): boolean;
}
