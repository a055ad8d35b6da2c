import type { Author } from '@domain/entities/author.js';
import type { DiaryEntry } from '@domain/entities/diary-entry.js';

/**
 * Port interface for the diary register: entries bucketed per author.
 * Every returned collection is a fresh copy; the entries and authors inside
 * are shared references.
 */
export interface IDiaryRegister {
  /** `false` when this very entry object is already in the author's bucket. */
  addDiaryEntry(author: Author, entry: DiaryEntry): boolean;
  deleteDiaryEntry(author: Author, entry: DiaryEntry): boolean;
  /** Entries created strictly between the two bounds. */
  searchByDate(fromDate: Date, toDate: Date): DiaryEntry[];
  /** All entries, newest first. */
  getSortedEntries(): DiaryEntry[];
  /** `false` if the register was already empty. */
  clearEntries(): boolean;
  getAllEntriesByAuthor(author: Author): DiaryEntry[];
  /** Entry count for every author that has a bucket, including emptied ones. */
  getTotalEntriesByAuthors(): Map<Author, number>;
  /** Case-insensitive substring search over diary text. */
  searchEntryByWord(word: string): DiaryEntry[];
}
