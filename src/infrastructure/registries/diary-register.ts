import type { Author } from '@domain/entities/author.js';
import type { DiaryEntry } from '@domain/entities/diary-entry.js';
import type { IDiaryRegister } from '@domain/ports/diary-register.js';
import { DateRangeSchema, SearchWordSchema } from '@domain/types/diary-entry.js';
import { InvalidArgumentError } from '@shared/lib/errors.js';
import { parseArgument, requireValue } from '@shared/lib/validate.js';
import { logger } from '@shared/lib/logger.js';

interface Bucket {
  /** The author instance the bucket was created for. */
  author: Author;
  entries: DiaryEntry[];
}

/**
 * In-memory implementation of IDiaryRegister.
 *
 * Buckets are keyed by author id, matching Author equality. A bucket is
 * created on the author's first `addDiaryEntry` and survives until
 * `clearEntries`, even once all of its entries are deleted.
 *
 * Entry duplicates are detected by object identity: two separately
 * constructed entries with identical fields are both kept.
 */
export class DiaryRegister implements IDiaryRegister {
  private readonly buckets = new Map<number, Bucket>();
  private readonly log = logger.child({ component: 'DiaryRegister' });

  addDiaryEntry(author: Author, entry: DiaryEntry): boolean {
    requireValue(author, 'Author or entry cannot be null');
    requireValue(entry, 'Author or entry cannot be null');
    if (entry.getAuthor().getId() !== author.getId()) {
      throw new InvalidArgumentError("Diary entry author doesn't belong to this author");
    }

    let bucket = this.buckets.get(author.getId());
    if (!bucket) {
      bucket = { author, entries: [] };
      this.buckets.set(author.getId(), bucket);
    }

    if (bucket.entries.includes(entry)) {
      return false;
    }
    bucket.entries.push(entry);
    this.log.debug('added entry', { authorId: author.getId(), title: entry.getEntryTitle() });
    return true;
  }

  deleteDiaryEntry(author: Author, entry: DiaryEntry): boolean {
    requireValue(author, 'Diary entry or author cannot be null');
    requireValue(entry, 'Diary entry or author cannot be null');

    const bucket = this.buckets.get(author.getId());
    if (!bucket) {
      return false;
    }
    const index = bucket.entries.indexOf(entry);
    if (index === -1) {
      return false;
    }
    bucket.entries.splice(index, 1);
    this.log.debug('deleted entry', { authorId: author.getId(), title: entry.getEntryTitle() });
    return true;
  }

  searchByDate(fromDate: Date, toDate: Date): DiaryEntry[] {
    const range = parseArgument(DateRangeSchema, { fromDate, toDate });
    const from = range.fromDate.getTime();
    const to = range.toDate.getTime();
    return this.allEntries().filter((entry) => {
      const created = entry.getCreatedAt().getTime();
      return created > from && created < to;
    });
  }

  getSortedEntries(): DiaryEntry[] {
    // Array#sort is stable: ties keep bucket order, then insertion order.
    return this.allEntries().sort(
      (a, b) => b.getCreatedAt().getTime() - a.getCreatedAt().getTime(),
    );
  }

  clearEntries(): boolean {
    if (this.buckets.size === 0) {
      return false;
    }
    const authorCount = this.buckets.size;
    this.buckets.clear();
    this.log.debug('cleared register', { authorCount });
    return true;
  }

  getAllEntriesByAuthor(author: Author): DiaryEntry[] {
    requireValue(author, 'Author cannot be null');
    return [...(this.buckets.get(author.getId())?.entries ?? [])];
  }

  getTotalEntriesByAuthors(): Map<Author, number> {
    const totals = new Map<Author, number>();
    for (const { author, entries } of this.buckets.values()) {
      totals.set(author, entries.length);
    }
    return totals;
  }

  searchEntryByWord(word: string): DiaryEntry[] {
    const needle = parseArgument(SearchWordSchema, word).toLowerCase();
    return this.allEntries().filter((entry) => entry.getDiaryText().toLowerCase().includes(needle));
  }

  private allEntries(): DiaryEntry[] {
    return [...this.buckets.values()].flatMap((bucket) => bucket.entries);
  }
}
