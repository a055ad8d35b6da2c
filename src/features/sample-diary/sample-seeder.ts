import { Author } from '@domain/entities/author.js';
import { DiaryEntry } from '@domain/entities/diary-entry.js';
import type { IAuthorRegister } from '@domain/ports/author-register.js';
import type { IDiaryRegister } from '@domain/ports/diary-register.js';
import { DiaryEntryInputSchema } from '@domain/types/diary-entry.js';
import { authorIds, type IdAllocator } from '@domain/services/id-allocator.js';
import { logger } from '@shared/lib/logger.js';
import { parseArgument } from '@shared/lib/validate.js';
import { SAMPLE_DIARY, type SampleAuthor } from './sample-data.js';

export interface SeedResult {
  authors: Author[];
  entries: DiaryEntry[];
}

/**
 * Fills a pair of registers with a starter diary: each sample author is
 * registered, then each of their entries is created and filed under them.
 * A sample whose allocated id is already taken is skipped with its entries.
 */
export class SampleSeeder {
  private readonly log = logger.child({ component: 'SampleSeeder' });

  constructor(
    private readonly authors: IAuthorRegister,
    private readonly diary: IDiaryRegister,
    private readonly ids: IdAllocator = authorIds,
  ) {}

  seed(samples: readonly SampleAuthor[] = SAMPLE_DIARY): SeedResult {
    const result: SeedResult = { authors: [], entries: [] };

    for (const sample of samples) {
      const author = new Author(sample.name, this.ids);
      if (!this.authors.addAuthor(author)) {
        this.log.warn('author id already registered, skipping sample', { id: author.getId(), name: author.getName() });
        continue;
      }
      result.authors.push(author);

      for (const raw of sample.entries) {
        const input = parseArgument(DiaryEntryInputSchema, raw);
        const entry = new DiaryEntry(
          author,
          input.entryTitle,
          input.activityType,
          input.diaryText,
          input.durationMinutes,
          input.intensityLevel,
        );
        this.diary.addDiaryEntry(author, entry);
        result.entries.push(entry);
      }
    }

    this.log.debug('seeded registers', {
      authors: result.authors.length,
      entries: result.entries.length,
    });
    return result;
  }
}
