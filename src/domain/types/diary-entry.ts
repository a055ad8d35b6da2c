import { z } from 'zod/v4';
import { isBlank } from '@shared/lib/validate.js';
import { AuthorSnapshotSchema } from './author.js';

// ── Entry fields ─────────────────────────────────────────────────────────────

function nonBlank(error: string) {
  return z.string({ error }).refine((value) => !isBlank(value), error);
}

export const EntryTitleSchema = nonBlank('The title for this session can not be empty!');
export const ActivityTypeSchema = nonBlank('Activity type can not be blank!');
export const DiaryTextSchema = nonBlank('diary text cannot be null or blank!');

const DURATION_ERROR = 'Workout must last longer than 0 minutes';
export const DurationMinutesSchema = z
  .number({ error: DURATION_ERROR })
  .int('Duration must be a whole number of minutes')
  .min(1, DURATION_ERROR);

export const MIN_INTENSITY = 1;
export const MAX_INTENSITY = 10;

const INTENSITY_ERROR = `The intensity level must be rated between ${MIN_INTENSITY} and ${MAX_INTENSITY}`;
export const IntensityLevelSchema = z
  .number({ error: INTENSITY_ERROR })
  .int('The intensity level must be a whole number')
  .min(MIN_INTENSITY, INTENSITY_ERROR)
  .max(MAX_INTENSITY, INTENSITY_ERROR);

// ── Entry input ──────────────────────────────────────────────────────────────

/** Everything needed to write an entry, minus its author. */
export const DiaryEntryInputSchema = z.object({
  entryTitle: EntryTitleSchema,
  activityType: ActivityTypeSchema,
  diaryText: DiaryTextSchema,
  durationMinutes: DurationMinutesSchema,
  intensityLevel: IntensityLevelSchema,
});

export type DiaryEntryInput = z.infer<typeof DiaryEntryInputSchema>;

// ── Snapshot ─────────────────────────────────────────────────────────────────

export const DiaryEntrySnapshotSchema = DiaryEntryInputSchema.extend({
  author: AuthorSnapshotSchema,
  createdAt: z.string().datetime(),
  lastModified: z.string().datetime(),
});

export type DiaryEntrySnapshot = z.infer<typeof DiaryEntrySnapshotSchema>;

// ── Search ───────────────────────────────────────────────────────────────────

export const SearchWordSchema = nonBlank('word cannot be null or blank!');

// ── Date range ───────────────────────────────────────────────────────────────

export const SearchBoundSchema = z.date({
  error: (issue) =>
    issue.input instanceof Date ? 'fromDate or toDate is not a valid date' : 'fromDate or toDate cannot be null',
});

export const DateRangeSchema = z
  .object({ fromDate: SearchBoundSchema, toDate: SearchBoundSchema })
  .refine(({ fromDate, toDate }) => fromDate.getTime() <= toDate.getTime(), 'fromDate cannot be after toDate!');

export type DateRange = z.infer<typeof DateRangeSchema>;
