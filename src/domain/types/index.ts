export {
  AuthorNameSchema,
  AuthorIdSchema,
  AuthorSnapshotSchema,
  type AuthorSnapshot,
} from './author.js';

export {
  EntryTitleSchema,
  ActivityTypeSchema,
  DiaryTextSchema,
  DurationMinutesSchema,
  IntensityLevelSchema,
  MIN_INTENSITY,
  MAX_INTENSITY,
  DiaryEntryInputSchema,
  DiaryEntrySnapshotSchema,
  SearchWordSchema,
  SearchBoundSchema,
  DateRangeSchema,
  type DiaryEntryInput,
  type DiaryEntrySnapshot,
  type DateRange,
} from './diary-entry.js';

export {
  LogLevelSchema,
  OutputModeSchema,
  DiaryConfigSchema,
  type OutputMode,
  type DiaryConfig,
} from './config.js';
