import type { z } from 'zod/v4';
import {
  EntryTitleSchema,
  ActivityTypeSchema,
  DiaryTextSchema,
  DurationMinutesSchema,
  IntensityLevelSchema,
  type DiaryEntrySnapshot,
} from '@domain/types/diary-entry.js';
import { parseArgument, requireValue } from '@shared/lib/validate.js';
import type { Author } from './author.js';

/**
 * One logged workout, owned by a single author.
 *
 * The author and creation time are fixed at construction. Every setter
 * validates its value first; only a valid value is written, together with a
 * fresh `lastModified` stamp.
 */
export class DiaryEntry {
  private readonly author: Author;
  private readonly createdAt: number;
  private lastModified: number;
  private entryTitle: string;
  private activityType: string;
  private diaryText: string;
  private durationMinutes: number;
  private intensityLevel: number;

  /** @throws InvalidArgumentError if any argument is missing, blank or out of range. */
  constructor(
    author: Author,
    entryTitle: string,
    activityType: string,
    diaryText: string,
    durationMinutes: number,
    intensityLevel: number,
  ) {
    this.author = requireValue(author, 'Author cannot be null!');
    this.entryTitle = parseArgument(EntryTitleSchema, entryTitle);
    this.activityType = parseArgument(ActivityTypeSchema, activityType);
    this.diaryText = parseArgument(DiaryTextSchema, diaryText);
    this.durationMinutes = parseArgument(DurationMinutesSchema, durationMinutes);
    this.intensityLevel = parseArgument(IntensityLevelSchema, intensityLevel);
    this.createdAt = Date.now();
    this.lastModified = this.createdAt;
  }

  // ── Mutators ─────────────────────────────────────────────────────────────

  setDiaryText(diaryText: string): void {
    this.diaryText = this.stamp(DiaryTextSchema, diaryText);
  }

  setEntryTitle(entryTitle: string): void {
    this.entryTitle = this.stamp(EntryTitleSchema, entryTitle);
  }

  setActivityType(activityType: string): void {
    this.activityType = this.stamp(ActivityTypeSchema, activityType);
  }

  setDurationMinutes(durationMinutes: number): void {
    this.durationMinutes = this.stamp(DurationMinutesSchema, durationMinutes);
  }

  setIntensityLevel(intensityLevel: number): void {
    this.intensityLevel = this.stamp(IntensityLevelSchema, intensityLevel);
  }

  // ── Accessors ────────────────────────────────────────────────────────────

  getAuthor(): Author {
    return this.author;
  }

  getEntryTitle(): string {
    return this.entryTitle;
  }

  getActivityType(): string {
    return this.activityType;
  }

  getDiaryText(): string {
    return this.diaryText;
  }

  getDurationMinutes(): number {
    return this.durationMinutes;
  }

  getIntensityLevel(): number {
    return this.intensityLevel;
  }

  /** A copy; mutating it does not affect the entry. */
  getCreatedAt(): Date {
    return new Date(this.createdAt);
  }

  getLastModified(): Date {
    return new Date(this.lastModified);
  }

  toJSON(): DiaryEntrySnapshot {
    return {
      author: this.author.toJSON(),
      entryTitle: this.entryTitle,
      activityType: this.activityType,
      diaryText: this.diaryText,
      durationMinutes: this.durationMinutes,
      intensityLevel: this.intensityLevel,
      createdAt: new Date(this.createdAt).toISOString(),
      lastModified: new Date(this.lastModified).toISOString(),
    };
  }

  /** Validate a new field value and refresh `lastModified`; throws before touching any state. */
  private stamp<T>(schema: z.ZodType<T>, value: unknown): T {
    const parsed = parseArgument(schema, value);
    this.lastModified = Math.max(Date.now(), this.lastModified);
    return parsed;
  }
}
