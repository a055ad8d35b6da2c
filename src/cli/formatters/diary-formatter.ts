import type { Author } from '@domain/entities/author.js';
import type { DiaryEntry } from '@domain/entities/diary-entry.js';
import { AuthorSnapshotSchema } from '@domain/types/author.js';
import { DiaryEntrySnapshotSchema } from '@domain/types/diary-entry.js';

const ENTRY_SEPARATOR = '**********';

export function formatEntry(entry: DiaryEntry): string {
  const lines: string[] = [];
  lines.push(`Author: ${entry.getAuthor().toString()}`);
  lines.push(`Title: ${entry.getEntryTitle()}`);
  lines.push(`Activity: ${entry.getActivityType()}`);
  lines.push(`Duration: ${entry.getDurationMinutes()} minutes`);
  lines.push(`Intensity: ${entry.getIntensityLevel()}`);
  lines.push(`Diary Text: ${entry.getDiaryText()}`);
  lines.push(`Created at: ${entry.getCreatedAt().toISOString()}`);
  return lines.join('\n');
}

/** Entries in the given order, each followed by a separator line. */
export function formatEntryList(entries: DiaryEntry[], title = '-WorkoutDiary-'): string {
  if (entries.length === 0) return 'No diary entries found.';

  const lines: string[] = [title];
  for (const entry of entries) {
    lines.push(formatEntry(entry));
    lines.push(ENTRY_SEPARATOR);
  }
  return lines.join('\n');
}

export function formatAuthorTable(authors: Author[]): string {
  if (authors.length === 0) return 'No authors found.';

  const lines: string[] = [];
  lines.push('Authors');
  lines.push('─'.repeat(40));
  for (const a of authors) {
    lines.push(`  ${String(a.getId()).padStart(4)}  ${a.getName()}`);
  }
  return lines.join('\n');
}

export function formatTotals(totals: Map<Author, number>): string {
  if (totals.size === 0) return 'No diary entries found.';

  const lines: string[] = [];
  lines.push('Entries per author');
  lines.push('─'.repeat(40));
  for (const [author, count] of totals) {
    lines.push(`  ${author.toString()}: ${count} ${count === 1 ? 'entry' : 'entries'}`);
  }
  return lines.join('\n');
}

// JSON formatters — snapshots are validated before printing
export function formatEntryListJson(entries: DiaryEntry[]): string {
  return JSON.stringify(entries.map((e) => DiaryEntrySnapshotSchema.parse(e.toJSON())), null, 2);
}

export function formatAuthorTableJson(authors: Author[]): string {
  return JSON.stringify(authors.map((a) => AuthorSnapshotSchema.parse(a.toJSON())), null, 2);
}

export function formatTotalsJson(totals: Map<Author, number>): string {
  const rows = [...totals].map(([author, count]) => ({ author: author.toJSON(), count }));
  return JSON.stringify(rows, null, 2);
}
