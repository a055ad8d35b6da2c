import type { DiaryEntryInput } from '@domain/types/diary-entry.js';

export interface SampleAuthor {
  name: string;
  entries: DiaryEntryInput[];
}

export const SAMPLE_DIARY: readonly SampleAuthor[] = [
  {
    name: 'Bjorn',
    entries: [{
      entryTitle: 'Jumping',
      activityType: 'cardio',
      diaryText: 'Fun jumping day, burned the legs',
      durationMinutes: 20,
      intensityLevel: 4,
    }],
  },
  {
    name: 'Polo',
    entries: [{
      entryTitle: 'Arm curls',
      activityType: 'strength',
      diaryText: 'Really tough arm day, made me get a huge pump',
      durationMinutes: 10,
      intensityLevel: 8,
    }],
  },
  {
    name: 'olav',
    entries: [{
      entryTitle: 'evening run',
      activityType: 'cardio',
      diaryText: 'Cold run, need to put on a jacket next time',
      durationMinutes: 15,
      intensityLevel: 2,
    }],
  },
  {
    name: 'ola',
    entries: [{
      entryTitle: 'morning run',
      activityType: 'running',
      diaryText: 'Great weather really warm',
      durationMinutes: 45,
      intensityLevel: 7,
    }],
  },
];
