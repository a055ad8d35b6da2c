import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  Author,
  AuthorRegister,
  DiaryEntry,
  DiaryRegister,
  IdAllocator,
  InvalidArgumentError,
} from './index.js';

describe('workout diary public API', () => {
  let ids: IdAllocator;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-05-10T07:00:00.000Z'));
    ids = new IdAllocator();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('keeps authors and their entries in separate registers', () => {
    const authors = new AuthorRegister();
    const diary = new DiaryRegister();
    const bjorn = new Author('Bjorn', ids);
    const polo = new Author('Polo', ids);
    authors.addAuthor(bjorn);
    authors.addAuthor(polo);

    const jump = new DiaryEntry(bjorn, 'Jumping', 'cardio', 'Fun jumping day', 20, 4);
    vi.setSystemTime(new Date('2026-05-10T08:00:00.000Z'));
    const curls = new DiaryEntry(polo, 'Arm curls', 'strength', 'Really tough arm day', 10, 8);
    vi.setSystemTime(new Date('2026-05-10T09:00:00.000Z'));
    const sprint = new DiaryEntry(bjorn, 'Sprints', 'running', 'Short and sharp', 15, 9);

    diary.addDiaryEntry(bjorn, jump);
    diary.addDiaryEntry(polo, curls);
    diary.addDiaryEntry(bjorn, sprint);

    expect(diary.getSortedEntries()).toEqual([sprint, curls, jump]);
    expect(diary.getTotalEntriesByAuthors().get(bjorn)).toBe(2);

    // Removing an author does not touch their diary bucket.
    expect(authors.removeAuthor(bjorn.getId())).toBe(true);
    expect(diary.getAllEntriesByAuthor(bjorn)).toEqual([jump, sprint]);
  });

  it('refuses to file an entry under the wrong author', () => {
    const diary = new DiaryRegister();
    const bjorn = new Author('Bjorn', ids);
    const polo = new Author('Polo', ids);
    const entry = new DiaryEntry(polo, 'Run', 'cardio', 'Felt great', 30, 5);
    expect(() => diary.addDiaryEntry(bjorn, entry)).toThrow(InvalidArgumentError);
    expect(diary.clearEntries()).toBe(false);
  });
});
